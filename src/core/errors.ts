/**
 * Centralized error handling - utilizes utils/common.ts
 */

import { AppError, ErrorCode } from '../utils/common.js';

export { AppError, ErrorCode } from '../utils/common.js';

export const ErrorMessages: Record<ErrorCode, string> = {
	[ErrorCode.NOT_FOUND]: 'Resource not found',
	[ErrorCode.PERMISSION_DENIED]: 'Access denied',
	[ErrorCode.IO_ERROR]: 'File operation failed',
	[ErrorCode.INVALID_INPUT]: 'Invalid input provided',
	[ErrorCode.VALIDATION_ERROR]: 'Validation failed',
	[ErrorCode.CONFIGURATION_ERROR]: 'Invalid configuration',
	[ErrorCode.LEXICON_LOAD_ERROR]: 'Failed to load word list',
	[ErrorCode.RUNTIME_ERROR]: 'An unknown error occurred',
	[ErrorCode.NETWORK_ERROR]: 'Network error occurred',
	[ErrorCode.TIMEOUT_ERROR]: 'Operation timed out',
};

/**
 * The text to analyze is empty, unreadable, or could not be obtained.
 * Its message is shown to the user as-is.
 */
export class InvalidInputError extends AppError {
	constructor(message: string = ErrorMessages[ErrorCode.INVALID_INPUT], details?: unknown) {
		super(message, ErrorCode.INVALID_INPUT, details, 400);
		this.name = 'InvalidInputError';
	}
}

/**
 * A word list is missing or cannot be decoded in any configured encoding.
 * This is an operator problem, not a user one.
 */
export class LexiconLoadError extends AppError {
	constructor(message: string = ErrorMessages[ErrorCode.LEXICON_LOAD_ERROR], details?: unknown) {
		super(message, ErrorCode.LEXICON_LOAD_ERROR, details, 500);
		this.name = 'LexiconLoadError';
	}
}

export class TextFetchError extends AppError {
	constructor(message: string, details?: unknown, retryable = false, statusCode = 502) {
		super(message, ErrorCode.NETWORK_ERROR, details, statusCode, retryable);
		this.name = 'TextFetchError';
	}
}
