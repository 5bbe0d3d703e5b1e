// ============================================================================
// Error Handling
// ============================================================================

/** Error codes for standardized error handling */
export enum ErrorCode {
	// File & Resource Errors
	NOT_FOUND = 'NOT_FOUND',
	PERMISSION_DENIED = 'PERMISSION_DENIED',
	IO_ERROR = 'IO_ERROR',

	// Validation & Input Errors
	INVALID_INPUT = 'INVALID_INPUT',
	VALIDATION_ERROR = 'VALIDATION_ERROR',

	// System & Runtime Errors
	CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
	LEXICON_LOAD_ERROR = 'LEXICON_LOAD_ERROR',
	RUNTIME_ERROR = 'RUNTIME_ERROR',

	// Network Errors
	NETWORK_ERROR = 'NETWORK_ERROR',
	TIMEOUT_ERROR = 'TIMEOUT_ERROR',
}

/** Standard application error */
export class AppError extends Error {
	constructor(
		message: string,
		public code: ErrorCode,
		public details?: unknown,
		public statusCode: number = 500,
		public isRetryable: boolean = false
	) {
		super(message);
		this.name = 'AppError';
		Error.captureStackTrace?.(this, this.constructor);
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			details: this.details,
			statusCode: this.statusCode,
			isRetryable: this.isRetryable,
		};
	}
}

function isErrnoException(error: Error): error is NodeJS.ErrnoException {
	return 'code' in error;
}

/** Wrap unknown errors into AppError */
export function handleError(error: unknown, context?: string): AppError {
	if (error instanceof AppError) return error;

	if (error instanceof Error) {
		const code = isErrnoException(error) ? error.code : undefined;
		const { message, stack } = error;
		switch (code) {
			case 'ENOENT':
				return new AppError(
					`Not found${context ? ` in ${context}` : ''}`,
					ErrorCode.NOT_FOUND,
					{ originalError: message },
					404
				);
			case 'EACCES':
			case 'EPERM':
				return new AppError(
					`Permission denied${context ? ` for ${context}` : ''}`,
					ErrorCode.PERMISSION_DENIED,
					{ originalError: message },
					403
				);
			case 'EISDIR':
				return new AppError(
					`Expected a file${context ? ` in ${context}` : ''}`,
					ErrorCode.IO_ERROR,
					{ originalError: message },
					400
				);
			default:
				return new AppError(
					message || 'Unknown error',
					ErrorCode.RUNTIME_ERROR,
					{ context, stack },
					500
				);
		}
	}

	return new AppError(
		typeof error === 'string' ? error : 'Unexpected error',
		ErrorCode.RUNTIME_ERROR,
		{ error: String(error), context },
		500
	);
}

// ============================================================================
// Validation
// ============================================================================

/** Validation rule schema */
export interface ValidationRule {
	type?: 'string' | 'number' | 'boolean' | 'array' | 'object';
	required?: boolean;
	minLength?: number;
	maxLength?: number;
	min?: number;
	max?: number;
	pattern?: RegExp;
	enum?: ReadonlyArray<unknown>;
	custom?: (value: unknown) => boolean | string;
}
export type ValidationSchema = Record<string, ValidationRule>;

/** Validate input against schema */
export function validateInput(
	input: Record<string, unknown>,
	schema: ValidationSchema,
	throwOnError = true
): { valid: boolean; errors: string[] } {
	const errors: string[] = [];

	for (const [field, rules] of Object.entries(schema)) {
		const value = input[field];

		if (rules.required && (value === undefined || value === null || value === '')) {
			errors.push(`${field} is required`);
			continue;
		}

		if (value === undefined || value === null) continue;

		const type = Array.isArray(value) ? 'array' : typeof value;
		if (rules.type && type !== rules.type) {
			errors.push(`${field} must be ${rules.type}, got ${type}`);
			continue;
		}

		if (typeof value === 'string') {
			if (rules.minLength && value.length < rules.minLength)
				errors.push(`${field} min length ${rules.minLength}`);
			if (rules.maxLength && value.length > rules.maxLength)
				errors.push(`${field} max length ${rules.maxLength}`);
			if (rules.pattern && !rules.pattern.test(value))
				errors.push(`${field} pattern mismatch`);
		}

		if (typeof value === 'number') {
			if (rules.min !== undefined && value < rules.min)
				errors.push(`${field} >= ${rules.min}`);
			if (rules.max !== undefined && value > rules.max)
				errors.push(`${field} <= ${rules.max}`);
		}

		if (Array.isArray(value)) {
			if (rules.minLength && value.length < rules.minLength)
				errors.push(`${field} requires ${rules.minLength}+ items`);
			if (rules.maxLength && value.length > rules.maxLength)
				errors.push(`${field} max ${rules.maxLength} items`);
		}

		if (rules.enum && !rules.enum.includes(value))
			errors.push(`${field} must be one of: ${rules.enum.join(', ')}`);

		if (rules.custom) {
			const result = rules.custom(value);
			if (result !== true)
				errors.push(typeof result === 'string' ? result : `${field} invalid`);
		}
	}

	if (throwOnError && errors.length)
		throw new AppError('Validation failed', ErrorCode.VALIDATION_ERROR, { errors }, 400);

	return { valid: errors.length === 0, errors };
}

// ============================================================================
// Arithmetic
// ============================================================================

/** Divide, defining every zero-denominator ratio as 0 */
export const ratio = (numerator: number, denominator: number): number =>
	denominator === 0 ? 0 : numerator / denominator;

// ============================================================================
// String Utilities
// ============================================================================

export const truncate = (s: string, max: number): string =>
	s.length <= max ? s : `${s.slice(0, max - 3)}...`;

// ============================================================================
// Async Utilities
// ============================================================================

export interface RetryOptions {
	maxAttempts?: number;
	initialDelay?: number;
	maxDelay?: number;
	factor?: number;
	retryIf?: (e: unknown) => boolean;
	onRetry?: (attempt: number, e: unknown) => void;
}

const isRetryableError = (e: unknown): boolean => e instanceof AppError && e.isRetryable;

export async function retry<T>(
	fn: () => Promise<T>,
	{
		maxAttempts = 3,
		initialDelay = 1000,
		maxDelay = 10000,
		factor = 2,
		retryIf = isRetryableError,
		onRetry,
	}: RetryOptions = {}
): Promise<T> {
	let delay = initialDelay;
	for (let attempt = 1; ; attempt++) {
		try {
			return await fn();
		} catch (e) {
			if (attempt >= maxAttempts || !retryIf(e)) throw e;
			onRetry?.(attempt, e);
			await sleep(delay);
			delay = Math.min(delay * factor, maxDelay);
		}
	}
}

export const sleep = (ms: number): Promise<void> => new Promise((res) => setTimeout(res, ms));

// ============================================================================
// Performance & Environment Utilities
// ============================================================================

/** Measure execution time */
export async function measureExecution<T>(
	fn: () => Promise<T>
): Promise<{ result: T; ms: number }> {
	const start = Date.now();
	const result = await fn();
	return { result, ms: Date.now() - start };
}

export const isTest = (): boolean => process.env.NODE_ENV === 'test';

/** Format bytes to human-readable size */
export const formatBytes = (bytes: number, decimals = 2): string => {
	if (bytes === 0) return '0 Bytes';
	const k = 1024;
	const dm = decimals < 0 ? 0 : decimals;
	const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
	const i = Math.floor(Math.log(bytes) / Math.log(k));
	return `${parseFloat((bytes / Math.pow(k, i)).toFixed(dm))} ${sizes[i]}`;
};
