/**
 * Centralized validation system - utilizes utils/common.ts
 */

import { validateInput, type ValidationSchema } from '../utils/common.js';
import { PATTERNS } from './constants.js';

/**
 * Validate object against schema - re-export from utils/common.ts
 */
export const validate = validateInput;

/**
 * Schemas for the two ways text reaches the engine
 */
export function analysisRequestSchemas(maxTextLength: number): {
	text: ValidationSchema;
	url: ValidationSchema;
} {
	return {
		text: {
			text: { type: 'string', required: true, maxLength: maxTextLength },
		},
		url: {
			url: {
				type: 'string',
				required: true,
				pattern: PATTERNS.URL,
				custom: (value: unknown) => {
					if (typeof value !== 'string') return false;
					try {
						const { protocol } = new URL(value);
						return protocol === 'http:' || protocol === 'https:' || 'Only http(s) URLs are supported';
					} catch {
						return 'URL could not be parsed';
					}
				},
			},
		},
	};
}

/**
 * Sanitize string input: strips control characters other than tab and newlines
 */
export function sanitizeString(input: string): string {
	return input.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '').trim(); // eslint-disable-line no-control-regex
}
