/**
 * Environment configuration
 * Parses and validates the settings read from environment variables
 */

import * as path from 'path';
import { getLogger, parseLogLevel, type LogLevel } from './logger.js';
import { DEFAULT_ENCODINGS, DEFAULT_USER_AGENT, LEXICON_FILES, LIMITS } from './constants.js';

const logger = getLogger('config');

export interface AppConfig {
	lexiconDir: string;
	positiveWordsFile: string;
	negativeWordsFile: string;
	stopWordsFile: string;
	lexiconEncodings: readonly string[];
	maxTextLength: number;
	fetchTimeoutMs: number;
	fetchRetries: number;
	userAgent: string;
	logLevel: LogLevel;
}

export type Env = Readonly<Record<string, string | undefined>>;

/** Bundled word lists, resolved the same way from src/ and dist/ */
export const DEFAULT_LEXICON_DIR = path.resolve(__dirname, '..', '..', 'data');

/**
 * Safely parse a non-negative integer environment variable
 */
export function parseEnvInt(value: string | undefined, defaultValue: number, name: string): number {
	if (!value) return defaultValue;

	const parsed = Number(value.trim());
	if (!Number.isInteger(parsed)) {
		logger.warn(`Invalid integer for ${name}: "${value}", using default ${defaultValue}`);
		return defaultValue;
	}

	if (parsed < 0) {
		logger.warn(`${name} must not be negative: ${parsed}, using default ${defaultValue}`);
		return defaultValue;
	}

	return parsed;
}

function isSupportedEncoding(label: string): boolean {
	try {
		new TextDecoder(label);
		return true;
	} catch {
		return false;
	}
}

/**
 * Parse a comma-separated list of text encodings, keeping only those the runtime can decode
 */
export function parseEncodings(value: string | undefined): readonly string[] {
	if (!value) return DEFAULT_ENCODINGS;

	const requested = value
		.split(',')
		.map((label) => label.trim().toLowerCase())
		.filter((label) => label.length > 0);

	const supported = requested.filter((label) => {
		if (isSupportedEncoding(label)) return true;
		logger.warn(`Ignoring unsupported encoding "${label}"`);
		return false;
	});

	return supported.length > 0 ? supported : DEFAULT_ENCODINGS;
}

/**
 * Get validated configuration
 */
export function getConfig(env: Env = process.env): Readonly<AppConfig> {
	const config: AppConfig = {
		lexiconDir: env.LEXICON_DIR ? path.resolve(env.LEXICON_DIR) : DEFAULT_LEXICON_DIR,
		positiveWordsFile: env.POSITIVE_WORDS_FILE?.trim() || LEXICON_FILES.POSITIVE,
		negativeWordsFile: env.NEGATIVE_WORDS_FILE?.trim() || LEXICON_FILES.NEGATIVE,
		stopWordsFile: env.STOP_WORDS_FILE?.trim() || LEXICON_FILES.STOP_WORDS,
		lexiconEncodings: parseEncodings(env.LEXICON_ENCODINGS),
		maxTextLength: parseEnvInt(env.MAX_TEXT_LENGTH, LIMITS.MAX_TEXT_LENGTH, 'MAX_TEXT_LENGTH'),
		fetchTimeoutMs: parseEnvInt(env.FETCH_TIMEOUT_MS, LIMITS.FETCH_TIMEOUT, 'FETCH_TIMEOUT_MS'),
		fetchRetries: parseEnvInt(env.FETCH_RETRIES, LIMITS.FETCH_RETRIES, 'FETCH_RETRIES'),
		userAgent: env.HTTP_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
		logLevel: parseLogLevel(env.LOG_LEVEL),
	};

	logger.debug('Configuration loaded', {
		lexiconDir: config.lexiconDir,
		encodings: config.lexiconEncodings.join(','),
		maxTextLength: config.maxTextLength,
	});

	return Object.freeze(config);
}
