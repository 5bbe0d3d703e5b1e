/**
 * Word list loading
 * Reads one-word-per-line lists, decoding with an ordered list of fallback encodings,
 * and keeps the loaded lexicons for the lifetime of the process.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { getLogger } from '../core/logger.js';
import { LexiconLoadError } from '../core/errors.js';
import { DEFAULT_ENCODINGS, ERROR_MESSAGES } from '../core/constants.js';
import { formatBytes, handleError } from '../utils/common.js';
import type { AppConfig } from '../core/config.js';
import type { Lexicon, LexiconSet } from '../types/index.js';

const logger = getLogger('lexicon-loader');

export type LexiconSources = Pick<
	AppConfig,
	'lexiconDir' | 'positiveWordsFile' | 'negativeWordsFile' | 'stopWordsFile' | 'lexiconEncodings'
>;

export interface DecodedText {
	text: string;
	encoding: string;
}

/**
 * Read-only view over a word set. Only the `ReadonlySet` surface is exposed,
 * so a lexicon shared through the store cannot be changed after loading.
 */
function readOnlyView(words: Set<string>): Lexicon {
	const view: Lexicon = {
		get size() {
			return words.size;
		},
		has: (word) => words.has(word),
		forEach: (callback, thisArg) => words.forEach((word) => callback.call(thisArg, word, word, view)),
		entries: () => words.entries(),
		keys: () => words.keys(),
		values: () => words.values(),
		[Symbol.iterator]: () => words.values(),
	};
	return Object.freeze(view);
}

/**
 * Build a read-only lexicon from any iterable of words, lowercased and trimmed
 */
export function createLexicon(words: Iterable<string>): Lexicon {
	const set = new Set<string>();
	for (const word of words) {
		const normalized = word.trim().toLowerCase();
		if (normalized) set.add(normalized);
	}
	return readOnlyView(set);
}

/**
 * Decode bytes with the first encoding that accepts them
 */
export function decodeWithFallback(
	bytes: Uint8Array,
	encodings: readonly string[] = DEFAULT_ENCODINGS,
	source = 'word list'
): DecodedText {
	const failures: string[] = [];

	for (const encoding of encodings) {
		try {
			const text = new TextDecoder(encoding, { fatal: true }).decode(bytes);
			return { text, encoding };
		} catch (error) {
			failures.push(`${encoding}: ${error instanceof Error ? error.message : String(error)}`);
		}
	}

	throw new LexiconLoadError(`${ERROR_MESSAGES.LEXICON_UNREADABLE}: ${source}`, {
		source,
		encodings: [...encodings],
		failures,
	});
}

/**
 * Parse a word list: one entry per line, blank lines and `;` comments skipped
 */
export function parseWordList(text: string): Lexicon {
	const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
	return createLexicon(lines.filter((line) => !line.trimStart().startsWith(';')));
}

export async function loadWordList(
	filePath: string,
	encodings: readonly string[] = DEFAULT_ENCODINGS
): Promise<Lexicon> {
	let bytes: Buffer;
	try {
		bytes = await fs.readFile(filePath);
	} catch (error) {
		const cause = handleError(error, filePath);
		throw new LexiconLoadError(`${ERROR_MESSAGES.LEXICON_MISSING}: ${filePath}`, {
			path: filePath,
			code: cause.code,
			cause: cause.message,
		});
	}

	const { text, encoding } = decodeWithFallback(bytes, encodings, filePath);
	const lexicon = parseWordList(text);

	logger.debug('Loaded word list', {
		path: filePath,
		encoding,
		size: formatBytes(bytes.length),
		words: lexicon.size,
	});

	return lexicon;
}

export async function loadLexicons(sources: LexiconSources): Promise<LexiconSet> {
	const resolve = (file: string) => path.resolve(sources.lexiconDir, file);
	const [positive, negative, stopWords] = await Promise.all([
		loadWordList(resolve(sources.positiveWordsFile), sources.lexiconEncodings),
		loadWordList(resolve(sources.negativeWordsFile), sources.lexiconEncodings),
		loadWordList(resolve(sources.stopWordsFile), sources.lexiconEncodings),
	]);

	return Object.freeze({ positive, negative, stopWords });
}

/**
 * Process-wide cache of loaded lexicon sets, keyed by their sources.
 * Concurrent callers share one pending load; a failed load is not kept.
 */
export class LexiconStore {
	private entries = new Map<string, Promise<LexiconSet>>();

	constructor(private readonly loader: (sources: LexiconSources) => Promise<LexiconSet> = loadLexicons) {}

	static keyFor(sources: LexiconSources): string {
		return JSON.stringify([
			path.resolve(sources.lexiconDir),
			sources.positiveWordsFile,
			sources.negativeWordsFile,
			sources.stopWordsFile,
			sources.lexiconEncodings,
		]);
	}

	load(sources: LexiconSources): Promise<LexiconSet> {
		const key = LexiconStore.keyFor(sources);
		const existing = this.entries.get(key);
		if (existing) return existing;

		const pending = this.loader(sources).catch((error: unknown) => {
			this.entries.delete(key);
			throw error;
		});
		this.entries.set(key, pending);
		return pending;
	}

	has(sources: LexiconSources): boolean {
		return this.entries.has(LexiconStore.keyFor(sources));
	}

	clear(): void {
		this.entries.clear();
	}
}

export const lexiconStore = new LexiconStore();
