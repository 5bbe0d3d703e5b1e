/**
 * Text primitives shared by the scorers: normalization, sentence and word splitting.
 * Every function here is total and side-effect free.
 */

import { PATTERNS, PUNCTUATION } from '../core/constants.js';

const PUNCTUATION_CHARS: ReadonlySet<string> = new Set(PUNCTUATION);

/**
 * Lowercase text and drop ASCII punctuation characters
 */
export function normalizeText(content: string): string {
	let out = '';
	for (const char of content.toLowerCase()) {
		if (!PUNCTUATION_CHARS.has(char)) out += char;
	}
	return out;
}

/**
 * Split raw text into sentences on `.`, `!` and `?`.
 * Empty fragments (including the one after trailing punctuation) are discarded.
 */
export function splitIntoSentences(content: string): string[] {
	if (!content) return [];

	return content
		.split(PATTERNS.SENTENCE_BOUNDARY)
		.map((s) => s.trim())
		.filter((s) => s.length > 0);
}

/**
 * Split normalized text into words on whitespace, keeping order and duplicates
 */
export function splitIntoWords(normalized: string): string[] {
	if (!normalized) return [];

	return normalized.split(PATTERNS.WHITESPACE).filter((w) => w.length > 0);
}

/**
 * Normalize then split - the token stream every count is taken from
 */
export function tokenize(content: string): string[] {
	return splitIntoWords(normalizeText(content));
}

/**
 * Total characters across a word list
 */
export function getCharacterCount(words: readonly string[]): number {
	return words.reduce((sum, word) => sum + word.length, 0);
}
