import type { Lexicon, StopWordPartition } from '../../types/index.js';

/**
 * Remove stop words from a token stream, counting how many were dropped.
 * Tokens are matched lowercased against the lexicon; no stemming.
 */
export function filterStopWords(tokens: readonly string[], stopWords: Lexicon): StopWordPartition {
	const words: string[] = [];
	let stopWordCount = 0;

	for (const token of tokens) {
		if (stopWords.has(token.toLowerCase())) {
			stopWordCount++;
		} else {
			words.push(token);
		}
	}

	return { words, stopWordCount };
}
