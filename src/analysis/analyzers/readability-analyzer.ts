/**
 * Gunning-Fog readability and supporting word statistics
 */

import { ratio } from '../../utils/common.js';
import { getCharacterCount } from '../../utils/text-metrics.js';
import { SCORING } from '../../core/constants.js';
import type { ReadabilityScore, WordClassification } from '../../types/index.js';

export interface ReadabilityInput {
	sentences: readonly string[];
	/** One entry per token, stop words included; pronouns are often stop words too */
	classified: readonly WordClassification[];
}

export type FogBand =
	| 'very easy'
	| 'easy'
	| 'fairly easy'
	| 'standard'
	| 'fairly difficult'
	| 'difficult'
	| 'very difficult';

const FOG_BANDS: ReadonlyArray<[number, FogBand]> = [
	[6, 'very easy'],
	[8, 'easy'],
	[10, 'fairly easy'],
	[12, 'standard'],
	[14, 'fairly difficult'],
	[17, 'difficult'],
];

export function describeFogIndex(fogIndex: number): FogBand {
	return FOG_BANDS.find(([limit]) => fogIndex < limit)?.[1] ?? 'very difficult';
}

/**
 * 0.4 × (average sentence length + percentage of complex words), percentage on a 0-100 scale
 */
export function computeFogIndex(averageSentenceLength: number, percentageComplexWords: number): number {
	return SCORING.FOG_WEIGHT * (averageSentenceLength + percentageComplexWords);
}

export function scoreReadability({ sentences, classified }: ReadabilityInput): ReadabilityScore {
	const words = classified.filter((w) => !w.isStopWord);
	const wordCount = words.length;
	// Floored for the average only; the record keeps the real count
	const sentenceCount = Math.max(1, sentences.length);

	const complexWordCount = words.filter((w) => w.isComplex).length;
	const syllableCount = words.reduce((sum, w) => sum + w.syllables, 0);
	const characterCount = getCharacterCount(words.map((w) => w.word));

	const averageSentenceLength = ratio(wordCount, sentenceCount);
	const percentageComplexWords = ratio(complexWordCount, wordCount) * 100;

	return {
		sentenceCount: sentences.length,
		wordCount,
		complexWordCount,
		averageSentenceLength,
		percentageComplexWords,
		fogIndex: computeFogIndex(averageSentenceLength, percentageComplexWords),
		averageWordLength: ratio(characterCount, wordCount),
		syllablesPerWord: ratio(syllableCount, wordCount),
		personalPronounCount: classified.filter((w) => w.isPersonalPronoun).length,
		stopWordCount: classified.length - wordCount,
	};
}
