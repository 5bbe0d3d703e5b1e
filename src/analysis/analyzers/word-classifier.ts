import { PERSONAL_PRONOUNS } from '../../core/constants.js';
import type { Lexicon, WordClassification } from '../../types/index.js';
import { estimateSyllables, isComplexWord } from './syllable-estimator.js';

/** Whole-word, case-insensitive match against the closed pronoun set */
export function isPersonalPronoun(token: string): boolean {
	return PERSONAL_PRONOUNS.has(token.toLowerCase());
}

export function classifyWord(word: string, stopWords: Lexicon): WordClassification {
	return {
		word,
		syllables: estimateSyllables(word),
		isComplex: isComplexWord(word),
		isStopWord: stopWords.has(word.toLowerCase()),
		isPersonalPronoun: isPersonalPronoun(word),
	};
}
