/**
 * Vowel-group syllable heuristic and the complex-word rule built on it.
 * Irregular spellings are under- or over-counted; the Fog Index it feeds is approximate anyway.
 */

import { normalizeText } from '../../utils/text-metrics.js';
import { INFLECTIONAL_SUFFIXES, SCORING, VOWELS } from '../../core/constants.js';

const isVowel = (char: string): boolean => VOWELS.has(char);

const isConsonant = (char: string | undefined): boolean =>
	char !== undefined && char >= 'a' && char <= 'z' && !isVowel(char);

/** Number of maximal runs of vowels */
function countVowelGroups(word: string): number {
	let groups = 0;
	let inGroup = false;

	for (const char of word) {
		if (isVowel(char)) {
			if (!inGroup) groups++;
			inGroup = true;
		} else {
			inGroup = false;
		}
	}

	return groups;
}

/** Final `e` preceded by a consonant, excluding `-le` */
function hasSilentE(word: string): boolean {
	return word.endsWith('e') && !word.endsWith('le') && isConsonant(word.at(-2));
}

/**
 * Estimate syllables in a single word. Returns at least 1 for any word
 * with letters left after normalization, and 0 only for an empty word.
 */
export function estimateSyllables(rawWord: string): number {
	const word = normalizeText(rawWord).trim();
	if (!word) return 0;

	let count = countVowelGroups(word);
	if (count > 1 && hasSilentE(word)) count--;

	return Math.max(1, count);
}

/**
 * Strip one inflectional ending (-es, -ed, -ing), if present and not the whole word
 */
export function stripInflection(word: string): string {
	const suffix = INFLECTIONAL_SUFFIXES.find((s) => word.length > s.length && word.endsWith(s));
	return suffix ? word.slice(0, -suffix.length) : word;
}

/**
 * A word is complex when it has three or more syllables once an
 * inflectional ending has been removed ("created" is not, "sophisticated" is).
 */
export function isComplexWord(rawWord: string): boolean {
	const word = normalizeText(rawWord).trim();
	return estimateSyllables(stripInflection(word)) >= SCORING.COMPLEX_SYLLABLE_THRESHOLD;
}
