/**
 * Lexicon-membership sentiment: polarity and subjectivity over content words
 */

import { SCORING } from '../../core/constants.js';
import type { Lexicon, SentimentLabel, SentimentScore } from '../../types/index.js';

/**
 * Map a polarity score onto a coarse label; scores within the neutral band are NEUTRAL
 */
export function labelPolarity(polarity: number): SentimentLabel {
	if (polarity > SCORING.NEUTRAL_BAND) return 'POSITIVE';
	if (polarity < -SCORING.NEUTRAL_BAND) return 'NEGATIVE';
	return 'NEUTRAL';
}

/**
 * Score content words (stop words already removed) against the positive and negative lexicons.
 * A word listed in both lexicons counts toward both scores, but only once toward subjectivity.
 */
export function scoreSentiment(
	words: readonly string[],
	positive: Lexicon,
	negative: Lexicon
): SentimentScore {
	let positiveScore = 0;
	let negativeScore = 0;
	let chargedWords = 0;

	for (const word of words) {
		const lower = word.toLowerCase();
		const isPositive = positive.has(lower);
		const isNegative = negative.has(lower);
		if (isPositive) positiveScore++;
		if (isNegative) negativeScore++;
		if (isPositive || isNegative) chargedWords++;
	}

	const polarity =
		(positiveScore - negativeScore) / (positiveScore + negativeScore + SCORING.EPSILON);
	const subjectivity = chargedWords / (words.length + SCORING.EPSILON);

	return {
		positiveScore,
		negativeScore,
		polarity,
		subjectivity,
		label: labelPolarity(polarity),
	};
}
