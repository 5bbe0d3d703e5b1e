import { splitIntoSentences, tokenize } from '../../utils/text-metrics.js';
import type {
	Lexicon,
	LexiconSet,
	MetricsRecord,
	ReadabilityScore,
	SentimentScore,
} from '../../types/index.js';
import { filterStopWords } from './stop-word-filter.js';
import { scoreSentiment } from './sentiment-analyzer.js';
import { scoreReadability } from './readability-analyzer.js';
import { classifyWord } from './word-classifier.js';

/**
 * Merge the sentiment and readability results into one frozen record
 */
export function assembleMetrics(
	sentiment: SentimentScore,
	readability: ReadabilityScore,
	tokenCount: number
): MetricsRecord {
	return Object.freeze({
		polarity: sentiment.polarity,
		subjectivity: sentiment.subjectivity,
		sentimentLabel: sentiment.label,
		positiveScore: sentiment.positiveScore,
		negativeScore: sentiment.negativeScore,
		fogIndex: readability.fogIndex,
		averageSentenceLength: readability.averageSentenceLength,
		percentageComplexWords: readability.percentageComplexWords,
		complexWordCount: readability.complexWordCount,
		wordCount: readability.wordCount,
		averageWordLength: readability.averageWordLength,
		syllablesPerWord: readability.syllablesPerWord,
		personalPronounCount: readability.personalPronounCount,
		stopWordCount: readability.stopWordCount,
		sentenceCount: readability.sentenceCount,
		tokenCount,
	});
}

/**
 * Compute sentiment and readability metrics for a block of text.
 *
 * Synchronous and pure: the lexicons are only read, nothing is cached between calls,
 * and identical inputs always give identical records. Empty text and empty lexicons
 * are legal and produce zeros.
 */
export function analyze(
	text: string,
	positive: Lexicon,
	negative: Lexicon,
	stopWords: Lexicon
): MetricsRecord {
	const tokens = tokenize(text);
	const sentences = splitIntoSentences(text);
	const classified = tokens.map((token) => classifyWord(token, stopWords));
	const { words } = filterStopWords(tokens, stopWords);

	const sentiment = scoreSentiment(words, positive, negative);
	const readability = scoreReadability({ sentences, classified });

	return assembleMetrics(sentiment, readability, tokens.length);
}

/**
 * Convenience overload taking the three lexicons as one set
 */
export function analyzeWith(text: string, lexicons: LexiconSet): MetricsRecord {
	return analyze(text, lexicons.positive, lexicons.negative, lexicons.stopWords);
}
