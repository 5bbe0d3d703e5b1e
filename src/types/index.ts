/**
 * Shared types for the metrics engine and its collaborators
 */

/** An immutable set of lowercase words */
export type Lexicon = ReadonlySet<string>;

export interface LexiconSet {
	readonly positive: Lexicon;
	readonly negative: Lexicon;
	readonly stopWords: Lexicon;
}

export type SentimentLabel = 'POSITIVE' | 'NEGATIVE' | 'NEUTRAL';

/** Per-token facts, computed fresh on every call */
export interface WordClassification {
	readonly word: string;
	readonly syllables: number;
	readonly isComplex: boolean;
	readonly isStopWord: boolean;
	readonly isPersonalPronoun: boolean;
}

export interface StopWordPartition {
	readonly words: readonly string[];
	readonly stopWordCount: number;
}

export interface SentimentScore {
	readonly positiveScore: number;
	readonly negativeScore: number;
	readonly polarity: number;
	readonly subjectivity: number;
	readonly label: SentimentLabel;
}

export interface ReadabilityScore {
	readonly sentenceCount: number;
	readonly wordCount: number;
	readonly complexWordCount: number;
	readonly averageSentenceLength: number;
	readonly percentageComplexWords: number;
	readonly fogIndex: number;
	readonly averageWordLength: number;
	readonly syllablesPerWord: number;
	readonly personalPronounCount: number;
	readonly stopWordCount: number;
}

/** The engine's only output; every field is produced together */
export interface MetricsRecord {
	readonly polarity: number;
	readonly subjectivity: number;
	readonly sentimentLabel: SentimentLabel;
	readonly positiveScore: number;
	readonly negativeScore: number;
	readonly fogIndex: number;
	readonly averageSentenceLength: number;
	readonly percentageComplexWords: number;
	readonly complexWordCount: number;
	/** Content words, after stop-word removal */
	readonly wordCount: number;
	readonly averageWordLength: number;
	readonly syllablesPerWord: number;
	readonly personalPronounCount: number;
	readonly stopWordCount: number;
	readonly sentenceCount: number;
	/** Every token, before stop-word removal */
	readonly tokenCount: number;
}

export type AnalysisRequest = { kind: 'text'; text: string } | { kind: 'url'; url: string };

export interface ResolvedText {
	readonly text: string;
	readonly source: 'text' | 'url';
	readonly url?: string;
}
