/**
 * Lexicon-based sentiment and readability metrics
 */

export {
	analyze,
	analyzeWith,
	assembleMetrics,
	classifyWord,
	computeFogIndex,
	describeFogIndex,
	estimateSyllables,
	filterStopWords,
	isComplexWord,
	isPersonalPronoun,
	labelPolarity,
	normalizeText,
	scoreReadability,
	scoreSentiment,
	splitIntoSentences,
	splitIntoWords,
	stripInflection,
	tokenize,
	type FogBand,
	type ReadabilityInput,
} from './analysis/index.js';

export {
	createLexicon,
	decodeWithFallback,
	lexiconStore,
	LexiconStore,
	loadLexicons,
	loadWordList,
	parseWordList,
	type LexiconSources,
} from './services/lexicon-loader.js';
export { fetchPageText, resolveText, type TextSourceOptions } from './services/text-source.js';
export { WebContentParser, type ParsedPage } from './services/web-content-parser.js';
export { AnalysisService, type AnalysisResult } from './services/analysis-service.js';

export { getConfig, type AppConfig } from './core/config.js';
export {
	AppError,
	ErrorCode,
	InvalidInputError,
	LexiconLoadError,
	TextFetchError,
} from './core/errors.js';
export { getLogger, setGlobalLogLevel, LogLevel } from './core/logger.js';

export type * from './types/index.js';
