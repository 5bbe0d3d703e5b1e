/**
 * Analysis module exports
 */

export * from './analyzers/index.js';
export {
	normalizeText,
	splitIntoSentences,
	splitIntoWords,
	tokenize,
} from '../utils/text-metrics.js';
