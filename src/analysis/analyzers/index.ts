// Export all analyzer functions and types
export { analyze, analyzeWith, assembleMetrics } from './metrics-analyzer.js';
export { scoreSentiment, labelPolarity } from './sentiment-analyzer.js';
export {
	scoreReadability,
	computeFogIndex,
	describeFogIndex,
	type FogBand,
	type ReadabilityInput,
} from './readability-analyzer.js';
export { filterStopWords } from './stop-word-filter.js';
export { estimateSyllables, isComplexWord, stripInflection } from './syllable-estimator.js';
export { classifyWord, isPersonalPronoun } from './word-classifier.js';
