/**
 * Analysis service
 * Wires the text source and lexicon loader around the pure metrics engine
 */

import { getLogger } from '../core/logger.js';
import { getConfig, type AppConfig } from '../core/config.js';
import { analyzeWith } from '../analysis/index.js';
import { measureExecution } from '../utils/common.js';
import type { AnalysisRequest, LexiconSet, MetricsRecord, ResolvedText } from '../types/index.js';
import { lexiconStore, type LexiconStore } from './lexicon-loader.js';
import { resolveText, type FetchLike } from './text-source.js';

const logger = getLogger('analysis-service');

export interface AnalysisResult {
	source: ResolvedText;
	metrics: MetricsRecord;
}

export interface AnalysisServiceOptions {
	config?: Readonly<AppConfig>;
	store?: LexiconStore;
	fetch?: FetchLike;
}

export class AnalysisService {
	private readonly config: Readonly<AppConfig>;
	private readonly store: LexiconStore;
	private readonly fetch?: FetchLike;

	constructor(options: AnalysisServiceOptions = {}) {
		this.config = options.config ?? getConfig();
		this.store = options.store ?? lexiconStore;
		this.fetch = options.fetch;
	}

	/**
	 * Load (or reuse) the configured lexicons; failures surface as LexiconLoadError
	 */
	lexicons(): Promise<LexiconSet> {
		return this.store.load(this.config);
	}

	async run(request: AnalysisRequest): Promise<AnalysisResult> {
		// Load word lists first so a configuration problem is reported before any fetch
		const lexicons = await this.lexicons();
		const source = await resolveText(request, { ...this.config, fetch: this.fetch });

		const { result: metrics, ms } = await measureExecution(async () =>
			analyzeWith(source.text, lexicons)
		);

		logger.debug('Analysis complete', {
			source: source.source,
			characters: source.text.length,
			words: metrics.wordCount,
			ms,
		});

		return { source, metrics };
	}
}
