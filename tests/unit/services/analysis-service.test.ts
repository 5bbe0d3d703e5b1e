/**
 * Analysis service tests
 */

import { AnalysisService } from '../../../src/services/analysis-service';
import { LexiconStore } from '../../../src/services/lexicon-loader';
import { getConfig } from '../../../src/core/config';
import { InvalidInputError, LexiconLoadError } from '../../../src/core/errors';
import type { LexiconSet } from '../../../src/types';
import { buildLexicons, htmlResponse } from '../../setup';

const REVIEW = 'I love this product. It is amazing and wonderful!';

describe('AnalysisService', () => {
	let productLexicons: LexiconSet;
	let loader: jest.Mock<Promise<LexiconSet>, []>;

	beforeEach(() => {
		productLexicons = buildLexicons(['love', 'amazing', 'wonderful'], [], ['i', 'this', 'it', 'is', 'and']);
		loader = jest.fn(async () => productLexicons);
	});

	it('should analyze typed text', async () => {
		const service = new AnalysisService({ config: getConfig({}), store: new LexiconStore(loader) });

		const result = await service.run({ kind: 'text', text: `  ${REVIEW}\n` });

		expect(result.source).toEqual({ text: REVIEW, source: 'text' });
		expect(result.metrics.wordCount).toBe(4);
		expect(result.metrics.sentimentLabel).toBe('POSITIVE');
	});

	it('should analyze a fetched page', async () => {
		const fetch = jest.fn().mockResolvedValue(htmlResponse(`<html><body><p>${REVIEW}</p></body></html>`));
		const service = new AnalysisService({ config: getConfig({}), store: new LexiconStore(loader), fetch });

		const result = await service.run({ kind: 'url', url: 'https://example.com/review' });

		expect(result.source).toEqual({ text: REVIEW, source: 'url', url: 'https://example.com/review' });
		expect(result.metrics.positiveScore).toBe(3);
	});

	it('should load the lexicons once across runs', async () => {
		const service = new AnalysisService({ config: getConfig({}), store: new LexiconStore(loader) });

		await service.run({ kind: 'text', text: REVIEW });
		await service.run({ kind: 'text', text: 'Another sentence.' });

		expect(loader).toHaveBeenCalledTimes(1);
	});

	it('should report lexicon failures before fetching anything', async () => {
		const fetch = jest.fn();
		const service = new AnalysisService({
			config: getConfig({}),
			store: new LexiconStore(async () => {
				throw new LexiconLoadError('Word list not found: positive-words.txt');
			}),
			fetch,
		});

		await expect(service.run({ kind: 'url', url: 'https://example.com' })).rejects.toThrow(LexiconLoadError);
		expect(fetch).not.toHaveBeenCalled();
	});

	it('should enforce the configured text limit', async () => {
		const service = new AnalysisService({
			config: getConfig({ MAX_TEXT_LENGTH: '10' }),
			store: new LexiconStore(loader),
		});

		await expect(service.run({ kind: 'text', text: REVIEW })).rejects.toThrow(
			new InvalidInputError('The text is too long to analyze.')
		);
	});

	describe('with the bundled word lists', () => {
		it('should analyze with the default lexicon directory', async () => {
			const service = new AnalysisService({ config: getConfig({}), store: new LexiconStore() });

			const { metrics } = await service.run({ kind: 'text', text: 'This is a wonderful day.' });

			expect(metrics.positiveScore).toBe(1);
			expect(metrics.negativeScore).toBe(0);
			expect(metrics.sentimentLabel).toBe('POSITIVE');
			expect(metrics.stopWordCount).toBe(3);
			expect(metrics.wordCount).toBe(2);
			expect(metrics.sentenceCount).toBe(1);
		});

		it('should fail with a lexicon error when the directory is missing', async () => {
			const service = new AnalysisService({
				config: getConfig({ LEXICON_DIR: '/nonexistent/lexicon-metrics-words' }),
				store: new LexiconStore(),
			});

			await expect(service.lexicons()).rejects.toThrow(LexiconLoadError);
		});
	});
});
