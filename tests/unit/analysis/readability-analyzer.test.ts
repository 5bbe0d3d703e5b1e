/**
 * Fog Index and word statistics
 */

import {
	computeFogIndex,
	describeFogIndex,
	scoreReadability,
} from '../../../src/analysis/analyzers/readability-analyzer';
import { classifyWord, isPersonalPronoun } from '../../../src/analysis/analyzers/word-classifier';
import { createLexicon } from '../../../src/services/lexicon-loader';

const classify = (tokens: string[], stopWords: string[] = []) => {
	const lexicon = createLexicon(stopWords);
	return tokens.map((token) => classifyWord(token, lexicon));
};

describe('computeFogIndex', () => {
	it('should apply 0.4 x (sentence length + complex percentage)', () => {
		expect(computeFogIndex(2, 25)).toBeCloseTo(10.8, 10);
		expect(computeFogIndex(0, 0)).toBe(0);
	});
});

describe('describeFogIndex', () => {
	it.each([
		[0, 'very easy'],
		[7.9, 'easy'],
		[9, 'fairly easy'],
		[12, 'fairly difficult'],
		[16.99, 'difficult'],
		[17, 'very difficult'],
	])('should describe %d as %s', (fog, band) => {
		expect(describeFogIndex(fog)).toBe(band);
	});
});

describe('scoreReadability', () => {
	it('should compute every statistic over content words', () => {
		const score = scoreReadability({
			sentences: ['I love this product', 'It is amazing and wonderful'],
			classified: classify(
				['i', 'love', 'this', 'product', 'it', 'is', 'amazing', 'and', 'wonderful'],
				['i', 'this', 'it', 'is', 'and']
			),
		});

		expect(score).toEqual({
			sentenceCount: 2,
			wordCount: 4,
			complexWordCount: 1,
			averageSentenceLength: 2,
			percentageComplexWords: 25,
			fogIndex: expect.closeTo(10.8, 10),
			averageWordLength: 6.75,
			syllablesPerWord: 2.25,
			personalPronounCount: 2,
			stopWordCount: 5,
		});
	});

	it('should return zeros for no words and no sentences', () => {
		const score = scoreReadability({ sentences: [], classified: [] });

		expect(score.sentenceCount).toBe(0);
		expect(score.averageSentenceLength).toBe(0);
		expect(score.percentageComplexWords).toBe(0);
		expect(score.fogIndex).toBe(0);
		expect(score.averageWordLength).toBe(0);
		expect(score.syllablesPerWord).toBe(0);
	});

	it('should floor the sentence count at one for the average only', () => {
		const score = scoreReadability({
			sentences: [],
			classified: classify(['alpha', 'beta', 'gamma']),
		});

		expect(score.sentenceCount).toBe(0);
		expect(score.averageSentenceLength).toBe(3);
	});

	it('should count pronouns among stop-word tokens', () => {
		const score = scoreReadability({
			sentences: ['They told us about it'],
			classified: classify(['they', 'told', 'us', 'about', 'it'], ['they', 'us', 'about', 'it']),
		});

		expect(score.personalPronounCount).toBe(3);
		expect(score.stopWordCount).toBe(4);
		expect(score.wordCount).toBe(1);
	});
});

describe('isPersonalPronoun', () => {
	it('should match whole pronouns only', () => {
		expect(isPersonalPronoun('They')).toBe(true);
		expect(isPersonalPronoun('theirs')).toBe(true);
		expect(isPersonalPronoun('item')).toBe(false);
		expect(isPersonalPronoun('hello')).toBe(false);
	});
});

describe('classifyWord', () => {
	it('should gather the per-word facts', () => {
		expect(classifyWord('wonderful', createLexicon(['wonderful']))).toEqual({
			word: 'wonderful',
			syllables: 3,
			isComplex: true,
			isStopWord: true,
			isPersonalPronoun: false,
		});
	});

	it('should flag a pronoun that is also a stop word', () => {
		expect(classifyWord('it', createLexicon(['it', 'is']))).toEqual({
			word: 'it',
			syllables: 1,
			isComplex: false,
			isStopWord: true,
			isPersonalPronoun: true,
		});
	});

	it('should flag a pronoun that is not a stop word', () => {
		expect(classifyWord('they', createLexicon(['it', 'is']))).toMatchObject({
			isStopWord: false,
			isPersonalPronoun: true,
		});
	});

	it('should leave content words unflagged', () => {
		expect(classifyWord('good', createLexicon(['it', 'is']))).toMatchObject({
			isStopWord: false,
			isPersonalPronoun: false,
		});
	});
});
