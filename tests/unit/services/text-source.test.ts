/**
 * Text source resolution: direct text and web pages
 */

import { fetchPageText, resolveText, type TextSourceOptions } from '../../../src/services/text-source';
import { InvalidInputError, TextFetchError } from '../../../src/core/errors';
import { htmlResponse } from '../../setup';

const baseOptions = (overrides: Partial<TextSourceOptions> = {}): TextSourceOptions => ({
	maxTextLength: 1000,
	fetchTimeoutMs: 1000,
	fetchRetries: 2,
	userAgent: 'test-agent',
	retryDelayMs: 1,
	...overrides,
});

function spyOnBodyCancel(response: Response): jest.SpyInstance {
	const { body } = response;
	if (!body) throw new Error('response has no body');
	return jest.spyOn(body, 'cancel');
}

describe('resolveText', () => {
	it('should accept direct text', async () => {
		await expect(resolveText({ kind: 'text', text: '  Plain words.  ' }, baseOptions())).resolves.toEqual({
			text: 'Plain words.',
			source: 'text',
		});
	});

	it('should reject empty text with a corrective message', async () => {
		await expect(resolveText({ kind: 'text', text: '   ' }, baseOptions())).rejects.toThrow(
			new InvalidInputError('Please enter text to analyze.')
		);
	});

	it('should reject an empty URL', async () => {
		await expect(resolveText({ kind: 'url', url: '' }, baseOptions())).rejects.toThrow(
			'Please enter a URL.'
		);
	});

	it('should reject text above the size cap', async () => {
		const error = await resolveText({ kind: 'text', text: 'x'.repeat(11) }, baseOptions({ maxTextLength: 10 })).catch(
			(e: unknown) => e
		);

		expect(error).toBeInstanceOf(InvalidInputError);
		expect(error).toMatchObject({
			message: 'The text is too long to analyze.',
			details: { length: 11, maxTextLength: 10 },
		});
	});

	it('should resolve a URL to its page text', async () => {
		const fetch = jest.fn().mockResolvedValue(htmlResponse('<p>Great product.</p><p>Works well!</p>'));

		await expect(
			resolveText({ kind: 'url', url: 'https://example.com/review' }, baseOptions({ fetch }))
		).resolves.toEqual({
			text: 'Great product.\nWorks well!',
			source: 'url',
			url: 'https://example.com/review',
		});
	});

	it('should reject pages without readable text', async () => {
		const fetch = jest.fn().mockResolvedValue(htmlResponse('<script>only()</script>'));

		await expect(
			resolveText({ kind: 'url', url: 'https://example.com' }, baseOptions({ fetch }))
		).rejects.toThrow('No readable text was found at that URL.');
	});

	it('should turn exhausted fetches into input errors', async () => {
		const fetch = jest.fn().mockResolvedValue(htmlResponse('gone', 404));

		const error = await resolveText({ kind: 'url', url: 'https://example.com/missing' }, baseOptions({ fetch })).catch(
			(e: unknown) => e
		);

		expect(error).toBeInstanceOf(InvalidInputError);
		expect(error).toMatchObject({ message: 'Error fetching URL: HTTP 404' });
	});
});

describe('fetchPageText', () => {
	it('should send the configured user agent', async () => {
		const fetch = jest.fn().mockResolvedValue(htmlResponse('<p>Hi</p>'));

		await fetchPageText('https://example.com', baseOptions({ fetch }));

		expect(fetch).toHaveBeenCalledTimes(1);
		expect(fetch.mock.calls[0][0]).toBe('https://example.com');
		expect(fetch.mock.calls[0][1]).toMatchObject({ headers: { 'User-Agent': 'test-agent' } });
	});

	it('should return plain text bodies unchanged', async () => {
		const fetch = jest.fn().mockResolvedValue(htmlResponse('<not html>', 200, 'text/plain'));

		await expect(fetchPageText('https://example.com/a.txt', baseOptions({ fetch }))).resolves.toBe('<not html>');
	});

	it('should reject non-text content types without retrying', async () => {
		const fetch = jest.fn().mockResolvedValue(htmlResponse('%PDF', 200, 'application/pdf'));

		await expect(fetchPageText('https://example.com/a.pdf', baseOptions({ fetch }))).rejects.toThrow(
			new InvalidInputError('The URL does not point to a text or HTML page.')
		);
		expect(fetch).toHaveBeenCalledTimes(1);
	});

	it('should reject malformed and non-http URLs before fetching', async () => {
		const fetch = jest.fn();

		await expect(fetchPageText('not a url', baseOptions({ fetch }))).rejects.toBeInstanceOf(InvalidInputError);
		await expect(fetchPageText('ftp://example.com/file', baseOptions({ fetch }))).rejects.toBeInstanceOf(
			InvalidInputError
		);
		expect(fetch).not.toHaveBeenCalled();
	});

	it('should retry network failures and server errors', async () => {
		const fetch = jest
			.fn()
			.mockRejectedValueOnce(new TypeError('fetch failed'))
			.mockResolvedValueOnce(htmlResponse('busy', 503))
			.mockResolvedValueOnce(htmlResponse('<p>Recovered</p>'));

		await expect(fetchPageText('https://example.com', baseOptions({ fetch }))).resolves.toBe('Recovered');
		expect(fetch).toHaveBeenCalledTimes(3);
	});

	it('should give up after the configured retries', async () => {
		const fetch = jest.fn().mockRejectedValue(new TypeError('fetch failed'));

		const error = await fetchPageText('https://example.com', baseOptions({ fetch, fetchRetries: 1 })).catch(
			(e: unknown) => e
		);

		expect(error).toBeInstanceOf(TextFetchError);
		expect(error).toMatchObject({ message: 'Error fetching URL: fetch failed', isRetryable: true });
		expect(fetch).toHaveBeenCalledTimes(2);
	});

	it('should not retry client errors', async () => {
		const fetch = jest.fn().mockResolvedValue(htmlResponse('nope', 403));

		await expect(fetchPageText('https://example.com', baseOptions({ fetch }))).rejects.toMatchObject({
			statusCode: 403,
			isRetryable: false,
		});
		expect(fetch).toHaveBeenCalledTimes(1);
	});

	it('should cancel the body of a failed response before retrying', async () => {
		const busy = htmlResponse('busy', 503);
		const cancel = spyOnBodyCancel(busy);
		const fetch = jest.fn().mockResolvedValueOnce(busy).mockResolvedValueOnce(htmlResponse('<p>Back</p>'));

		await expect(fetchPageText('https://example.com', baseOptions({ fetch }))).resolves.toBe('Back');
		expect(cancel).toHaveBeenCalledTimes(1);
	});

	it('should cancel the body of a rejected content type', async () => {
		const pdf = htmlResponse('%PDF', 200, 'application/pdf');
		const cancel = spyOnBodyCancel(pdf);
		const fetch = jest.fn().mockResolvedValue(pdf);

		await expect(fetchPageText('https://example.com/a.pdf', baseOptions({ fetch }))).rejects.toBeInstanceOf(
			InvalidInputError
		);
		expect(cancel).toHaveBeenCalledTimes(1);
	});

	it('should use the global fetch by default', async () => {
		const spy = jest.spyOn(global, 'fetch').mockResolvedValue(htmlResponse('<p>Global</p>'));

		try {
			await expect(fetchPageText('https://example.com', baseOptions())).resolves.toBe('Global');
			expect(spy).toHaveBeenCalledTimes(1);
		} finally {
			spy.mockRestore();
		}
	});
});
