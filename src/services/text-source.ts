/**
 * Text source: turns user input or a web page into the plain text the engine analyzes
 */

import { getLogger } from '../core/logger.js';
import { InvalidInputError, TextFetchError } from '../core/errors.js';
import { ERROR_MESSAGES, LIMITS, TEXT_CONTENT_TYPES } from '../core/constants.js';
import { analysisRequestSchemas, sanitizeString, validate } from '../core/validation.js';
import { AppError, retry } from '../utils/common.js';
import type { AppConfig } from '../core/config.js';
import type { AnalysisRequest, ResolvedText } from '../types/index.js';
import { webContentParser, type WebContentParser } from './web-content-parser.js';

const logger = getLogger('text-source');

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type TextSourceOptions = Pick<
	AppConfig,
	'maxTextLength' | 'fetchTimeoutMs' | 'fetchRetries' | 'userAgent'
> & {
	fetch?: FetchLike;
	parser?: WebContentParser;
	retryDelayMs?: number;
};

function mediaType(contentType: string | null): string {
	return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

function isTextMediaType(type: string): boolean {
	return TEXT_CONTENT_TYPES.some((accepted) => accepted === type);
}

/** Release the connection behind a response whose body will not be read */
async function discardBody(res: Response): Promise<void> {
	await res.body?.cancel();
}

function describeFailure(error: unknown): string {
	if (error instanceof Error && error.name === 'TimeoutError') return 'request timed out';
	return error instanceof Error ? error.message : String(error);
}

/**
 * Download a page and reduce it to text. Network failures and 5xx responses are retried;
 * 4xx responses and non-text content are not.
 */
export async function fetchPageText(url: string, options: TextSourceOptions): Promise<string> {
	const schema = analysisRequestSchemas(options.maxTextLength).url;
	const { valid } = validate({ url }, schema, false);
	if (!valid) throw new InvalidInputError(ERROR_MESSAGES.INVALID_URL, { url });

	const doFetch: FetchLike = options.fetch ?? fetch;
	const parser = options.parser ?? webContentParser;

	const response = await retry(
		async () => {
			let res: Response;
			try {
				res = await doFetch(url, {
					headers: { 'User-Agent': options.userAgent },
					signal: AbortSignal.timeout(options.fetchTimeoutMs),
					redirect: 'follow',
				});
			} catch (error) {
				throw new TextFetchError(
					`${ERROR_MESSAGES.FETCH_FAILED}: ${describeFailure(error)}`,
					{ url },
					true
				);
			}

			if (!res.ok) {
				await discardBody(res);
				throw new TextFetchError(
					`${ERROR_MESSAGES.FETCH_FAILED}: HTTP ${res.status}`,
					{ url, status: res.status },
					res.status >= 500,
					res.status
				);
			}
			return res;
		},
		{
			maxAttempts: options.fetchRetries + 1,
			initialDelay: options.retryDelayMs ?? LIMITS.RETRY_DELAY,
			onRetry: (attempt, error) =>
				logger.warn('Retrying page fetch', {
					url,
					attempt,
					reason: error instanceof Error ? error.message : String(error),
				}),
		}
	);

	const type = mediaType(response.headers.get('content-type'));
	if (type && !isTextMediaType(type)) {
		await discardBody(response);
		throw new InvalidInputError(ERROR_MESSAGES.UNSUPPORTED_CONTENT, { url, contentType: type });
	}

	const body = await response.text();
	const text = type === 'text/plain' ? body : parser.extractText(body);

	logger.debug('Fetched page text', { url, contentType: type, characters: text.length });
	return text;
}

/**
 * Resolve an analysis request into validated text, enforcing the size cap before analysis
 */
export async function resolveText(
	request: AnalysisRequest,
	options: TextSourceOptions
): Promise<ResolvedText> {
	if (request.kind === 'text') {
		const text = sanitizeString(request.text);
		if (!text) throw new InvalidInputError(ERROR_MESSAGES.EMPTY_TEXT);
		assertWithinLimit(text, options.maxTextLength);
		return { text, source: 'text' };
	}

	const url = request.url.trim();
	if (!url) throw new InvalidInputError(ERROR_MESSAGES.EMPTY_URL);

	let text: string;
	try {
		text = sanitizeString(await fetchPageText(url, options));
	} catch (error) {
		if (error instanceof TextFetchError) {
			// Surface exhausted fetches to the user as bad input they can correct
			throw new InvalidInputError(error.message, error.toJSON());
		}
		throw error;
	}

	if (!text) throw new InvalidInputError(ERROR_MESSAGES.NO_PAGE_TEXT, { url });
	assertWithinLimit(text, options.maxTextLength);
	return { text, source: 'url', url };
}

function assertWithinLimit(text: string, maxTextLength: number): void {
	const schema = analysisRequestSchemas(maxTextLength).text;
	try {
		validate({ text }, schema);
	} catch (error) {
		if (error instanceof AppError) {
			throw new InvalidInputError(ERROR_MESSAGES.TEXT_TOO_LONG, {
				length: text.length,
				maxTextLength,
			});
		}
		throw error;
	}
}
