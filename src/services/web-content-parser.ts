/**
 * Web Content Parser
 * Reduces an HTML page to its readable text using Cheerio
 */

import * as cheerio from 'cheerio';

const NON_CONTENT_SELECTOR = 'head, script, style, noscript, template, svg, iframe, object, canvas';

const BLOCK_SELECTOR = [
	'address',
	'article',
	'aside',
	'blockquote',
	'dd',
	'div',
	'dl',
	'dt',
	'figcaption',
	'footer',
	'form',
	'h1',
	'h2',
	'h3',
	'h4',
	'h5',
	'h6',
	'header',
	'li',
	'main',
	'nav',
	'ol',
	'p',
	'pre',
	'section',
	'table',
	'td',
	'th',
	'tr',
	'ul',
].join(', ');

export interface ParsedPage {
	title?: string;
	text: string;
	lineCount: number;
}

export class WebContentParser {
	/**
	 * Parse HTML and return its visible text, one block per line
	 */
	parse(html: string): ParsedPage {
		const $ = cheerio.load(html);

		const title = $('title').first().text().trim() || undefined;

		$(NON_CONTENT_SELECTOR).remove();

		// Mark block boundaries so adjacent blocks do not run together
		$('br').replaceWith('\n');
		$(BLOCK_SELECTOR).each((_, element) => {
			$(element).prepend('\n').append('\n');
		});

		const lines = $.root()
			.text()
			.split('\n')
			.map((line) => line.replace(/\s+/g, ' ').trim())
			.filter((line) => line.length > 0);

		return { title, text: lines.join('\n'), lineCount: lines.length };
	}

	extractText(html: string): string {
		return this.parse(html).text;
	}
}

export const webContentParser = new WebContentParser();
