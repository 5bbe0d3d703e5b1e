#!/usr/bin/env node
/**
 * Command-line front end
 * Collects text (typed, from a file, or from a URL) and renders its metrics
 */

import chalk from 'chalk';
import { promises as fs } from 'fs';
import * as readline from 'readline/promises';
import { parseArgs } from 'util';
import { getConfig } from '../core/config.js';
import { getLogger, setGlobalLogLevel } from '../core/logger.js';
import { InvalidInputError, LexiconLoadError } from '../core/errors.js';
import { ERROR_MESSAGES } from '../core/constants.js';
import { describeFogIndex } from '../analysis/index.js';
import { AnalysisService, type AnalysisResult } from '../services/analysis-service.js';
import { AppError, handleError, truncate } from '../utils/common.js';
import type { AnalysisRequest, MetricsRecord } from '../types/index.js';

const logger = getLogger('cli');

export enum ExitCode {
	OK = 0,
	INVALID_INPUT = 1,
	LEXICON_ERROR = 2,
	FAILURE = 3,
}

export interface CliIO {
	stdout: (line: string) => void;
	stderr: (line: string) => void;
	prompt?: (question: string) => Promise<string>;
	readFile?: (path: string) => Promise<string>;
	color?: boolean;
}

export const USAGE = [
	'Usage: lexicon-metrics [--text <text> | --url <url> | --file <path>] [--json]',
	'',
	'With no input option the tool asks for the input type and the text or URL.',
];

const LABEL_WIDTH = 26;

/**
 * Render a metrics record as aligned, optionally coloured, lines
 */
export function formatMetrics(metrics: MetricsRecord, options: { color?: boolean } = {}): string[] {
	const c = new chalk.Instance({ level: options.color ? chalk.level : 0 });
	const row = (label: string, value: string) => `  ${label.padEnd(LABEL_WIDTH)}${value}`;
	const labelColor =
		metrics.sentimentLabel === 'POSITIVE'
			? c.green
			: metrics.sentimentLabel === 'NEGATIVE'
				? c.red
				: c.yellow;

	return [
		c.bold.cyan('Sentiment'),
		row('Label', labelColor(metrics.sentimentLabel)),
		row('Polarity', metrics.polarity.toFixed(4)),
		row('Subjectivity', metrics.subjectivity.toFixed(4)),
		row('Positive words', String(metrics.positiveScore)),
		row('Negative words', String(metrics.negativeScore)),
		'',
		c.bold.cyan('Readability'),
		row('Fog index', `${metrics.fogIndex.toFixed(2)} (${describeFogIndex(metrics.fogIndex)})`),
		row('Average sentence length', metrics.averageSentenceLength.toFixed(2)),
		row(
			'Complex words',
			`${metrics.complexWordCount} (${metrics.percentageComplexWords.toFixed(2)}%)`
		),
		row('Word count', String(metrics.wordCount)),
		row('Average word length', metrics.averageWordLength.toFixed(2)),
		row('Syllables per word', metrics.syllablesPerWord.toFixed(2)),
		row('Personal pronouns', String(metrics.personalPronounCount)),
		row('Stop words', String(metrics.stopWordCount)),
		row('Sentences', String(metrics.sentenceCount)),
	];
}

export function exitCodeFor(error: unknown): ExitCode {
	if (error instanceof InvalidInputError) return ExitCode.INVALID_INPUT;
	if (error instanceof LexiconLoadError) return ExitCode.LEXICON_ERROR;
	return ExitCode.FAILURE;
}

interface ParsedCommand {
	request?: AnalysisRequest;
	file?: string;
	json: boolean;
	help: boolean;
}

const parseOptions = (argv: readonly string[]) =>
	parseArgs({
		args: [...argv],
		options: {
			text: { type: 'string', short: 't' },
			url: { type: 'string', short: 'u' },
			file: { type: 'string', short: 'f' },
			json: { type: 'boolean', default: false },
			help: { type: 'boolean', short: 'h', default: false },
		},
		strict: true,
		allowPositionals: false,
	});

export function parseCommand(argv: readonly string[]): ParsedCommand {
	let parsed: ReturnType<typeof parseOptions>;
	try {
		parsed = parseOptions(argv);
	} catch (error) {
		throw new InvalidInputError(error instanceof Error ? error.message : String(error));
	}

	const { text, url, file, json, help } = parsed.values;
	const given = [text, url, file].filter((v) => v !== undefined).length;
	if (given > 1) {
		throw new InvalidInputError('Use only one of --text, --url or --file.');
	}

	let request: AnalysisRequest | undefined;
	if (text !== undefined) request = { kind: 'text', text };
	if (url !== undefined) request = { kind: 'url', url };

	return { request, file, json: json ?? false, help: help ?? false };
}

/**
 * Ask for the input type and then the text or URL
 */
async function promptForRequest(prompt: (question: string) => Promise<string>): Promise<AnalysisRequest> {
	const type = (await prompt('Input type - [t]ext or [u]rl: ')).trim().toLowerCase();
	if (type === 'u' || type === 'url') {
		return { kind: 'url', url: await prompt('Enter the URL of the webpage: ') };
	}
	if (type === 't' || type === 'text' || type === '') {
		return { kind: 'text', text: await prompt('Enter the text to analyze: ') };
	}
	throw new InvalidInputError(`Unknown input type "${type}". Choose text or url.`);
}

function describeError(error: AppError): string {
	if (error instanceof LexiconLoadError) {
		return `Configuration error: ${error.message}. Check LEXICON_DIR and the word list files.`;
	}
	return error.message;
}

export async function runCli(
	argv: readonly string[],
	io: CliIO,
	service: AnalysisService = new AnalysisService()
): Promise<ExitCode> {
	const c = new chalk.Instance({ level: io.color ? chalk.level : 0 });

	try {
		const command = parseCommand(argv);
		if (command.help) {
			USAGE.forEach((line) => io.stdout(line));
			return ExitCode.OK;
		}

		let request = command.request;
		const file = command.file;
		if (file !== undefined) {
			const readFile = io.readFile ?? ((p: string) => fs.readFile(p, 'utf-8'));
			const text = await readFile(file).catch((error: unknown) => {
				throw new InvalidInputError(`Could not read ${file}: ${handleError(error).message}`);
			});
			request = { kind: 'text', text };
		}
		if (!request) {
			if (!io.prompt) throw new InvalidInputError(ERROR_MESSAGES.EMPTY_TEXT);
			request = await promptForRequest(io.prompt);
		}

		const result: AnalysisResult = await service.run(request);

		if (command.json) {
			const payload = { source: result.source.source, url: result.source.url, ...result.metrics };
			io.stdout(JSON.stringify(payload, null, 2));
		} else {
			if (result.source.url) io.stdout(c.gray(`Source: ${truncate(result.source.url, 80)}`));
			formatMetrics(result.metrics, { color: io.color }).forEach((line) => io.stdout(line));
		}
		return ExitCode.OK;
	} catch (error) {
		const appError = handleError(error, 'cli');
		const code = exitCodeFor(appError);
		if (code === ExitCode.FAILURE) {
			logger.error('Analysis failed', { error: appError.toJSON() });
		}
		io.stderr(c.red(describeError(appError)));
		return code;
	}
}

async function main(): Promise<void> {
	const config = getConfig();
	setGlobalLogLevel(config.logLevel);

	const interactive = Boolean(process.stdin.isTTY);
	const rl = interactive
		? readline.createInterface({ input: process.stdin, output: process.stdout })
		: undefined;

	try {
		process.exitCode = await runCli(
			process.argv.slice(2),
			{
				stdout: (line) => console.log(line),
				stderr: (line) => console.error(line),
				prompt: rl ? (question) => rl.question(question) : undefined,
				color: Boolean(process.stdout.isTTY),
			},
			new AnalysisService({ config })
		);
	} finally {
		rl?.close();
	}
}

if (require.main === module) {
	main().catch((error: unknown) => {
		console.error(error);
		process.exitCode = ExitCode.FAILURE;
	});
}
