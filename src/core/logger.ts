/**
 * Centralized logging system built on winston
 */

import * as winston from 'winston';
import { isTest } from '../utils/common.js';

export type LogContext = Record<string, unknown>;

export enum LogLevel {
	DEBUG = 'debug',
	INFO = 'info',
	WARN = 'warn',
	ERROR = 'error',
}

const LEVELS: readonly string[] = Object.values(LogLevel);

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
	const lower = value?.trim().toLowerCase();
	return Object.values(LogLevel).find((level) => level === lower) ?? fallback;
}

function serializeContext(context: LogContext): string {
	const entries = Object.entries(context).map(([key, value]) => [
		key,
		value instanceof Error ? { name: value.name, message: value.message } : value,
	]);
	return entries.length ? ` ${JSON.stringify(Object.fromEntries(entries))}` : '';
}

const lineFormat = winston.format.printf(({ level, message, timestamp, label, ...rest }) => {
	const prefix = `[${String(timestamp)}] [${level.toUpperCase()}] [${String(label)}]`;
	return `${prefix} ${String(message)}${serializeContext(rest)}`;
});

function createRootLogger(): winston.Logger {
	const silent = isTest() || ['1', 'true', 'yes'].includes(process.env.LOG_SILENT ?? '');
	const transports: winston.transport[] = [
		new winston.transports.Console({
			// Keep stdout free for rendered results and JSON output
			stderrLevels: LEVELS.slice(),
			format: winston.format.combine(winston.format.timestamp(), lineFormat),
		}),
	];

	if (process.env.LOG_FILE) {
		transports.push(
			new winston.transports.File({
				filename: process.env.LOG_FILE,
				format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
			})
		);
	}

	return winston.createLogger({
		level: parseLogLevel(process.env.LOG_LEVEL),
		levels: { error: 0, warn: 1, info: 2, debug: 3 },
		silent,
		transports,
	});
}

class Logger {
	constructor(
		private readonly winstonLogger: winston.Logger,
		readonly name: string
	) {}

	debug(message: string, context: LogContext = {}): void {
		this.winstonLogger.log(LogLevel.DEBUG, message, { ...context, label: this.name });
	}

	info(message: string, context: LogContext = {}): void {
		this.winstonLogger.log(LogLevel.INFO, message, { ...context, label: this.name });
	}

	warn(message: string, context: LogContext = {}): void {
		this.winstonLogger.log(LogLevel.WARN, message, { ...context, label: this.name });
	}

	error(message: string, context: LogContext = {}): void {
		this.winstonLogger.log(LogLevel.ERROR, message, { ...context, label: this.name });
	}
}

// Logger factory
class LoggerFactory {
	private readonly root = createRootLogger();
	private loggers = new Map<string, Logger>();

	getLogger(name: string): Logger {
		let logger = this.loggers.get(name);
		if (!logger) {
			logger = new Logger(this.root, name);
			this.loggers.set(name, logger);
		}
		return logger;
	}

	setGlobalLevel(level: LogLevel): void {
		this.root.level = level;
	}
}

// Global factory instance
const factory = new LoggerFactory();

export type { Logger };

export function getLogger(name: string): Logger {
	return factory.getLogger(name);
}

export function setGlobalLogLevel(level: LogLevel): void {
	factory.setGlobalLevel(level);
}
