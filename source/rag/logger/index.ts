import fs from 'node:fs';
import path from 'node:path';
import {getLogsDir} from '../constants.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
	debug(component: string, message: string, data?: object): void;
	info(component: string, message: string, data?: object): void;
	warn(component: string, message: string, data?: object): void;
	error(component: string, message: string, error?: Error): void;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function severity(level: LogLevel): number {
	return LEVELS.indexOf(level);
}

/**
 * Path of the log file for a day (UTC), `.coderecall/logs/YYYY-MM-DD.log`.
 */
export function getLogPath(projectRoot: string, now: Date = new Date()): string {
	return path.join(getLogsDir(projectRoot), `${now.toISOString().slice(0, 10)}.log`);
}

/**
 * Header line `[timestamp] [LEVEL] Component: message`, then an indented
 * line with the data as JSON, or the error message and stack.
 */
export function formatEntry(
	level: LogLevel,
	component: string,
	message: string,
	extra?: object | Error,
): string {
	const header = `[${new Date().toISOString()}] [${level.toUpperCase().padEnd(5)}] ${component}: ${message}`;
	if (!extra) return header;

	if (extra instanceof Error) {
		const stack = extra.stack ? `\n  Stack: ${extra.stack}` : '';
		return `${header}\n  Error: ${extra.message}${stack}`;
	}
	return `${header}\n  ${JSON.stringify(extra)}`;
}

export interface LoggerOptions {
	/** Entries below this level are dropped (default: debug) */
	minLevel?: LogLevel;
	/** Also print warnings to stderr as `warning: Component: message` */
	echoWarnings?: boolean;
}

/**
 * Logger appending to the project's daily log file. The logs directory is
 * created on the first entry written.
 */
export function createLogger(
	projectRoot: string,
	options: LoggerOptions = {},
): Logger {
	const minSeverity = severity(options.minLevel ?? 'debug');
	let dirReady = false;

	const log = (
		level: LogLevel,
		component: string,
		message: string,
		extra?: object | Error,
	) => {
		if (severity(level) < minSeverity) return;
		if (!dirReady) {
			fs.mkdirSync(getLogsDir(projectRoot), {recursive: true});
			dirReady = true;
		}
		fs.appendFileSync(
			getLogPath(projectRoot),
			formatEntry(level, component, message, extra) + '\n',
		);
		if (level === 'warn' && options.echoWarnings) {
			process.stderr.write(`warning: ${component}: ${message}\n`);
		}
	};

	return {
		debug: (component, message, data) => log('debug', component, message, data),
		info: (component, message, data) => log('info', component, message, data),
		warn: (component, message, data) => log('warn', component, message, data),
		error: (component, message, error) => log('error', component, message, error),
	};
}

/**
 * Logger that discards everything.
 */
export function createNullLogger(): Logger {
	return {
		debug() {},
		info() {},
		warn() {},
		error() {},
	};
}
