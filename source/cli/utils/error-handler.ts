/**
 * CLI Error Handler
 *
 * Logs command failures to:
 * - Console (stderr) - one line for expected errors, full stack otherwise
 * - .coderecall/logs/ - persistent daily log when the project has one
 */

import chalk from 'chalk';
import {
	ArtifactFormatError,
	ConfigError,
	createLogger,
	toError,
	type Logger,
} from '../../rag/index.js';

/**
 * Create a CLI logger for the given project root.
 * Writes info and above to .coderecall/logs/YYYY-MM-DD.log and echoes
 * warnings to stderr.
 */
export function createCliLogger(projectRoot: string): Logger {
	return createLogger(projectRoot, {minLevel: 'info', echoWarnings: true});
}

/**
 * Errors caused by user input, shown without a stack trace.
 */
export function isExpectedError(error: unknown): boolean {
	return error instanceof ConfigError || error instanceof ArtifactFormatError;
}

/**
 * Report a command failure on stderr and in the log file.
 */
export function handleCliError(
	component: string,
	error: unknown,
	logger?: Logger | null,
): void {
	const failure = toError(error);

	if (isExpectedError(failure)) {
		console.error(chalk.red(`${failure.name}: ${failure.message}`));
	} else {
		console.error(chalk.red(`[cli] ${component}:`), failure);
	}

	logger?.error(component, failure.message, failure);
}
