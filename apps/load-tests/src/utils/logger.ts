import type { ILogger } from "@homeserver-loadgen/core";
import chalk from "chalk";

export interface ConsoleLoggerOptions {
	/** Print debug lines too. */
	verbose?: boolean;
}

/**
 * Logger printing `[tag] message` lines to the console.
 */
export function createLogger(tag: string, options: ConsoleLoggerOptions = {}): ILogger {
	const prefix = `[${tag}]`;
	return {
		debug: (message) => {
			if (options.verbose) console.log(chalk.gray(`${prefix} ${message}`));
		},
		info: (message) => console.log(`${chalk.cyan(prefix)} ${message}`),
		warn: (message) => console.log(chalk.yellow(`${prefix} ${message}`)),
		error: (message) => console.error(chalk.red(`${prefix} ${message}`)),
	};
}
