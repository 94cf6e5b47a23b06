import chalk from 'chalk';

/**
 * Diagnostics sink. Everything goes to stderr so stdout stays free for
 * the report itself.
 */
export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    debug(message: string): void;
}

export const consoleLogger: Logger = {
    info: (message: string) => console.error(chalk.blue(message)),
    warn: (message: string) => console.error(chalk.yellow(`⚠ ${message}`)),
    error: (message: string) => console.error(chalk.red(`✖ ${message}`)),
    debug: (message: string) => {
        if (process.env.SHCCN_DEBUG) console.error(chalk.dim(`[debug] ${message}`));
    },
};

export const silentLogger: Logger = {
    info: () => {},
    warn: () => {},
    error: () => {},
    debug: () => {},
};
