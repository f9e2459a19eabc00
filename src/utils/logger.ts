/**
 * Logger utility
 * Chalk-based colored output on stderr, so stdout only ever carries tokens and response bodies
 */

import chalk from 'chalk';

const write = (...parts: string[]) => console.error(...parts);

export const log = {
    info: (msg: string) => write(chalk.blue('ℹ'), msg),
    success: (msg: string) => write(chalk.green('✔'), msg),
    warn: (msg: string) => write(chalk.yellow('⚠'), msg),
    error: (msg: string) => write(chalk.red('✖'), msg),
    dim: (msg: string) => write(chalk.dim(msg)),
    bold: (msg: string) => write(chalk.bold(msg)),

    /**
     * Structured auth failure line. Never pass token material in `msg`.
     */
    authFailure: (kind: string, audience: string, msg: string) => {
        write(
            chalk.dim(`[${new Date().toISOString()}]`),
            chalk.red.bold(kind),
            chalk.dim(`audience=${audience}`),
            msg
        );
    },

    // Section header
    header: (title: string) => {
        write();
        write(chalk.bold.underline(title));
        write();
    },

    // Key-value pair
    kv: (key: string, value: string | number | boolean) => {
        write(`  ${chalk.dim(key + ':')} ${value}`);
    },
};
