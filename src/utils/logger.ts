/**
 * Logger utility
 * Chalk-based colored console output
 *
 * `log` is user-facing CLI output on stdout. `createLogger` is the diagnostic
 * logger used inside the library; it writes to stderr so the MCP stdio channel
 * and CLI output stay clean.
 */

import chalk from 'chalk';

export const log = {
    info: (msg: string) => console.log(chalk.blue('ℹ'), msg),
    success: (msg: string) => console.log(chalk.green('✔'), msg),
    warn: (msg: string) => console.log(chalk.yellow('⚠'), msg),
    error: (msg: string) => console.error(chalk.red('✖'), msg),
    dim: (msg: string) => console.log(chalk.dim(msg)),
    bold: (msg: string) => console.log(chalk.bold(msg)),

    // Section header
    header: (title: string) => {
        console.log();
        console.log(chalk.bold.underline(title));
        console.log();
    },

    // Key-value pair
    kv: (key: string, value: string | number | boolean) => {
        console.log(`  ${chalk.dim(key + ':')} ${value}`);
    },
};

// ── Diagnostic logger ───────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export interface Logger {
    debug(msg: string): void;
    info(msg: string): void;
    warn(msg: string): void;
    error(msg: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

/**
 * Threshold from MAGIO_LOG_LEVEL, read on every call so tests and the CLI
 * `--verbose` flag can change it at runtime.
 */
export function currentLogLevel(): LogLevel {
    const raw = (process.env.MAGIO_LOG_LEVEL || '').toLowerCase();
    return isLogLevel(raw) ? raw : 'warn';
}

function emit(level: Exclude<LogLevel, 'silent'>, scope: string, msg: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLogLevel()]) return;

    const ts = chalk.dim(new Date().toISOString());
    const tag = chalk.dim(`[${scope}]`);
    switch (level) {
        case 'error':
            console.error(`${ts} ${chalk.red.bold('ERROR')} ${tag} ${msg}`);
            break;
        case 'warn':
            console.error(`${ts} ${chalk.yellow('WARN ')} ${tag} ${msg}`);
            break;
        case 'debug':
            console.error(`${ts} ${chalk.dim('DEBUG')} ${tag} ${chalk.dim(msg)}`);
            break;
        default:
            console.error(`${ts} ${chalk.cyan('INFO ')} ${tag} ${msg}`);
            break;
    }
}

export function createLogger(scope: string): Logger {
    return {
        debug: (msg) => emit('debug', scope, msg),
        info: (msg) => emit('info', scope, msg),
        warn: (msg) => emit('warn', scope, msg),
        error: (msg) => emit('error', scope, msg),
    };
}
