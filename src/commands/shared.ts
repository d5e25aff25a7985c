/**
 * Shared command utilities
 * Common helpers used across all CLI command modules
 */

import * as readline from 'readline';
import chalk from 'chalk';
import { getConfig } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import { MagioClient } from '../client/MagioClient.js';

/**
 * Creates a MagioClient from the resolved configuration.
 * Used by all CLI commands that talk to MagioTV.
 */
export function createClient(): MagioClient {
    return new MagioClient(getConfig());
}

/** Print the failure in red and exit with status 1 */
export function exitWithError(prefix: string, error: unknown): never {
    log.error(`${prefix}: ${errorMessage(error)}`);
    process.exit(1);
}

/** Prompt on stdin; an empty answer takes the default */
export function ask(rl: readline.Interface, prompt: string, defaultValue?: string): Promise<string> {
    const display = defaultValue ? `${prompt} ${chalk.dim(`(${defaultValue})`)} ` : `${prompt} `;
    return new Promise((resolve) => {
        rl.question(display, (answer) => {
            resolve(answer.trim() || defaultValue || '');
        });
    });
}

export async function confirm(question: string): Promise<boolean> {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
        const answer = await ask(rl, `${question} ${chalk.dim('[y/N]')}`);
        return /^y(es)?$/i.test(answer);
    } finally {
        rl.close();
    }
}

/** Parse a whole-number CLI argument such as a day count */
export function parseNonNegativeInt(value: string, name: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new Error(`${name} must be a non-negative integer, got "${value}"`);
    }
    return parsed;
}
