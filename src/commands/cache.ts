/**
 * Cache CLI Commands
 * magio cache info
 *
 * The cache lives for one process, so this mostly shows what a single
 * command run leaves behind (token and device id mirrors).
 */

import { Command } from 'commander';
import { log } from '../utils/logger.js';
import { formatRemaining } from '../utils/formatter.js';
import { createClient, exitWithError } from './shared.js';

export function createCacheCommand(): Command {
    const cache = new Command('cache').description('Inspect the in-memory cache');

    cache
        .command('info')
        .description('Load the session and show cache contents')
        .action(async () => {
            try {
                const client = createClient();
                await client.getAuthStatus();
                const { info, stats } = client.getCacheInfo();

                log.header(`Cache (${info.totalEntries} entries)`);
                for (const key of info.keys) {
                    const left = info.expiresIn[key];
                    log.kv(key, left === undefined ? 'expired' : formatRemaining(left));
                }
                console.log();
                log.kv('Hits', String(stats.hits));
                log.kv('Misses', String(stats.misses));
            } catch (error) {
                exitWithError('Failed to read cache', error);
            }
        });

    return cache;
}
