/**
 * Stream CLI Commands
 * magio stream live <channelId> | catchup <scheduleId> | at <channelId> | archive <channelId>
 */

import { Command } from 'commander';
import ora from 'ora';
import { log } from '../utils/logger.js';
import { parseTimestamp } from '../utils/dates.js';
import type { Stream } from '../api/StreamApi.js';
import { createClient, exitWithError } from './shared.js';

function printStream(stream: Stream, json: boolean): void {
    if (json) {
        console.log(JSON.stringify(stream, null, 2));
        return;
    }
    log.kv('URL', stream.url);
    log.kv('Type', stream.contentType);
    log.kv('Live', stream.isLive ? 'yes' : 'no');
    log.dim('  Send these headers with the request:');
    for (const [name, value] of Object.entries(stream.headers)) {
        log.dim(`    ${name}: ${name === 'Authorization' ? 'Bearer ••••••' : value}`);
    }
}

export function createStreamCommand(): Command {
    const stream = new Command('stream').description('Resolve playable stream URLs');

    stream
        .command('live')
        .description('Live stream for a channel')
        .argument('<channelId>', 'Channel ID')
        .option('--json', 'Print the stream as JSON')
        .action(async (channelId: string, opts: { json?: boolean }) => {
            const spinner = ora('Resolving stream...').start();
            try {
                const result = await createClient().streams.getLiveStream(channelId);
                spinner.stop();
                printStream(result, opts.json ?? false);
            } catch (error) {
                spinner.stop();
                exitWithError('Failed to resolve live stream', error);
            }
        });

    stream
        .command('catchup')
        .description('Archive stream for a scheduled programme')
        .argument('<scheduleId>', 'Schedule ID from the guide')
        .option('--json', 'Print the stream as JSON')
        .action(async (scheduleId: string, opts: { json?: boolean }) => {
            const spinner = ora('Resolving stream...').start();
            try {
                const result = await createClient().streams.getCatchupStream(scheduleId);
                spinner.stop();
                printStream(result, opts.json ?? false);
            } catch (error) {
                spinner.stop();
                exitWithError('Failed to resolve catch-up stream', error);
            }
        });

    stream
        .command('at')
        .description('Archive stream for whatever aired on a channel at a given time')
        .argument('<channelId>', 'Channel ID')
        .requiredOption('-s, --start <time>', 'Start (ISO, unix seconds or relative like 2h)')
        .requiredOption('-e, --end <time>', 'End (ISO, unix seconds or relative like 1h)')
        .option('--json', 'Print the stream as JSON')
        .action(async (channelId: string, opts: { start: string; end: string; json?: boolean }) => {
            const spinner = ora('Looking up programme...').start();
            try {
                const start = parseTimestamp(opts.start);
                const end = parseTimestamp(opts.end);
                if (end < start) {
                    throw new Error('--end must not be before --start');
                }
                const result = await createClient().streams.getCatchupByTime(channelId, start, end);
                spinner.stop();
                printStream(result, opts.json ?? false);
            } catch (error) {
                spinner.stop();
                exitWithError('Failed to resolve catch-up stream', error);
            }
        });

    stream
        .command('archive')
        .description('How far back the catch-up archive of a channel reaches')
        .argument('<channelId>', 'Channel ID')
        .action(async (channelId: string) => {
            const spinner = ora('Reading the guide...').start();
            try {
                const result = await createClient().streams.getCatchupAvailability(channelId);
                spinner.stop();
                if (!result.hasArchive) {
                    log.warn(`No archived programmes for channel ${channelId}`);
                    return;
                }
                log.kv('Days available', result.daysAvailable);
                log.kv('Programmes', result.programsCount);
            } catch (error) {
                spinner.stop();
                exitWithError('Failed to read the archive', error);
            }
        });

    return stream;
}
