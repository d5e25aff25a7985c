/**
 * Channels CLI Commands
 * magio channels list | groups | search <term>
 */

import { Command } from 'commander';
import ora from 'ora';
import { log } from '../utils/logger.js';
import { printTable } from '../utils/formatter.js';
import type { Channel } from '../api/ChannelApi.js';
import { createClient, exitWithError } from './shared.js';

function printChannels(channels: Channel[]): void {
    printTable(
        ['ID', 'Name', 'Group', 'Archive'],
        channels.map((c) => [String(c.id), c.name, c.group, c.hasArchive ? 'yes' : 'no']),
    );
}

export function createChannelsCommand(): Command {
    const channels = new Command('channels').description('Browse live TV channels');

    channels
        .command('list')
        .description('List live channels')
        .option('-g, --group <name>', 'Only channels in this group')
        .action(async (opts: { group?: string }) => {
            const spinner = ora('Fetching channels...').start();
            try {
                const client = createClient();
                const list = opts.group
                    ? await client.channels.getChannelsByGroup(opts.group)
                    : await client.channels.getChannels();
                spinner.stop();

                if (list.length === 0) {
                    log.info(opts.group ? `No channels in group "${opts.group}"` : 'No channels available');
                    return;
                }

                log.header(`Channels (${list.length})`);
                printChannels(list);
            } catch (error) {
                spinner.stop();
                exitWithError('Failed to list channels', error);
            }
        });

    channels
        .command('groups')
        .description('List channel groups')
        .action(async () => {
            try {
                const client = createClient();
                const groups = await client.channels.getGroups();
                if (groups.length === 0) {
                    log.info('No channel groups available');
                    return;
                }
                log.header(`Groups (${groups.length})`);
                for (const group of groups) {
                    console.log(`  ${group}`);
                }
            } catch (error) {
                exitWithError('Failed to list groups', error);
            }
        });

    channels
        .command('search')
        .description('Find channels by name')
        .argument('<term>', 'Part of the channel name')
        .action(async (term: string) => {
            try {
                const client = createClient();
                const matches = await client.channels.search(term);
                if (matches.length === 0) {
                    log.info(`No channels match "${term}"`);
                    return;
                }
                printChannels(matches);
            } catch (error) {
                exitWithError('Search failed', error);
            }
        });

    return channels;
}
