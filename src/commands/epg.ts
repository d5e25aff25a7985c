/**
 * EPG CLI Commands
 * magio epg show <channelId> | now <channelId> | next <channelId>
 */

import { Command } from 'commander';
import ora from 'ora';
import { log } from '../utils/logger.js';
import { formatDate, printTable } from '../utils/formatter.js';
import type { Program } from '../api/EpgApi.js';
import { createClient, exitWithError, parseNonNegativeInt } from './shared.js';

function printPrograms(programs: Program[]): void {
    printTable(
        ['Schedule ID', 'Start', 'End', 'Title', 'Category'],
        programs.map((p) => [String(p.scheduleId), formatDate(p.startTime), formatDate(p.endTime), p.title, p.category]),
    );
}

export function createEpgCommand(): Command {
    const epg = new Command('epg').description('Programme guide');

    epg.command('show')
        .description('Show the guide for a channel')
        .argument('<channelId>', 'Channel ID')
        .option('-b, --back <days>', 'Days into the past', '1')
        .option('-f, --forward <days>', 'Days into the future', '1')
        .action(async (channelId: string, opts: { back: string; forward: string }) => {
            const spinner = ora('Fetching guide...').start();
            try {
                const client = createClient();
                const guide = await client.epg.getEpg({
                    channelId,
                    daysBack: parseNonNegativeInt(opts.back, '--back'),
                    daysForward: parseNonNegativeInt(opts.forward, '--forward'),
                });
                spinner.stop();

                const programs = guide[channelId] ?? [];
                if (programs.length === 0) {
                    log.info(`No programmes found for channel ${channelId}`);
                    return;
                }
                log.header(`Channel ${channelId} (${programs.length} programmes)`);
                printPrograms(programs);
            } catch (error) {
                spinner.stop();
                exitWithError('Failed to fetch guide', error);
            }
        });

    epg.command('now')
        .description('Show what is on right now')
        .argument('<channelId>', 'Channel ID')
        .action(async (channelId: string) => {
            try {
                const client = createClient();
                const program = await client.epg.getCurrentProgram(channelId);
                if (!program) {
                    log.info(`Nothing in the guide for channel ${channelId} right now`);
                    return;
                }
                log.header(program.title);
                log.kv('Schedule ID', String(program.scheduleId));
                log.kv('Time', `${formatDate(program.startTime)} - ${formatDate(program.endTime)}`);
                if (program.category) log.kv('Category', program.category);
                if (program.description) log.dim(`  ${program.description}`);
            } catch (error) {
                exitWithError('Failed to fetch current programme', error);
            }
        });

    epg.command('next')
        .description('Show upcoming programmes')
        .argument('<channelId>', 'Channel ID')
        .option('-n, --count <n>', 'How many programmes', '5')
        .action(async (channelId: string, opts: { count: string }) => {
            try {
                const client = createClient();
                const programs = await client.epg.getUpcoming(channelId, parseNonNegativeInt(opts.count, '--count'));
                if (programs.length === 0) {
                    log.info(`No upcoming programmes for channel ${channelId}`);
                    return;
                }
                printPrograms(programs);
            } catch (error) {
                exitWithError('Failed to fetch upcoming programmes', error);
            }
        });

    return epg;
}
