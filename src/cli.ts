#!/usr/bin/env node
/**
 * magio-connect CLI
 * magio: MagioTV sessions, channels, guide and streams from the terminal
 */

import { Command } from 'commander';
import { createConfigCommand } from './commands/config.js';
import { createAuthCommand } from './commands/auth.js';
import { createChannelsCommand } from './commands/channels.js';
import { createEpgCommand } from './commands/epg.js';
import { createStreamCommand } from './commands/stream.js';
import { createDevicesCommand } from './commands/devices.js';
import { createCacheCommand } from './commands/cache.js';
import { VERSION } from './version.js';

const program = new Command();

program
    .name('magio')
    .description('magio-connect: CLI for MagioTV / MagentaTV')
    .version(VERSION)
    .option('--verbose', 'Log auth and cache activity to stderr')
    .hook('preAction', (command) => {
        if (command.opts().verbose) {
            process.env.MAGIO_LOG_LEVEL = 'debug';
        }
    });

program.addCommand(createConfigCommand());
program.addCommand(createAuthCommand());
program.addCommand(createChannelsCommand());
program.addCommand(createEpgCommand());
program.addCommand(createStreamCommand());
program.addCommand(createDevicesCommand());
program.addCommand(createCacheCommand());

program.parse();
