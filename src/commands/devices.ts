/**
 * Devices CLI Commands
 * magio devices list | remove <id>
 */

import { Command } from 'commander';
import { log } from '../utils/logger.js';
import { printTable } from '../utils/formatter.js';
import { confirm, createClient, exitWithError } from './shared.js';

export function createDevicesCommand(): Command {
    const devices = new Command('devices').description('Devices registered on the account');

    devices
        .command('list')
        .description('List registered devices')
        .action(async () => {
            try {
                const client = createClient();
                const list = await client.devices.getDevices();
                if (list.length === 0) {
                    log.info('No devices registered');
                    return;
                }

                log.header(`Devices (${list.length})`);
                printTable(
                    ['ID', 'Name', 'Type'],
                    list.map((d) => [d.id, d.isThisDevice ? `${d.name} (this device)` : d.name, d.type]),
                );
            } catch (error) {
                exitWithError('Failed to list devices', error);
            }
        });

    devices
        .command('remove')
        .description('Unregister a device')
        .argument('<id>', 'Device ID')
        .option('-y, --yes', 'Skip the confirmation prompt')
        .action(async (id: string, opts: { yes?: boolean }) => {
            try {
                const client = createClient();
                const device = await client.devices.getDevice(id);
                if (!device) {
                    log.error(`Device "${id}" not found`);
                    process.exit(1);
                }

                if (!opts.yes && !(await confirm(`Remove device "${device.name}"?`))) {
                    log.info('Cancelled');
                    return;
                }

                await client.devices.deleteDevice(id);
                log.success(`Removed device ${device.name}`);
            } catch (error) {
                exitWithError('Failed to remove device', error);
            }
        });

    return devices;
}
