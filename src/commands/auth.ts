/**
 * Auth CLI Commands
 * magio auth login | logout | status | refresh
 */

import { Command } from 'commander';
import ora from 'ora';
import { log } from '../utils/logger.js';
import type { AuthStatus } from '../auth/index.js';
import { createClient, exitWithError } from './shared.js';

function printStatus(status: AuthStatus): void {
    log.kv('State', status.state);
    log.kv('Language', status.language);
    log.kv('Device ID', status.deviceId);
    log.kv('Token Expires', status.tokenExpiresFormatted);
    log.kv('Can Refresh', status.refreshValid ? 'Yes' : 'No');
    if (status.lastError) {
        log.kv('Last Error', status.lastError);
    }
}

export function createAuthCommand(): Command {
    const auth = new Command('auth').description('Manage MagioTV authentication');

    auth.command('login')
        .description('Log in with the configured username and password')
        .option('-f, --force', 'Log in again even if the current token is valid')
        .action(async (opts: { force?: boolean }) => {
            const spinner = ora('Logging in...').start();
            try {
                const client = createClient();
                const success = await client.login(opts.force ?? false);
                spinner.stop();

                const status = await client.getAuthStatus();
                if (!success) {
                    log.error(`Login failed: ${status.lastError ?? 'unknown error'}`);
                    process.exit(1);
                }

                log.success(`Logged in as ${status.username ?? '-'}`);
                printStatus(status);
            } catch (error) {
                spinner.stop();
                exitWithError('Login failed', error);
            }
        });

    auth.command('logout')
        .description('Forget the session and delete the token file')
        .action(async () => {
            try {
                const client = createClient();
                if (await client.logout()) {
                    log.success('Logged out successfully');
                } else {
                    log.warn('Logged out, but the token file could not be removed');
                }
            } catch (error) {
                exitWithError('Logout failed', error);
            }
        });

    auth.command('status')
        .description('Show current authentication status')
        .action(async () => {
            try {
                const client = createClient();
                const status = await client.getAuthStatus();

                if (!status.authenticated) {
                    log.warn('Not authenticated. Run: magio auth login');
                    printStatus(status);
                    return;
                }

                log.success(`Authenticated as ${status.username ?? '-'}`);
                printStatus(status);
            } catch (error) {
                exitWithError('Status check failed', error);
            }
        });

    auth.command('refresh')
        .description('Refresh the access token if it is close to expiry')
        .action(async () => {
            const spinner = ora('Refreshing token...').start();
            try {
                const client = createClient();
                const success = await client.refreshToken();
                spinner.stop();

                const status = await client.getAuthStatus();
                if (!success) {
                    log.error(`Refresh failed: ${status.lastError ?? 'unknown error'}`);
                    process.exit(1);
                }
                log.success('Token is valid');
                printStatus(status);
            } catch (error) {
                spinner.stop();
                exitWithError('Refresh failed', error);
            }
        });

    return auth;
}
