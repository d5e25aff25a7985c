/**
 * Config CLI Commands
 * magio config init | show | set <key> <value> | path
 */

import { Command } from 'commander';
import * as readline from 'readline';
import { log } from '../utils/logger.js';
import {
    readSavedConfig,
    updateSavedConfig,
    hasSavedConfig,
    getConfigFilePath,
    getConfigDir,
    isSettableKey,
    setSavedConfigValue,
    SETTABLE_KEYS,
    STREAM_QUALITIES,
    DEFAULT_LANGUAGE,
} from '../utils/config.js';
import { ask, exitWithError } from './shared.js';

const MASK = '••••••';

function mask(secret: string | undefined): string {
    return secret ? MASK + secret.slice(-2) : '-';
}

export function createConfigCommand(): Command {
    const config = new Command('config').description('Manage magio-connect configuration');

    // ── config init ──────────────────────────────────
    config
        .command('init')
        .description('Interactive setup: saves credentials to ~/.magio-connect/config.json')
        .action(async () => {
            const existing = readSavedConfig();

            if (existing && hasSavedConfig()) {
                log.info('Existing configuration found. Values will be used as defaults.');
                log.dim(`  Config file: ${getConfigFilePath()}`);
                console.log();
            }

            const rl = readline.createInterface({
                input: process.stdin,
                output: process.stdout,
            });

            try {
                log.header('magio-connect setup');
                log.dim('  Credentials are saved to ~/.magio-connect/config.json (chmod 600)');
                console.log();

                const username = await ask(rl, '  Username:', existing?.username);
                const password = await ask(rl, '  Password:', existing?.password ? mask(existing.password) : undefined);
                const language = await ask(rl, '  Language (cz, sk):', existing?.language || DEFAULT_LANGUAGE);
                const quality = await ask(rl, `  Quality (${STREAM_QUALITIES.join(', ')}):`, existing?.quality || 'p5');

                rl.close();

                // The masked default means "keep what is saved"
                const resolvedPassword =
                    password.startsWith(MASK) && existing?.password ? existing.password : password;

                if (!username || !resolvedPassword) {
                    log.error('Username and password are required');
                    process.exit(1);
                }

                updateSavedConfig({ username, password: resolvedPassword });
                setSavedConfigValue('language', language);
                setSavedConfigValue('quality', quality);

                console.log();
                log.success('Configuration saved!');
                log.kv('Location', getConfigFilePath());
                console.log();
                log.info('Next step: log in to MagioTV');
                log.dim('  magio auth login');
            } catch (error) {
                rl.close();
                exitWithError('Setup failed', error);
            }
        });

    // ── config show ──────────────────────────────────
    config
        .command('show')
        .description('Display saved configuration (password masked)')
        .action(() => {
            const saved = readSavedConfig();

            if (!saved) {
                log.warn('No configuration found. Run: magio config init');
                return;
            }

            log.header('magio-connect configuration');
            log.kv('Config File', getConfigFilePath());
            console.log();
            log.kv('Username', saved.username || '-');
            log.kv('Password', mask(saved.password));
            log.kv('Language', saved.language || DEFAULT_LANGUAGE);
            log.kv('Quality', saved.quality || 'p5');
            if (saved.dataDir) log.kv('Data Dir', saved.dataDir);
            if (saved.cacheTimeout) log.kv('Cache Timeout', `${saved.cacheTimeout}s`);
            if (saved.deviceName) log.kv('Device Name', saved.deviceName);
            if (saved.deviceType) log.kv('Device Type', saved.deviceType);
            for (const [lang, id] of Object.entries(saved.deviceIds ?? {})) {
                log.kv(`Device ID (${lang})`, id);
            }
        });

    // ── config set ───────────────────────────────────
    config
        .command('set')
        .description('Set a single config value')
        .argument('<key>', `Config key: ${SETTABLE_KEYS.join(', ')}`)
        .argument('<value>', 'Value to set')
        .action((key: string, value: string) => {
            if (!isSettableKey(key)) {
                log.error(`Invalid key "${key}". Valid keys: ${SETTABLE_KEYS.join(', ')}`);
                process.exit(1);
            }

            try {
                setSavedConfigValue(key, value);
            } catch (error) {
                exitWithError('Could not set value', error);
            }
            log.success(`Set ${key} = ${key === 'password' ? mask(value) : value}`);
        });

    // ── config path ──────────────────────────────────
    config
        .command('path')
        .description('Print the config directory path')
        .action(() => {
            console.log(getConfigDir());
        });

    return config;
}
