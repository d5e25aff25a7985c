/**
 * Config utility
 *
 * Resolution chain (highest priority wins):
 * 1. Environment variables (MAGIO_USERNAME, etc.)
 * 2. Global config file (~/.magio-connect/config.json)
 * 3. Project-local .env (cwd fallback)
 *
 * Persistent config lives at ~/.magio-connect/config.json
 * Tokens live at ~/.magio-connect/data/token_<lang>.json
 */

import { config as dotenvConfig } from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';
import { z } from 'zod';
import { createLogger } from './logger.js';

const logger = createLogger('config');

// ── Provider constants ──────────────────────────────

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36 MagioGO/4.0.21';
export const DEFAULT_APP_VERSION = '4.0.25-hf.0';
export const DEFAULT_DEVICE_NAME = 'Android TV';
export const DEFAULT_DEVICE_TYPE = 'OTT_STB';
export const DEFAULT_LANGUAGE = 'cz';
export const DEFAULT_CACHE_TIMEOUT = 3600;

const BASE_URLS: Record<string, string> = {
    cz: 'https://czgo.magio.tv',
    sk: 'https://skgo.magio.tv',
};

export function baseUrlForLanguage(language: string): string {
    const lang = language.toLowerCase();
    return BASE_URLS[lang] ?? `https://${lang}go.magio.tv`;
}

export const STREAM_QUALITIES = ['p1', 'p2', 'p3', 'p4', 'p5'] as const;
export type StreamQuality = (typeof STREAM_QUALITIES)[number];

// ── Config Dir ──────────────────────────────────────

const CONFIG_DIR_NAME = '.magio-connect';
const CONFIG_FILE_NAME = 'config.json';

/**
 * Get config directory path (~/.magio-connect/, or MAGIO_CONFIG_DIR)
 */
export function getConfigDir(): string {
    const dir =
        process.env.MAGIO_CONFIG_DIR ||
        path.join(process.env.HOME || process.env.USERPROFILE || '/tmp', CONFIG_DIR_NAME);
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    return dir;
}

export function getConfigFilePath(): string {
    return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

// ── Saved Config (persistent) ───────────────────────

const savedConfigSchema = z.object({
    username: z.string().optional(),
    password: z.string().optional(),
    language: z.string().min(2).optional(),
    quality: z.enum(STREAM_QUALITIES).optional(),
    dataDir: z.string().optional(),
    cacheTimeout: z.number().int().positive().optional(),
    deviceName: z.string().optional(),
    deviceType: z.string().optional(),
    userAgent: z.string().optional(),
    appVersion: z.string().optional(),
    deviceIds: z.record(z.string()).optional(),
});

export type SavedConfig = z.infer<typeof savedConfigSchema>;

/**
 * Read the saved global config file. A missing or invalid file reads as null.
 */
export function readSavedConfig(): SavedConfig | null {
    const configPath = getConfigFilePath();
    if (!fs.existsSync(configPath)) return null;

    try {
        const content = fs.readFileSync(configPath, 'utf8');
        const parsed = savedConfigSchema.safeParse(JSON.parse(content));
        if (!parsed.success) {
            logger.warn(`Ignoring invalid config file ${configPath}: ${parsed.error.issues[0]?.message}`);
            return null;
        }
        return parsed.data;
    } catch (error) {
        logger.warn(`Could not read config file ${configPath}: ${error instanceof Error ? error.message : error}`);
        return null;
    }
}

/**
 * Write config to the global config file
 */
export function writeSavedConfig(config: SavedConfig): void {
    fs.writeFileSync(getConfigFilePath(), JSON.stringify(config, null, 2) + '\n', { mode: 0o600 });
}

/**
 * Update specific fields in the saved config
 */
export function updateSavedConfig(updates: Partial<SavedConfig>): SavedConfig {
    const merged = { ...(readSavedConfig() ?? {}), ...updates };
    writeSavedConfig(merged);
    return merged;
}

/**
 * Check if a saved config exists and has credentials
 */
export function hasSavedConfig(): boolean {
    const saved = readSavedConfig();
    return !!(saved?.username && saved?.password);
}

/** Keys accepted by `magio config set` */
export const SETTABLE_KEYS = [
    'username',
    'password',
    'language',
    'quality',
    'dataDir',
    'cacheTimeout',
    'deviceName',
    'deviceType',
    'userAgent',
    'appVersion',
] as const;
export type SettableKey = (typeof SETTABLE_KEYS)[number];

export function isSettableKey(key: string): key is SettableKey {
    return SETTABLE_KEYS.some((k) => k === key);
}

/**
 * Validate a single raw CLI value against the saved-config schema and store it.
 * @throws {Error} If the value is not valid for the key
 */
export function setSavedConfigValue(key: SettableKey, raw: string): SavedConfig {
    const updates: Partial<SavedConfig> = {};
    switch (key) {
        case 'cacheTimeout': {
            const seconds = Number(raw);
            if (!Number.isInteger(seconds) || seconds <= 0) {
                throw new Error(`Invalid value for cacheTimeout: "${raw}" is not a positive integer`);
            }
            updates.cacheTimeout = seconds;
            break;
        }
        case 'quality':
            if (!isStreamQuality(raw)) {
                throw new Error(`Invalid value for quality: use one of ${STREAM_QUALITIES.join(', ')}`);
            }
            updates.quality = raw;
            break;
        case 'language':
            if (raw.length < 2) {
                throw new Error(`Invalid value for language: "${raw}"`);
            }
            updates.language = raw.toLowerCase();
            break;
        default:
            updates[key] = raw;
    }
    return updateSavedConfig(updates);
}

// ── Resolved Config (runtime) ───────────────────────

export interface Config {
    username: string;
    password: string;
    language: string;
    quality: StreamQuality;
    baseUrl: string;
    dataDir: string;
    /** Default cache TTL in seconds */
    cacheTimeout: number;
    deviceName: string;
    deviceType: string;
    userAgent: string;
    appVersion: string;
    deviceId?: string;
}

type Env = Record<string, string | undefined>;

function isStreamQuality(value: string): value is StreamQuality {
    return STREAM_QUALITIES.some((q) => q === value);
}

/**
 * Merge environment and saved config into a runtime config.
 * Credentials may be empty; login reports that as a configuration error.
 * @throws {Error} If the quality or cache timeout is invalid
 */
export function resolveConfig(env: Env, saved: SavedConfig | null, configDir: string): Config {
    const language = (env.MAGIO_LANGUAGE || saved?.language || DEFAULT_LANGUAGE).toLowerCase();

    const quality = env.MAGIO_QUALITY || saved?.quality || 'p5';
    if (!isStreamQuality(quality)) {
        throw new Error(`Invalid stream quality "${quality}". Use one of: ${STREAM_QUALITIES.join(', ')}`);
    }

    let cacheTimeout = saved?.cacheTimeout ?? DEFAULT_CACHE_TIMEOUT;
    if (env.MAGIO_CACHE_TIMEOUT) {
        cacheTimeout = Number(env.MAGIO_CACHE_TIMEOUT);
        if (!Number.isInteger(cacheTimeout) || cacheTimeout <= 0) {
            throw new Error(`Invalid MAGIO_CACHE_TIMEOUT "${env.MAGIO_CACHE_TIMEOUT}": expected a positive integer`);
        }
    }

    return {
        username: env.MAGIO_USERNAME || saved?.username || '',
        password: env.MAGIO_PASSWORD || saved?.password || '',
        language,
        quality,
        baseUrl: baseUrlForLanguage(language),
        dataDir: env.MAGIO_DATA_DIR || saved?.dataDir || path.join(configDir, 'data'),
        cacheTimeout,
        deviceName: env.MAGIO_DEVICE_NAME || saved?.deviceName || DEFAULT_DEVICE_NAME,
        deviceType: env.MAGIO_DEVICE_TYPE || saved?.deviceType || DEFAULT_DEVICE_TYPE,
        userAgent: env.MAGIO_USER_AGENT || saved?.userAgent || DEFAULT_USER_AGENT,
        appVersion: env.MAGIO_APP_VERSION || saved?.appVersion || DEFAULT_APP_VERSION,
        deviceId: env.MAGIO_DEVICE_ID || undefined,
    };
}

let cachedConfig: Config | null = null;

/**
 * Resolve config using the priority chain:
 * 1. Environment variables
 * 2. Global config (~/.magio-connect/config.json)
 * 3. Project-local .env
 */
export function getConfig(): Config {
    if (cachedConfig) return cachedConfig;

    // Layer 3: Try loading project-local .env as lowest priority
    const envPath = path.resolve(process.cwd(), '.env');
    if (fs.existsSync(envPath)) {
        dotenvConfig({ path: envPath, override: false });
    }

    cachedConfig = resolveConfig(process.env, readSavedConfig(), getConfigDir());
    return cachedConfig;
}
