/**
 * Magio Client
 * Main facade wiring auth, cache and the MagioTV service APIs together
 */

import type { AxiosInstance } from 'axios';
import {
    AuthApi,
    ConfigDeviceIdentityStore,
    FileStore,
    TokenManager,
    type AuthStatus,
    type AuthTransport,
    type DeviceIdentityStore,
    type TokenStore,
} from '../auth/index.js';
import { HttpClient } from './HttpClient.js';
import { Cache, type CacheInfo, type CacheStats } from './Cache.js';
import { ChannelApi } from '../api/ChannelApi.js';
import { EpgApi } from '../api/EpgApi.js';
import { StreamApi } from '../api/StreamApi.js';
import { DeviceApi } from '../api/DeviceApi.js';
import { systemClock, type Clock } from '../utils/clock.js';
import type { Config } from '../utils/config.js';

/** Seconds between expired-entry sweeps */
const SWEEP_INTERVAL_SECONDS = 300;

export interface MagioClientOptions {
    clock?: Clock;
    store?: TokenStore;
    deviceIds?: DeviceIdentityStore;
    /** Transport for the auth exchanges */
    authTransport?: AuthTransport;
    /** Axios instance for authenticated service calls */
    httpInstance?: AxiosInstance;
    /** Start the periodic expiry sweep (default true) */
    sweep?: boolean;
}

export interface CacheReport {
    info: CacheInfo;
    stats: CacheStats;
}

export class MagioClient {
    private readonly tokenManager: TokenManager;
    private readonly httpClient: HttpClient;
    private readonly cache: Cache;
    private readonly stopSweeper: (() => void) | null;

    // API clients
    public readonly channels: ChannelApi;
    public readonly epg: EpgApi;
    public readonly streams: StreamApi;
    public readonly devices: DeviceApi;

    constructor(
        readonly config: Config,
        options: MagioClientOptions = {},
    ) {
        const clock = options.clock ?? systemClock;
        this.cache = new Cache({ defaultTtlSeconds: config.cacheTimeout, clock });

        this.tokenManager = new TokenManager(
            {
                username: config.username,
                password: config.password,
                language: config.language,
                deviceName: config.deviceName,
                deviceType: config.deviceType,
                userAgent: config.userAgent,
                appVersion: config.appVersion,
                baseUrl: config.baseUrl,
                deviceId: config.deviceId,
            },
            {
                api: new AuthApi({ baseUrl: config.baseUrl, userAgent: config.userAgent }, options.authTransport),
                store: options.store ?? new FileStore(config.dataDir),
                deviceIds: options.deviceIds ?? new ConfigDeviceIdentityStore(),
                cache: this.cache,
                clock,
            },
        );

        this.httpClient = new HttpClient({ baseUrl: config.baseUrl, auth: this.tokenManager }, options.httpInstance);

        this.channels = new ChannelApi(this.httpClient, this.cache, this.tokenManager.language);
        this.epg = new EpgApi(this.httpClient, this.channels, this.tokenManager.language, clock);
        this.streams = new StreamApi(this.httpClient, this.tokenManager, this.cache, this.epg, {
            language: this.tokenManager.language,
            quality: config.quality,
            deviceName: this.tokenManager.deviceName,
            deviceType: this.tokenManager.deviceType,
        }, clock);
        this.devices = new DeviceApi(this.httpClient);

        this.stopSweeper = options.sweep === false ? null : this.cache.startSweeper(SWEEP_INTERVAL_SECONDS);
    }

    // ── Auth ──────────────────────────────────────────

    async login(force: boolean = false): Promise<boolean> {
        return this.tokenManager.login({ force });
    }

    async refreshToken(): Promise<boolean> {
        return this.tokenManager.refreshAccessToken();
    }

    async getAuthStatus(): Promise<AuthStatus> {
        return this.tokenManager.getAuthStatus();
    }

    /** Ends the session and drops everything cached for it */
    async logout(): Promise<boolean> {
        const deleted = await this.tokenManager.logout();
        this.cache.clear();
        return deleted;
    }

    // ── Cache ─────────────────────────────────────────

    getCacheInfo(): CacheReport {
        return { info: this.cache.info(), stats: this.cache.stats() };
    }

    /** Clear everything, one key, or a `prefix*` pattern */
    clearCache(pattern?: string): number {
        return this.cache.clear(pattern);
    }

    close(): void {
        this.stopSweeper?.();
    }
}
