/**
 * Token Manager
 * Manages token lifecycle: login, refresh-before-expiry, persistence, logout
 *
 * Lookup order is memory → cache → token file → network. Login, refresh and
 * logout share one mutex, so concurrent callers that all find the token near
 * expiry cause a single refresh.
 */

import { randomUUID } from 'crypto';
import { Mutex } from 'async-mutex';
import { AuthApi, type AuthClient, type TokenGrant } from './AuthApi.js';
import { AuthError } from './AuthError.js';
import { NullTokenStore, loggedOutTokens, type TokenSet, type TokenStore } from './TokenStore.js';
import { MemoryDeviceIdentityStore, type DeviceIdentityStore } from './DeviceIdentity.js';
import { Cache } from '../client/Cache.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { formatRemaining } from '../utils/formatter.js';
import { ok, err, type Result } from '../utils/result.js';
import {
    baseUrlForLanguage,
    DEFAULT_APP_VERSION,
    DEFAULT_DEVICE_NAME,
    DEFAULT_DEVICE_TYPE,
    DEFAULT_USER_AGENT,
} from '../utils/config.js';

/** Seconds before expiry at which a token is refreshed */
export const DEFAULT_REFRESH_MARGIN_SECONDS = 60;
/** Upper bound for how long a TokenSet may sit in the cache */
export const MAX_TOKEN_CACHE_SECONDS = 7 * 24 * 3600;

export interface TokenManagerConfig {
    username: string;
    password: string;
    language: string;
    deviceName?: string;
    deviceType?: string;
    userAgent?: string;
    appVersion?: string;
    baseUrl?: string;
    deviceId?: string;
    refreshMarginSeconds?: number;
}

export interface TokenManagerDeps {
    api?: AuthClient;
    store?: TokenStore;
    cache?: Cache;
    clock?: Clock;
    logger?: Logger;
    deviceIds?: DeviceIdentityStore;
}

export type AuthState = 'LoggedOut' | 'Valid' | 'NeedsRefresh' | 'Failed';

export interface AuthHeaders {
    Authorization: string;
    Host: string;
    'User-Agent': string;
}

export interface AuthStatus {
    authenticated: boolean;
    state: AuthState;
    username: string | null;
    language: string;
    deviceId: string;
    tokenValid: boolean;
    refreshValid: boolean;
    /** Whole seconds until the access token expires, 0 when invalid */
    tokenExpiresIn: number;
    tokenExpiresFormatted: string;
    lastError: string | null;
}

export interface LoginOptions {
    /** Run the full credential exchange even when the held token is valid */
    force?: boolean;
}

export class TokenManager {
    readonly language: string;
    readonly deviceName: string;
    readonly deviceType: string;
    readonly userAgent: string;

    private readonly config: TokenManagerConfig;
    private readonly baseUrl: string;
    private readonly host: string;
    private readonly appVersion: string;
    private readonly marginMs: number;

    private readonly api: AuthClient;
    private readonly store: TokenStore;
    private readonly cache: Cache;
    private readonly clock: Clock;
    private readonly logger: Logger;
    private readonly deviceIds: DeviceIdentityStore;

    private readonly mutex = new Mutex();
    private tokens: TokenSet;
    private lastError: AuthError | null = null;
    private loading: Promise<void> | null = null;

    constructor(config: TokenManagerConfig, deps: TokenManagerDeps = {}) {
        this.config = config;
        this.language = config.language.toLowerCase();
        this.deviceName = config.deviceName || DEFAULT_DEVICE_NAME;
        this.deviceType = config.deviceType || DEFAULT_DEVICE_TYPE;
        this.userAgent = config.userAgent || DEFAULT_USER_AGENT;
        this.appVersion = config.appVersion || DEFAULT_APP_VERSION;
        this.baseUrl = config.baseUrl || baseUrlForLanguage(this.language);
        this.host = new URL(this.baseUrl).host;
        this.marginMs = (config.refreshMarginSeconds ?? DEFAULT_REFRESH_MARGIN_SECONDS) * 1000;

        this.api = deps.api ?? new AuthApi({ baseUrl: this.baseUrl, userAgent: this.userAgent });
        this.store = deps.store ?? new NullTokenStore();
        this.cache = deps.cache ?? new Cache({ clock: deps.clock });
        this.clock = deps.clock ?? systemClock;
        this.logger = deps.logger ?? createLogger('auth');
        this.deviceIds = deps.deviceIds ?? new MemoryDeviceIdentityStore();

        this.tokens = loggedOutTokens(this.resolveDeviceId());
        this.logger.debug(`TokenManager ready (language: ${this.language})`);
    }

    get deviceId(): string {
        return this.tokens.deviceId;
    }

    getBaseUrl(): string {
        return this.baseUrl;
    }

    // ── Public operations ─────────────────────────────

    async login(options: LoginOptions = {}): Promise<boolean> {
        await this.ensureLoaded();
        return this.mutex.runExclusive(() => this.performLogin(options.force ?? false));
    }

    /**
     * Make sure the held access token is valid beyond the refresh margin.
     * Falls back to one full login when the refresh exchange fails.
     */
    async refreshAccessToken(): Promise<boolean> {
        await this.ensureLoaded();
        return this.mutex.runExclusive(() => this.performRefresh());
    }

    /**
     * Ready-to-send headers for an authenticated upstream call,
     * or null when no valid token can be obtained.
     */
    async getAuthHeaders(): Promise<AuthHeaders | null> {
        if (!(await this.refreshAccessToken()) || !this.tokens.accessToken) {
            return null;
        }
        return {
            Authorization: `Bearer ${this.tokens.accessToken}`,
            Host: this.host,
            'User-Agent': this.userAgent,
        };
    }

    /**
     * Forget the session everywhere. Safe to call repeatedly; resolves false
     * only when the token file could not be removed.
     */
    async logout(): Promise<boolean> {
        await this.ensureLoaded();
        return this.mutex.runExclusive(async () => {
            this.tokens = loggedOutTokens(this.tokens.deviceId);
            this.lastError = null;
            this.cache.clear(this.tokenCacheKey());

            const deleted = await this.store.delete(this.language);
            if (deleted) {
                this.logger.info('Logged out');
            }
            return deleted;
        });
    }

    async getAuthStatus(): Promise<AuthStatus> {
        await this.ensureLoaded();

        const now = this.clock.now();
        const tokenValid = this.tokens.accessToken !== null && this.tokens.expiresAt > now;
        const tokenExpiresIn = tokenValid ? Math.max(0, Math.floor((this.tokens.expiresAt - now) / 1000)) : 0;

        return {
            authenticated: tokenValid,
            state: this.getState(),
            username: tokenValid ? this.config.username : null,
            language: this.language,
            deviceId: this.tokens.deviceId,
            tokenValid,
            refreshValid: this.tokens.refreshToken !== null,
            tokenExpiresIn,
            tokenExpiresFormatted: formatRemaining(tokenExpiresIn),
            lastError: this.lastError?.message ?? null,
        };
    }

    getState(): AuthState {
        if (this.isValid(this.tokens)) return 'Valid';
        if (this.lastError) return 'Failed';
        return this.tokens.accessToken === null ? 'LoggedOut' : 'NeedsRefresh';
    }

    // ── Login / refresh (called with the mutex held) ──

    private async performLogin(force: boolean): Promise<boolean> {
        if (!force && this.tokens.refreshToken && this.isValid(this.tokens)) {
            this.logger.debug('Current token is still valid, skipping login');
            return true;
        }

        const result = await this.exchangeCredentials();
        if (!result.ok) {
            return this.fail(result.error);
        }

        const applied = this.applyGrant(result.value, null);
        if (!applied.ok) {
            return this.fail(applied.error);
        }
        await this.persist();
        this.logger.info('Login successful');
        return true;
    }

    private async performRefresh(): Promise<boolean> {
        const refreshToken = this.tokens.refreshToken;
        if (!refreshToken) {
            this.logger.info('No refresh token available, logging in');
            return this.performLogin(false);
        }

        if (this.isValid(this.tokens)) {
            return true;
        }

        const cached = this.cache.get<TokenSet>(this.tokenCacheKey());
        if (cached && this.isValid(cached)) {
            this.adopt(cached);
            this.logger.info('Adopted a fresher token from the cache');
            return true;
        }

        const result = await this.api.refresh(refreshToken);
        const applied = result.ok ? this.applyGrant(result.value, refreshToken) : result;
        if (!applied.ok) {
            this.lastError = applied.error;
            this.logger.warn(`${applied.error.message}; falling back to login`);
            this.cache.clear(this.tokenCacheKey());
            return this.performLogin(false);
        }

        await this.persist();
        this.logger.info('Access token refreshed');
        return true;
    }

    private async exchangeCredentials(): Promise<Result<TokenGrant, AuthError>> {
        if (!this.config.username || !this.config.password) {
            return err(new AuthError('config', 'Username and password are not configured. Run: magio config init'));
        }

        const init = await this.api.init({
            deviceId: this.tokens.deviceId,
            deviceName: this.deviceName,
            deviceType: this.deviceType,
            appVersion: this.appVersion,
            language: this.language,
        });
        if (!init.ok) return init;

        return this.api.login(init.value, this.config.username, this.config.password);
    }

    /**
     * Install a grant as the live TokenSet. A grant that would already need
     * refreshing is rejected, so every accepted token outlives the margin.
     */
    private applyGrant(grant: TokenGrant, previousRefreshToken: string | null): Result<TokenSet, AuthError> {
        if (grant.expiresInMs <= this.marginMs) {
            return err(
                new AuthError(
                    'protocol',
                    `Upstream issued a token valid for ${Math.floor(grant.expiresInMs / 1000)}s, ` +
                        `not longer than the ${this.marginMs / 1000}s refresh margin`,
                ),
            );
        }

        this.tokens = {
            accessToken: grant.accessToken,
            refreshToken: grant.refreshToken ?? previousRefreshToken,
            expiresAt: this.clock.now() + grant.expiresInMs,
            deviceId: this.tokens.deviceId,
        };
        this.lastError = null;
        return ok(this.tokens);
    }

    private fail(error: AuthError): false {
        this.lastError = error;
        this.logger.error(error.message);
        return false;
    }

    // ── Mirrors: cache, token file, device identity ──

    private async persist(): Promise<void> {
        await this.store.save(this.tokens, this.language);
        this.mirrorToCache();

        try {
            this.deviceIds.save(this.language, this.tokens.deviceId);
        } catch (error) {
            this.logger.warn(`Could not save device id: ${error instanceof Error ? error.message : error}`);
        }
        this.cache.store(this.deviceCacheKey(), this.tokens.deviceId, MAX_TOKEN_CACHE_SECONDS);
    }

    /**
     * Cache the live TokenSet for min(time left, 7 days); skip it once expired
     */
    private mirrorToCache(): void {
        const ttl = Math.min(Math.floor((this.tokens.expiresAt - this.clock.now()) / 1000), MAX_TOKEN_CACHE_SECONDS);
        if (ttl > 0) {
            this.cache.store(this.tokenCacheKey(), { ...this.tokens }, ttl);
        }
    }

    private ensureLoaded(): Promise<void> {
        if (!this.loading) {
            this.loading = this.loadTokens();
        }
        return this.loading;
    }

    private async loadTokens(): Promise<void> {
        if (this.tokens.accessToken) return;

        const cached = this.cache.get<TokenSet>(this.tokenCacheKey());
        if (cached) {
            this.adopt(cached);
            this.logger.debug('Tokens loaded from cache');
            return;
        }

        const stored = await this.store.load(this.language);
        if (stored) {
            this.adopt(stored);
            this.mirrorToCache();
            this.logger.debug('Tokens loaded from token file');
        }
    }

    private adopt(tokens: TokenSet): void {
        this.tokens = { ...tokens, deviceId: tokens.deviceId || this.tokens.deviceId };
    }

    private resolveDeviceId(): string {
        if (this.config.deviceId) return this.config.deviceId;

        try {
            const saved = this.deviceIds.load(this.language);
            if (saved) return saved;
        } catch (error) {
            this.logger.warn(`Could not read device id: ${error instanceof Error ? error.message : error}`);
        }

        return this.cache.get<string>(this.deviceCacheKey()) ?? randomUUID();
    }

    private isValid(tokens: TokenSet): boolean {
        return tokens.accessToken !== null && tokens.expiresAt > this.clock.now() + this.marginMs;
    }

    private tokenCacheKey(): string {
        return `auth_tokens_${this.language}`;
    }

    private deviceCacheKey(): string {
        return `device_id_${this.language}`;
    }
}
