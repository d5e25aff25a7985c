/**
 * Auth API
 * MagioTV device-init, credential login and refresh-token exchanges
 */

import axios, { AxiosError, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { AuthError } from './AuthError.js';
import { ok, err, type Result } from '../utils/result.js';
import { errorMessage } from '../utils/errors.js';
import { DEFAULT_TIMEOUT_MS } from '../client/HttpClient.js';

export const AUTH_ENDPOINTS = {
    init: '/v2/auth/init',
    login: '/v2/auth/login',
    tokens: '/v2/auth/tokens',
} as const;

const initResponseSchema = z.object({
    success: z.boolean(),
    errorMessage: z.string().nullish(),
    token: z.object({ accessToken: z.string().min(1) }).nullish(),
});

const grantResponseSchema = z.object({
    success: z.boolean(),
    errorMessage: z.string().nullish(),
    token: z
        .object({
            accessToken: z.string().min(1),
            refreshToken: z.string().min(1).nullish(),
            /** Lifetime in milliseconds */
            expiresIn: z.number().positive(),
        })
        .nullish(),
});

export interface TokenGrant {
    accessToken: string;
    refreshToken: string | null;
    expiresInMs: number;
}

export interface DeviceIdentity {
    deviceId: string;
    deviceName: string;
    deviceType: string;
    appVersion: string;
    language: string;
}

export interface AuthApiConfig {
    baseUrl: string;
    userAgent: string;
    timeoutMs?: number;
}

/** The part of an axios instance the auth exchanges use */
export type AuthTransport = Pick<AxiosInstance, 'post'>;

/** Upstream exchanges the token manager depends on */
export interface AuthClient {
    init(device: DeviceIdentity): Promise<Result<string, AuthError>>;
    login(tempToken: string, username: string, password: string): Promise<Result<TokenGrant, AuthError>>;
    refresh(refreshToken: string): Promise<Result<TokenGrant, AuthError>>;
}

export class AuthApi implements AuthClient {
    private readonly http: AuthTransport;
    private readonly host: string;

    constructor(
        private readonly config: AuthApiConfig,
        http?: AuthTransport,
    ) {
        this.host = new URL(config.baseUrl).host;
        this.http =
            http ??
            axios.create({
                baseURL: config.baseUrl,
                timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            });
    }

    /**
     * Register the device and obtain a short-lived token for the login call
     */
    async init(device: DeviceIdentity): Promise<Result<string, AuthError>> {
        const body = await this.send('Device init', AUTH_ENDPOINTS.init, undefined, {
            params: {
                dsid: device.deviceId,
                deviceName: device.deviceName,
                deviceType: device.deviceType,
                osVersion: '0.0.0',
                appVersion: device.appVersion,
                language: device.language.toUpperCase(),
                devicePlatform: 'GO',
            },
            headers: this.baseHeaders(),
        });
        if (!body.ok) return body;

        const parsed = initResponseSchema.safeParse(body.value);
        if (!parsed.success) {
            return err(new AuthError('protocol', 'Device init returned an unexpected response'));
        }
        if (!parsed.data.success || !parsed.data.token) {
            return err(
                new AuthError('protocol', `Device init rejected: ${parsed.data.errorMessage || 'unknown error'}`),
            );
        }
        return ok(parsed.data.token.accessToken);
    }

    /**
     * Exchange credentials for an access/refresh token pair
     */
    async login(tempToken: string, username: string, password: string): Promise<Result<TokenGrant, AuthError>> {
        const body = await this.send(
            'Login',
            AUTH_ENDPOINTS.login,
            { loginOrNickname: username, password },
            {
                headers: {
                    ...this.baseHeaders(),
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${tempToken}`,
                },
            },
        );
        return body.ok ? this.toGrant('Login', body.value) : body;
    }

    /**
     * Mint a new access token from a refresh token
     */
    async refresh(refreshToken: string): Promise<Result<TokenGrant, AuthError>> {
        const body = await this.send(
            'Token refresh',
            AUTH_ENDPOINTS.tokens,
            { refreshToken },
            { headers: { ...this.baseHeaders(), 'Content-Type': 'application/json' } },
        );
        return body.ok ? this.toGrant('Token refresh', body.value) : body;
    }

    private baseHeaders(): Record<string, string> {
        return {
            Host: this.host,
            'User-Agent': this.config.userAgent,
        };
    }

    private async send(
        operation: string,
        url: string,
        data: unknown,
        options: { params?: Record<string, string>; headers: Record<string, string> },
    ): Promise<Result<unknown, AuthError>> {
        try {
            const response = await this.http.post<unknown>(url, data, options);
            return ok(response.data);
        } catch (error) {
            // A non-2xx answer may still carry the provider's errorMessage
            if (error instanceof AxiosError && error.response) {
                return err(
                    new AuthError('transport', `${operation} failed (HTTP ${error.response.status}): ${errorMessage(error)}`, {
                        cause: error,
                    }),
                );
            }
            return err(new AuthError('transport', `${operation} failed: ${errorMessage(error)}`, { cause: error }));
        }
    }

    private toGrant(operation: string, body: unknown): Result<TokenGrant, AuthError> {
        const parsed = grantResponseSchema.safeParse(body);
        if (!parsed.success) {
            return err(new AuthError('protocol', `${operation} returned an unexpected response`));
        }
        if (!parsed.data.success || !parsed.data.token) {
            return err(
                new AuthError('protocol', `${operation} rejected: ${parsed.data.errorMessage || 'unknown error'}`),
            );
        }

        const token = parsed.data.token;
        return ok({
            accessToken: token.accessToken,
            refreshToken: token.refreshToken ?? null,
            expiresInMs: token.expiresIn,
        });
    }
}
