/**
 * Test helpers: in-process upstream, manual clock, quiet logger
 */
import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import type { Clock } from '../src/utils/clock.js';
import type { Logger } from '../src/utils/logger.js';
import type { AuthHeaders } from '../src/auth/TokenManager.js';

export interface Reply {
    status?: number;
    data?: unknown;
    headers?: Record<string, string>;
}

export type Handler = (config: InternalAxiosRequestConfig) => Reply | Promise<Reply>;

export interface FakeUpstream {
    instance: AxiosInstance;
    requests: InternalAxiosRequestConfig[];
}

/**
 * An axios instance whose adapter answers from `handler` instead of the
 * network. Status codes are checked with the request's validateStatus, as
 * the real adapters do.
 */
export function fakeUpstream(handler: Handler, baseURL = 'https://czgo.magio.tv'): FakeUpstream {
    const requests: InternalAxiosRequestConfig[] = [];
    const instance = axios.create({
        baseURL,
        adapter: async (config) => {
            requests.push(config);
            const reply = await handler(config);
            const response: AxiosResponse<unknown> = {
                data: reply.data ?? null,
                status: reply.status ?? 200,
                statusText: '',
                headers: reply.headers ?? {},
                config,
            };
            if (config.validateStatus && !config.validateStatus(response.status)) {
                throw new AxiosError(
                    `Request failed with status code ${response.status}`,
                    AxiosError.ERR_BAD_RESPONSE,
                    config,
                    null,
                    response,
                );
            }
            return response;
        },
    });
    return { instance, requests };
}

export class ManualClock implements Clock {
    constructor(public time = 1_700_000_000_000) { }

    now(): number {
        return this.time;
    }

    advance(ms: number): void {
        this.time += ms;
    }
}

export interface RecordingLogger extends Logger {
    lines: string[];
}

export function recordingLogger(): RecordingLogger {
    const lines: string[] = [];
    return {
        lines,
        debug: (msg) => lines.push(`debug: ${msg}`),
        info: (msg) => lines.push(`info: ${msg}`),
        warn: (msg) => lines.push(`warn: ${msg}`),
        error: (msg) => lines.push(`error: ${msg}`),
    };
}

export const TEST_AUTH_HEADERS: AuthHeaders = {
    Authorization: 'Bearer test-access',
    Host: 'czgo.magio.tv',
    'User-Agent': 'test-agent',
};

export const staticAuth = {
    getAuthHeaders: async (): Promise<AuthHeaders | null> => TEST_AUTH_HEADERS,
};
