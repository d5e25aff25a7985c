/**
 * HTTP Client
 * Axios wrapper that authenticates every request through the token manager
 */

import { Readable } from 'stream';
import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import type { AuthHeaders } from '../auth/TokenManager.js';
import { NotAuthenticatedError } from '../utils/errors.js';

export const DEFAULT_TIMEOUT_MS = 30000;
/** Stream URL resolution includes a redirect hop and gets a shorter budget */
export const STREAM_TIMEOUT_MS = 10000;

/** What the client needs from the token manager */
export interface AuthHeaderSource {
    getAuthHeaders(): Promise<AuthHeaders | null>;
}

export interface HttpClientConfig {
    baseUrl: string;
    auth: AuthHeaderSource;
    timeout?: number;
}

export interface RedirectTarget {
    url: string;
    contentType: string;
}

export class HttpClient {
    private readonly client: AxiosInstance;
    private readonly auth: AuthHeaderSource;

    constructor(config: HttpClientConfig, instance?: AxiosInstance) {
        this.auth = config.auth;

        this.client =
            instance ??
            axios.create({
                baseURL: config.baseUrl,
                timeout: config.timeout || DEFAULT_TIMEOUT_MS,
            });

        // Add auth interceptor
        this.client.interceptors.request.use(async (requestConfig) => {
            const headers = await this.auth.getAuthHeaders();
            if (!headers) {
                throw new NotAuthenticatedError();
            }
            requestConfig.headers.set('Authorization', headers.Authorization);
            requestConfig.headers.set('User-Agent', headers['User-Agent']);
            if (!requestConfig.headers.has('Host')) {
                requestConfig.headers.set('Host', headers.Host);
            }
            return requestConfig;
        });
    }

    async get<T = unknown>(url: string, config?: AxiosRequestConfig): Promise<T> {
        const response: AxiosResponse<T> = await this.client.get(url, config);
        return response.data;
    }

    async post<T = unknown>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
        const response: AxiosResponse<T> = await this.client.post(url, data, config);
        return response.data;
    }

    /**
     * Request a URL without following redirects and report where it points.
     * A non-redirect answer resolves to the URL itself.
     */
    async resolveRedirect(url: string, headers: Record<string, string>): Promise<RedirectTarget> {
        const response = await this.client.get<unknown>(url, {
            headers,
            maxRedirects: 0,
            timeout: STREAM_TIMEOUT_MS,
            responseType: 'stream',
            validateStatus: (status) => status >= 200 && status < 400,
        });

        const location = response.headers['location'];
        const contentType = response.headers['content-type'];
        // Only the headers matter; drop the body
        if (response.data instanceof Readable) {
            response.data.destroy();
        }

        return {
            url: typeof location === 'string' && location.length > 0 ? location : url,
            contentType:
                typeof contentType === 'string' && contentType.length > 0
                    ? contentType
                    : 'application/vnd.apple.mpegurl',
        };
    }
}
