/**
 * Error utilities
 * Shared error types and formatting for CLI and MCP error handling
 */

import { AxiosError } from 'axios';

/**
 * Raised by the HTTP client when the token manager cannot produce
 * authorization headers. Callers should treat it as "try again later".
 */
export class NotAuthenticatedError extends Error {
    constructor(message = 'Not authenticated with MagioTV. Run: magio auth login') {
        super(message);
        this.name = 'NotAuthenticatedError';
    }
}

/**
 * Raised when the provider answers with `success: false`.
 */
export class UpstreamError extends Error {
    constructor(
        readonly operation: string,
        readonly upstreamMessage?: string,
    ) {
        super(`${operation} failed: ${upstreamMessage || 'unknown error'}`);
        this.name = 'UpstreamError';
    }
}

/**
 * Extracts a human-readable message from an unknown error value.
 * For AxiosErrors, prefers the API response body (which often contains
 * a more descriptive message than the generic HTTP status).
 */
export function errorMessage(error: unknown): string {
    if (error instanceof AxiosError) {
        if (error.response) {
            const data: unknown = error.response.data;
            if (typeof data === 'string' && data.length > 0) return data;
            if (data && typeof data === 'object') {
                if ('errorMessage' in data && typeof data.errorMessage === 'string') return data.errorMessage;
                if ('message' in data && typeof data.message === 'string') return data.message;
            }
            return `HTTP ${error.response.status || 'unknown'}`;
        }
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
            return `Request timed out (${error.message})`;
        }
    }
    return error instanceof Error ? error.message : String(error);
}
