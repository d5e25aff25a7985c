/**
 * Auth errors
 * Failure taxonomy of the token lifecycle
 */

export type AuthErrorKind =
    /** Missing credentials; never retried */
    | 'config'
    /** Network failure, timeout or non-2xx response */
    | 'transport'
    /** `success: false` or a body missing expected fields */
    | 'protocol'
    /** Token file could not be read, written or deleted */
    | 'persistence';

export class AuthError extends Error {
    constructor(
        readonly kind: AuthErrorKind,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'AuthError';
    }
}
