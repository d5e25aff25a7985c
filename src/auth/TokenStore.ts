/**
 * Token Storage Interface
 */

export interface TokenSet {
    accessToken: string | null;
    refreshToken: string | null;
    /** Unix timestamp ms; only meaningful while accessToken is set */
    expiresAt: number;
    deviceId: string;
}

export function loggedOutTokens(deviceId: string): TokenSet {
    return { accessToken: null, refreshToken: null, expiresAt: 0, deviceId };
}

/**
 * Durable mirror of the latest TokenSet, one record per language.
 * Implementations log their failures and never throw.
 */
export interface TokenStore {
    load(language: string): Promise<TokenSet | null>;
    /** Resolves false when the record could not be written */
    save(tokens: TokenSet, language: string): Promise<boolean>;
    /** Resolves true when no record is left behind, including when none existed */
    delete(language: string): Promise<boolean>;
}

/** Store used when persistence is disabled */
export class NullTokenStore implements TokenStore {
    async load(): Promise<TokenSet | null> {
        return null;
    }

    async save(): Promise<boolean> {
        return true;
    }

    async delete(): Promise<boolean> {
        return true;
    }
}
