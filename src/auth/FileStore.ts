/**
 * File Token Store
 * One JSON record per language at <dataDir>/token_<lang>.json
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { TokenStore, TokenSet } from './TokenStore.js';
import { AuthError } from './AuthError.js';
import { createLogger, type Logger } from '../utils/logger.js';

const tokenRecordSchema = z.object({
    access_token: z.string().nullable(),
    refresh_token: z.string().nullable(),
    /** Unix timestamp in (fractional) seconds */
    expires: z.number(),
    device_id: z.string().min(1),
});

type TokenRecord = z.infer<typeof tokenRecordSchema>;

export class FileStore implements TokenStore {
    private readonly logger: Logger;

    constructor(
        private readonly dataDir: string,
        logger?: Logger,
    ) {
        this.logger = logger ?? createLogger('token-store');
    }

    filePath(language: string): string {
        return path.join(this.dataDir, `token_${language}.json`);
    }

    async save(tokens: TokenSet, language: string): Promise<boolean> {
        const record: TokenRecord = {
            access_token: tokens.accessToken,
            refresh_token: tokens.refreshToken,
            expires: tokens.expiresAt / 1000,
            device_id: tokens.deviceId,
        };

        try {
            fs.mkdirSync(this.dataDir, { recursive: true, mode: 0o700 });
            fs.writeFileSync(this.filePath(language), JSON.stringify(record), { mode: 0o600 });
            this.logger.debug(`Tokens saved to ${this.filePath(language)}`);
            return true;
        } catch (error) {
            this.report(new AuthError('persistence', `Could not save tokens: ${describe(error)}`, { cause: error }));
            return false;
        }
    }

    async load(language: string): Promise<TokenSet | null> {
        const file = this.filePath(language);
        if (!fs.existsSync(file)) {
            return null;
        }

        try {
            const parsed = tokenRecordSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf8')));
            if (!parsed.success) {
                this.report(new AuthError('persistence', `Ignoring malformed token file ${file}`));
                return null;
            }

            const record = parsed.data;
            return {
                accessToken: record.access_token,
                refreshToken: record.refresh_token,
                expiresAt: Math.round(record.expires * 1000),
                deviceId: record.device_id,
            };
        } catch (error) {
            this.report(new AuthError('persistence', `Could not read ${file}: ${describe(error)}`, { cause: error }));
            return null;
        }
    }

    async delete(language: string): Promise<boolean> {
        const file = this.filePath(language);
        try {
            fs.rmSync(file, { force: true });
            return true;
        } catch (error) {
            this.report(new AuthError('persistence', `Could not delete ${file}: ${describe(error)}`, { cause: error }));
            return false;
        }
    }

    private report(error: AuthError): void {
        this.logger.warn(error.message);
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
