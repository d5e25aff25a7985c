/**
 * Device identity
 * Where the per-language device id (`dsid`) survives between logins
 */

import { readSavedConfig, updateSavedConfig } from '../utils/config.js';

export interface DeviceIdentityStore {
    load(language: string): string | null;
    save(language: string, deviceId: string): void;
}

/** Keeps ids for the lifetime of the process only */
export class MemoryDeviceIdentityStore implements DeviceIdentityStore {
    private readonly ids = new Map<string, string>();

    load(language: string): string | null {
        return this.ids.get(language) ?? null;
    }

    save(language: string, deviceId: string): void {
        this.ids.set(language, deviceId);
    }
}

/** Persists ids under `deviceIds.<lang>` in the saved config file */
export class ConfigDeviceIdentityStore implements DeviceIdentityStore {
    load(language: string): string | null {
        return readSavedConfig()?.deviceIds?.[language] ?? null;
    }

    save(language: string, deviceId: string): void {
        const current = readSavedConfig()?.deviceIds ?? {};
        if (current[language] === deviceId) return;
        updateSavedConfig({ deviceIds: { ...current, [language]: deviceId } });
    }
}
