/**
 * Device API
 * Devices registered on the account
 */

import type { HttpClient } from '../client/HttpClient.js';
import { UpstreamError } from '../utils/errors.js';

export type DeviceKind = 'current' | 'mobile' | 'stb' | 'other';

export interface Device {
    id: string;
    name: string;
    type: DeviceKind;
    isThisDevice: boolean;
}

export interface DeviceCounts {
    total: number;
    mobile: number;
    stb: number;
    other: number;
}

interface RawDevice {
    id: string | number;
    name?: string;
}

interface MyDevicesResponse {
    success?: boolean;
    errorMessage?: string;
    thisDevice?: RawDevice;
    smallScreenDevices?: RawDevice[];
    stbAndBigScreenDevices?: RawDevice[];
}

interface DeleteDeviceResponse {
    success?: boolean;
    errorMessage?: string;
}

function toDevice(raw: RawDevice, type: DeviceKind): Device {
    return { id: String(raw.id), name: raw.name ?? '', type, isThisDevice: type === 'current' };
}

/** Per-type counts; the current device counts toward the total only */
export function tallyDevices(devices: Device[]): DeviceCounts {
    return {
        total: devices.length,
        mobile: devices.filter((d) => d.type === 'mobile').length,
        stb: devices.filter((d) => d.type === 'stb').length,
        other: devices.filter((d) => d.type === 'other').length,
    };
}

export class DeviceApi {
    constructor(private readonly http: Pick<HttpClient, 'get'>) { }

    /** This device first, then mobile devices, then set-top boxes and TVs */
    async getDevices(): Promise<Device[]> {
        const response = await this.http.get<MyDevicesResponse>('/v2/home/my-devices');
        if (response.success === false) {
            throw new UpstreamError('Device list', response.errorMessage);
        }

        const devices: Device[] = [];
        if (response.thisDevice) devices.push(toDevice(response.thisDevice, 'current'));
        for (const raw of response.smallScreenDevices ?? []) devices.push(toDevice(raw, 'mobile'));
        for (const raw of response.stbAndBigScreenDevices ?? []) devices.push(toDevice(raw, 'stb'));
        return devices;
    }

    async deleteDevice(deviceId: string): Promise<void> {
        const response = await this.http.get<DeleteDeviceResponse>('/home/deleteDevice', {
            params: { id: deviceId },
        });
        if (response.success !== true) {
            throw new UpstreamError('Device removal', response.errorMessage);
        }
    }

    async getCurrentDevice(): Promise<Device | null> {
        const devices = await this.getDevices();
        return devices.find((d) => d.isThisDevice) ?? null;
    }

    async getDevice(deviceId: string): Promise<Device | null> {
        const devices = await this.getDevices();
        return devices.find((d) => d.id === deviceId) ?? null;
    }

    async countDevices(): Promise<DeviceCounts> {
        return tallyDevices(await this.getDevices());
    }
}
