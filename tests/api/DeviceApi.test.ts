/**
 * Tests for DeviceApi
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { DeviceApi, tallyDevices } from '../../src/api/DeviceApi.js';
import { HttpClient } from '../../src/client/HttpClient.js';
import { fakeUpstream, staticAuth, type Reply } from '../helpers.js';

const myDevices = {
    success: true,
    thisDevice: { id: 'd-1', name: 'Android TV' },
    smallScreenDevices: [{ id: 'd-2', name: 'Phone' }],
    stbAndBigScreenDevices: [{ id: 33, name: 'Living room' }, { id: 'd-4', name: 'Bedroom' }],
};

describe('DeviceApi', () => {
    let devicesReply: Reply;
    let deleteReply: Reply;
    let requests: ReturnType<typeof fakeUpstream>['requests'];
    let api: DeviceApi;

    beforeEach(() => {
        devicesReply = { data: myDevices };
        deleteReply = { data: { success: true } };
        const upstream = fakeUpstream((config) => (config.url === '/home/deleteDevice' ? deleteReply : devicesReply));
        requests = upstream.requests;
        api = new DeviceApi(new HttpClient({ baseUrl: 'https://czgo.magio.tv', auth: staticAuth }, upstream.instance));
    });

    it('should list this device, mobile devices and set-top boxes in order', async () => {
        expect(await api.getDevices()).toEqual([
            { id: 'd-1', name: 'Android TV', type: 'current', isThisDevice: true },
            { id: 'd-2', name: 'Phone', type: 'mobile', isThisDevice: false },
            { id: '33', name: 'Living room', type: 'stb', isThisDevice: false },
            { id: 'd-4', name: 'Bedroom', type: 'stb', isThisDevice: false },
        ]);
        expect(requests[0].url).toBe('/v2/home/my-devices');
    });

    it('should return an empty list when the account has no devices', async () => {
        devicesReply = { data: { success: true } };
        expect(await api.getDevices()).toEqual([]);
    });

    it('should find the current device and a device by id', async () => {
        expect((await api.getCurrentDevice())?.id).toBe('d-1');
        expect((await api.getDevice('33'))?.name).toBe('Living room');
        expect(await api.getDevice('missing')).toBeNull();
    });

    it('should count devices by type', async () => {
        expect(await api.countDevices()).toEqual({ total: 4, mobile: 1, stb: 2, other: 0 });
        expect(tallyDevices([])).toEqual({ total: 0, mobile: 0, stb: 0, other: 0 });
    });

    it('should count devices of no known type as other', () => {
        expect(
            tallyDevices([
                { id: 'd-1', name: 'Android TV', type: 'current', isThisDevice: true },
                { id: 'd-5', name: 'Car screen', type: 'other', isThisDevice: false },
            ]),
        ).toEqual({ total: 2, mobile: 0, stb: 0, other: 1 });
    });

    describe('deleteDevice', () => {
        it('should pass the device id', async () => {
            await api.deleteDevice('d-2');

            expect(requests[0].url).toBe('/home/deleteDevice');
            expect(requests[0].params).toEqual({ id: 'd-2' });
        });

        it('should raise the upstream error message', async () => {
            deleteReply = { data: { success: false, errorMessage: 'Device not found' } };

            await expect(api.deleteDevice('d-9')).rejects.toThrow('Device removal failed: Device not found');
        });
    });
});
