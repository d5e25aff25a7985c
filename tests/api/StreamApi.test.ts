/**
 * Tests for StreamApi
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { StreamApi } from '../../src/api/StreamApi.js';
import type { EpgQuery, Program, ProgramMatch } from '../../src/api/EpgApi.js';
import { HttpClient } from '../../src/client/HttpClient.js';
import { Cache } from '../../src/client/Cache.js';
import { fakeUpstream, ManualClock, recordingLogger, staticAuth, type Reply } from '../helpers.js';

const DAY_MS = 86_400_000;

function program(scheduleId: number, startTime: number): Program {
    return {
        scheduleId,
        title: `Programme ${scheduleId}`,
        startTime,
        endTime: startTime + 3_600_000,
        description: '',
        duration: 3600,
        category: '',
        year: null,
        episode: null,
        images: [],
    };
}

const expectedHeaders = {
    Host: 'stream.example',
    'User-Agent': 'test-agent',
    Authorization: 'Bearer test-access',
    Accept: '*/*',
    Referer: 'https://czgo.magio.tv/',
};

describe('StreamApi', () => {
    let clock: ManualClock;
    let cache: Cache;
    let streamUrlReply: Reply;
    let match: ProgramMatch | null;
    let lookups: Array<[number | string, number, number]>;
    let guide: Record<string, Program[]>;
    let guideQueries: EpgQuery[];
    let requests: ReturnType<typeof fakeUpstream>['requests'];
    let api: StreamApi;

    beforeEach(() => {
        clock = new ManualClock();
        cache = new Cache({ clock, logger: recordingLogger() });
        streamUrlReply = { data: { success: true, url: 'https://stream.example/play/abc' } };
        match = null;
        lookups = [];
        guide = {};
        guideQueries = [];

        const upstream = fakeUpstream((config) =>
            config.url === '/v2/television/stream-url'
                ? streamUrlReply
                : { status: 302, headers: { location: 'https://cdn.example/abc/index.m3u8' } },
        );
        requests = upstream.requests;

        api = new StreamApi(
            new HttpClient({ baseUrl: 'https://czgo.magio.tv', auth: staticAuth }, upstream.instance),
            staticAuth,
            cache,
            {
                findProgramByTime: async (channelId, startSec, endSec) => {
                    lookups.push([channelId, startSec, endSec]);
                    return match;
                },
                getEpg: async (query = {}) => {
                    guideQueries.push(query);
                    return guide;
                },
            },
            { language: 'cz', quality: 'p5', deviceName: 'Android TV', deviceType: 'OTT_STB' },
            clock,
        );
    });

    describe('getLiveStream', () => {
        it('should resolve the stream URL and follow one redirect hop', async () => {
            const stream = await api.getLiveStream(5);

            expect(stream).toEqual({
                url: 'https://cdn.example/abc/index.m3u8',
                headers: expectedHeaders,
                contentType: 'application/vnd.apple.mpegurl',
                isLive: true,
            });
            expect(requests[0].params).toEqual({
                service: 'LIVE',
                id: 5,
                start: 'LIVE',
                end: 'END',
                device: 'OTT_PC_HD_1080p_v2',
                name: 'Android TV',
                devtype: 'OTT_STB',
                prof: 'p5',
                ecid: '',
                drm: 'widevine',
            });
            expect(requests[0].headers.get('Referer')).toBe('https://czgo.magio.tv/');
            expect(requests[0].timeout).toBe(10000);
            expect(requests[1].url).toBe('https://stream.example/play/abc');
            expect(requests[1].headers.get('Host')).toBe('stream.example');
            expect(requests[1].timeout).toBe(10000);
        });

        it('should cache the stream for one minute', async () => {
            await api.getLiveStream(5);
            clock.advance(59_000);
            await api.getLiveStream(5);
            expect(requests).toHaveLength(2);
            expect(cache.has('stream_cz_5_p5')).toBe(true);

            clock.advance(1_000);
            await api.getLiveStream(5);
            expect(requests).toHaveLength(4);
        });

        it('should raise the upstream error and cache nothing', async () => {
            streamUrlReply = { data: { success: false, errorMessage: 'Channel not subscribed' } };

            await expect(api.getLiveStream(5)).rejects.toThrow('Stream URL failed: Channel not subscribed');
            expect(cache.has('stream_cz_5_p5')).toBe(false);
            expect(requests).toHaveLength(1);
        });

        it('should treat a missing URL as a failure', async () => {
            streamUrlReply = { data: { success: true } };

            await expect(api.getLiveStream(5)).rejects.toThrow('Stream URL failed: unknown error');
        });
    });

    describe('getCatchupStream', () => {
        it('should request the archive service and cache for ten minutes', async () => {
            const stream = await api.getCatchupStream(900);

            expect(stream.isLive).toBe(false);
            expect(stream.url).toBe('https://cdn.example/abc/index.m3u8');
            expect(requests[0].params).toEqual({
                service: 'ARCHIVE',
                id: 900,
                name: 'Android TV',
                devtype: 'OTT_STB',
                prof: 'p5',
                ecid: '',
                drm: 'widevine',
            });
            expect(cache.info().expiresIn['catchup_stream_cz_900_p5']).toBe(600);
        });
    });

    describe('getCatchupByTime', () => {
        it('should look up the programme and resolve its archive stream', async () => {
            match = {
                scheduleId: 900,
                program: {
                    scheduleId: 900,
                    title: 'Evening',
                    startTime: 1_699_990_000_000,
                    endTime: 1_699_993_600_000,
                    description: '',
                    duration: 3600,
                    category: '',
                    year: null,
                    episode: null,
                    images: [],
                },
            };

            const stream = await api.getCatchupByTime(5, 1_699_990_000, 1_699_993_600);

            expect(lookups).toEqual([[5, 1_699_990_000, 1_699_993_600]]);
            expect(stream.isLive).toBe(false);
            expect(requests[0].params.id).toBe(900);
        });

        it('should fail when no programme matches', async () => {
            await expect(api.getCatchupByTime(5, 1_699_990_000, 1_699_993_600)).rejects.toThrow(
                'Catch-up lookup failed: no programme on channel 5 in that time range',
            );
            expect(requests).toHaveLength(0);
        });
    });

    describe('getCatchupAvailability', () => {
        it('should report the age of the oldest archived programme over the past week', async () => {
            guide = {
                '5': [program(1, clock.now() - DAY_MS), program(2, clock.now() - 6.5 * DAY_MS), program(3, clock.now())],
            };

            expect(await api.getCatchupAvailability(5)).toEqual({
                hasArchive: true,
                daysAvailable: 6.5,
                programsCount: 3,
            });
            expect(guideQueries).toEqual([{ channelId: 5, daysBack: 7, daysForward: 0 }]);
            expect(requests).toHaveLength(0);
        });

        it('should report no archive when the guide lists nothing for the channel', async () => {
            guide = { '6': [program(1, clock.now() - DAY_MS)] };

            expect(await api.getCatchupAvailability(5)).toEqual({
                hasArchive: false,
                daysAvailable: 0,
                programsCount: 0,
            });
        });
    });
});
