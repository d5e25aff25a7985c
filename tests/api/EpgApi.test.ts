/**
 * Tests for EpgApi
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { EpgApi } from '../../src/api/EpgApi.js';
import type { Channel } from '../../src/api/ChannelApi.js';
import { HttpClient } from '../../src/client/HttpClient.js';
import { fakeUpstream, ManualClock, staticAuth, type Reply } from '../helpers.js';

// 2023-11-14T22:13:20Z
const NOW = 1_700_000_000_000;
const MIN = 60_000;

function rawProgram(scheduleId: number, startOffsetMin: number, endOffsetMin: number, title: string) {
    return {
        scheduleId,
        startTimeUTC: NOW + startOffsetMin * MIN,
        endTimeUTC: NOW + endOffsetMin * MIN,
        program: {
            title,
            description: `${title} description`,
            programCategory: { desc: 'News' },
            programValue: { creationYear: 2023, episodeId: 'E1' },
            images: ['https://img.example/p.jpg'],
        },
    };
}

const earlier = rawProgram(100, -90, -30, 'Morning');
const current = rawProgram(101, -30, 30, 'Evening');
const next = rawProgram(102, 30, 90, 'Night');
const later = rawProgram(103, 90, 150, 'Late');

function channel(id: number): Channel {
    return { id, name: `Channel ${id}`, originalName: `Channel ${id}`, logo: '', group: 'Other', hasArchive: true };
}

describe('EpgApi', () => {
    let reply: Reply;
    let requests: ReturnType<typeof fakeUpstream>['requests'];
    let knownChannels: Channel[];
    let api: EpgApi;

    beforeEach(() => {
        reply = { data: { success: true, items: [{ channel: { id: 1 }, programs: [earlier, current, later, next] }] } };
        knownChannels = [channel(1), channel(2)];

        const upstream = fakeUpstream(() => reply);
        requests = upstream.requests;
        api = new EpgApi(
            new HttpClient({ baseUrl: 'https://czgo.magio.tv', auth: staticAuth }, upstream.instance),
            { getChannels: async () => knownChannels },
            'cz',
            new ManualClock(NOW),
        );
    });

    describe('getEpg', () => {
        it('should query one channel over whole UTC days', async () => {
            await api.getEpg({ channelId: 1 });

            expect(requests[0].url).toBe('/v2/television/epg');
            expect(requests[0].params).toEqual({
                filter: 'channel.id==1 and startTime=ge=2023-11-13T00:00:00.000Z and endTime=le=2023-11-15T23:59:59.000Z',
                limit: 1000,
                offset: 0,
                lang: 'CZ',
            });
        });

        it('should query every known channel when none is given', async () => {
            await api.getEpg({ daysBack: 0, daysForward: 2 });

            expect(requests[0].params.filter).toBe(
                'channel.id=in=(1,2) and startTime=ge=2023-11-14T00:00:00.000Z and endTime=le=2023-11-16T23:59:59.000Z',
            );
        });

        it('should keep programmes of a channel whose id is 0', async () => {
            reply = { data: { success: true, items: [{ channel: { id: 0 }, programs: [current] }, { programs: [later] }] } };

            const guide = await api.getEpg({ channelId: 0 });

            expect(Object.keys(guide)).toEqual(['0']);
            expect(guide['0'].map((p) => p.scheduleId)).toEqual([101]);
        });

        it('should return an empty guide without a request when there are no channels', async () => {
            knownChannels = [];

            expect(await api.getEpg()).toEqual({});
            expect(requests).toHaveLength(0);
        });

        it('should group programmes by channel id', async () => {
            reply = {
                data: {
                    items: [
                        { channel: { id: 1 }, programs: [current] },
                        { channel: { id: 2 }, programs: [next] },
                        { programs: [later] },
                    ],
                },
            };

            const guide = await api.getEpg();

            expect(Object.keys(guide)).toEqual(['1', '2']);
            expect(guide['1']).toEqual([
                {
                    scheduleId: 101,
                    title: 'Evening',
                    startTime: NOW - 30 * MIN,
                    endTime: NOW + 30 * MIN,
                    description: 'Evening description',
                    duration: 3600,
                    category: 'News',
                    year: 2023,
                    episode: 'E1',
                    images: ['https://img.example/p.jpg'],
                },
            ]);
            expect(guide['2'].map((p) => p.scheduleId)).toEqual([102]);
        });

        it('should fill defaults for sparse programmes', async () => {
            reply = {
                data: { items: [{ channel: { id: 1 }, programs: [{ scheduleId: 7, startTimeUTC: NOW, endTimeUTC: NOW + 90_500 }] }] },
            };

            const guide = await api.getEpg({ channelId: 1 });

            expect(guide['1']).toEqual([
                {
                    scheduleId: 7,
                    title: '',
                    startTime: NOW,
                    endTime: NOW + 90_500,
                    description: '',
                    duration: 90,
                    category: '',
                    year: null,
                    episode: null,
                    images: [],
                },
            ]);
        });

        it('should raise the upstream error message', async () => {
            reply = { data: { success: false, errorMessage: 'Bad filter' } };

            await expect(api.getEpg({ channelId: 1 })).rejects.toThrow('EPG query failed: Bad filter');
        });
    });

    describe('findProgramByTime', () => {
        it('should return the first programme overlapping the range', async () => {
            const nowSec = NOW / 1000;

            const match = await api.findProgramByTime(1, nowSec - 600, nowSec + 600);

            expect(match?.scheduleId).toBe(101);
            expect(match?.program.title).toBe('Evening');
            expect(requests[0].params).toEqual({
                filter: 'channel.id==1 and startTime=ge=2023-11-14T22:03:20.000Z and endTime=le=2023-11-14T22:23:20.000Z',
                limit: 10,
                offset: 0,
                lang: 'CZ',
            });
        });

        it('should return null when nothing overlaps', async () => {
            reply = { data: { items: [{ channel: { id: 1 }, programs: [earlier] }] } };
            const nowSec = NOW / 1000;

            expect(await api.findProgramByTime(1, nowSec, nowSec + 60)).toBeNull();
        });
    });

    it('should find the programme airing now', async () => {
        expect((await api.getCurrentProgram(1))?.scheduleId).toBe(101);
    });

    it('should return null when nothing airs now', async () => {
        reply = { data: { items: [{ channel: { id: 1 }, programs: [earlier, next] }] } };
        expect(await api.getCurrentProgram(1)).toBeNull();
    });

    it('should list programmes that have not started, soonest first', async () => {
        expect((await api.getUpcoming(1)).map((p) => p.scheduleId)).toEqual([102, 103]);
        expect((await api.getUpcoming(1, 1)).map((p) => p.scheduleId)).toEqual([102]);
    });
});
