/**
 * EPG API
 * Programme guide queries against /v2/television/epg
 */

import type { HttpClient } from '../client/HttpClient.js';
import type { ChannelApi } from './ChannelApi.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { UpstreamError } from '../utils/errors.js';

const EPG_PATH = '/v2/television/epg';
const DAY_MS = 86_400_000;

export interface Program {
    scheduleId: number;
    title: string;
    /** Epoch milliseconds */
    startTime: number;
    /** Epoch milliseconds */
    endTime: number;
    description: string;
    /** Seconds */
    duration: number;
    category: string;
    year: number | null;
    episode: string | null;
    images: string[];
}

export interface EpgQuery {
    channelId?: number | string;
    daysBack?: number;
    daysForward?: number;
}

export interface ProgramMatch {
    scheduleId: number;
    program: Program;
}

interface EpgResponse {
    success?: boolean;
    errorMessage?: string;
    items?: Array<{
        channel?: { id?: number };
        programs?: Array<{
            scheduleId: number;
            startTimeUTC: number;
            endTimeUTC: number;
            program?: {
                title?: string;
                description?: string;
                programCategory?: { desc?: string };
                programValue?: { creationYear?: number; episodeId?: string };
                images?: string[];
            };
        }>;
    }>;
}

type RawProgram = NonNullable<NonNullable<EpgResponse['items']>[number]['programs']>[number];

/** `YYYY-MM-DDT00:00:00.000Z` for the UTC day containing `ms` */
function dayStart(ms: number): string {
    return `${new Date(ms).toISOString().slice(0, 10)}T00:00:00.000Z`;
}

function dayEnd(ms: number): string {
    return `${new Date(ms).toISOString().slice(0, 10)}T23:59:59.000Z`;
}

function toProgram(raw: RawProgram): Program {
    const info = raw.program ?? {};
    return {
        scheduleId: raw.scheduleId,
        title: info.title ?? '',
        startTime: raw.startTimeUTC,
        endTime: raw.endTimeUTC,
        description: info.description ?? '',
        duration: Math.floor((raw.endTimeUTC - raw.startTimeUTC) / 1000),
        category: info.programCategory?.desc ?? '',
        year: info.programValue?.creationYear ?? null,
        episode: info.programValue?.episodeId ?? null,
        images: info.images ?? [],
    };
}

export class EpgApi {
    constructor(
        private readonly http: Pick<HttpClient, 'get'>,
        private readonly channels: Pick<ChannelApi, 'getChannels'>,
        private readonly language: string,
        private readonly clock: Clock = systemClock,
    ) { }

    /**
     * Programmes grouped by channel id. Without a channel id every known
     * channel is queried; no channels means an empty guide.
     */
    async getEpg(query: EpgQuery = {}): Promise<Record<string, Program[]>> {
        const { channelId, daysBack = 1, daysForward = 1 } = query;
        const now = this.clock.now();
        const window = `startTime=ge=${dayStart(now - daysBack * DAY_MS)} and endTime=le=${dayEnd(now + daysForward * DAY_MS)}`;

        let channelFilter: string;
        if (channelId !== undefined) {
            channelFilter = `channel.id==${channelId}`;
        } else {
            const channels = await this.channels.getChannels();
            if (channels.length === 0) return {};
            channelFilter = `channel.id=in=(${channels.map((c) => c.id).join(',')})`;
        }

        const response = await this.query(`${channelFilter} and ${window}`, 1000);

        const guide: Record<string, Program[]> = {};
        for (const item of response.items ?? []) {
            const id = item.channel?.id;
            if (id === undefined) continue;
            const programs = (guide[String(id)] ??= []);
            for (const raw of item.programs ?? []) {
                programs.push(toProgram(raw));
            }
        }
        return guide;
    }

    /**
     * First programme on the channel overlapping [startSec, endSec].
     * Times are Unix seconds.
     */
    async findProgramByTime(channelId: number | string, startSec: number, endSec: number): Promise<ProgramMatch | null> {
        const start = new Date(Math.floor(startSec) * 1000).toISOString();
        const end = new Date(Math.floor(endSec) * 1000).toISOString();
        const response = await this.query(
            `channel.id==${channelId} and startTime=ge=${start} and endTime=le=${end}`,
            10,
        );

        for (const item of response.items ?? []) {
            for (const raw of item.programs ?? []) {
                if (raw.startTimeUTC / 1000 <= endSec && raw.endTimeUTC / 1000 >= startSec) {
                    return { scheduleId: raw.scheduleId, program: toProgram(raw) };
                }
            }
        }
        return null;
    }

    /** The programme airing right now, if the guide has one */
    async getCurrentProgram(channelId: number | string): Promise<Program | null> {
        const now = this.clock.now();
        const programs = await this.channelPrograms(channelId, 0, 0);
        return programs.find((p) => p.startTime <= now && now < p.endTime) ?? null;
    }

    /** Next `count` programmes that have not started yet, soonest first */
    async getUpcoming(channelId: number | string, count: number = 5): Promise<Program[]> {
        const now = this.clock.now();
        const programs = await this.channelPrograms(channelId, 0, 1);
        return programs
            .filter((p) => p.startTime > now)
            .sort((a, b) => a.startTime - b.startTime)
            .slice(0, count);
    }

    private async channelPrograms(channelId: number | string, daysBack: number, daysForward: number): Promise<Program[]> {
        const guide = await this.getEpg({ channelId, daysBack, daysForward });
        return guide[String(channelId)] ?? [];
    }

    private async query(filter: string, limit: number): Promise<EpgResponse> {
        const response = await this.http.get<EpgResponse>(EPG_PATH, {
            params: { filter, limit, offset: 0, lang: this.language.toUpperCase() },
        });
        if (response.success === false) {
            throw new UpstreamError('EPG query', response.errorMessage);
        }
        return response;
    }
}
