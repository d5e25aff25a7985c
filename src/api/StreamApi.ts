/**
 * Stream API
 * Resolves playable live and catch-up URLs
 */

import { STREAM_TIMEOUT_MS, type AuthHeaderSource, type HttpClient } from '../client/HttpClient.js';
import type { Cache } from '../client/Cache.js';
import type { EpgApi } from './EpgApi.js';
import type { StreamQuality } from '../utils/config.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { NotAuthenticatedError, UpstreamError } from '../utils/errors.js';

const STREAM_URL_PATH = '/v2/television/stream-url';
export const LIVE_STREAM_TTL_SECONDS = 60;
export const CATCHUP_STREAM_TTL_SECONDS = 600;
/** How far back the archive is probed */
export const CATCHUP_WINDOW_DAYS = 7;
const DAY_MS = 86_400_000;

export interface Stream {
    url: string;
    /** Headers a player must send to fetch the stream */
    headers: Record<string, string>;
    contentType: string;
    isLive: boolean;
}

export interface CatchupAvailability {
    hasArchive: boolean;
    /** Age of the oldest archived programme, in days to one decimal */
    daysAvailable: number;
    programsCount: number;
}

export interface StreamApiConfig {
    language: string;
    quality: StreamQuality;
    deviceName: string;
    deviceType: string;
}

interface StreamUrlResponse {
    success?: boolean;
    errorMessage?: string;
    url?: string;
}

export class StreamApi {
    constructor(
        private readonly http: Pick<HttpClient, 'get' | 'resolveRedirect'>,
        private readonly auth: AuthHeaderSource,
        private readonly cache: Cache,
        private readonly epg: Pick<EpgApi, 'findProgramByTime' | 'getEpg'>,
        private readonly config: StreamApiConfig,
        private readonly clock: Clock = systemClock,
    ) { }

    async getLiveStream(channelId: number | string): Promise<Stream> {
        const { language, quality } = this.config;
        const stream = await this.cache.getOrFetch(
            `stream_${language}_${channelId}_${quality}`,
            () =>
                this.resolve(
                    {
                        service: 'LIVE',
                        id: Number(channelId),
                        start: 'LIVE',
                        end: 'END',
                        device: 'OTT_PC_HD_1080p_v2',
                    },
                    true,
                ),
            LIVE_STREAM_TTL_SECONDS,
        );
        if (!stream) throw new UpstreamError('Live stream', `no stream for channel ${channelId}`);
        return stream;
    }

    async getCatchupStream(scheduleId: number | string): Promise<Stream> {
        const { language, quality } = this.config;
        const stream = await this.cache.getOrFetch(
            `catchup_stream_${language}_${scheduleId}_${quality}`,
            () => this.resolve({ service: 'ARCHIVE', id: Number(scheduleId) }, false),
            CATCHUP_STREAM_TTL_SECONDS,
        );
        if (!stream) throw new UpstreamError('Catch-up stream', `no stream for schedule ${scheduleId}`);
        return stream;
    }

    /**
     * Catch-up stream for the programme airing on a channel between two
     * Unix-second timestamps
     */
    async getCatchupByTime(channelId: number | string, startSec: number, endSec: number): Promise<Stream> {
        const match = await this.epg.findProgramByTime(channelId, startSec, endSec);
        if (!match) {
            throw new UpstreamError('Catch-up lookup', `no programme on channel ${channelId} in that time range`);
        }
        return this.getCatchupStream(match.scheduleId);
    }

    /** How much of a channel's past week the guide still lists */
    async getCatchupAvailability(channelId: number | string): Promise<CatchupAvailability> {
        const guide = await this.epg.getEpg({ channelId, daysBack: CATCHUP_WINDOW_DAYS, daysForward: 0 });
        const programs = guide[String(channelId)] ?? [];
        if (programs.length === 0) {
            return { hasArchive: false, daysAvailable: 0, programsCount: 0 };
        }

        const oldest = Math.min(...programs.map((p) => p.startTime));
        const days = (this.clock.now() - oldest) / DAY_MS;
        return {
            hasArchive: true,
            daysAvailable: Math.round(days * 10) / 10,
            programsCount: programs.length,
        };
    }

    private async resolve(params: Record<string, string | number>, isLive: boolean): Promise<Stream> {
        const referer = `https://${this.config.language}go.magio.tv/`;

        const response = await this.http.get<StreamUrlResponse>(STREAM_URL_PATH, {
            params: {
                ...params,
                name: this.config.deviceName,
                devtype: this.config.deviceType,
                prof: this.config.quality,
                ecid: '',
                drm: 'widevine',
            },
            headers: { Accept: '*/*', Referer: referer },
            timeout: STREAM_TIMEOUT_MS,
        });
        if (response.success !== true || !response.url) {
            throw new UpstreamError('Stream URL', response.errorMessage);
        }

        const auth = await this.auth.getAuthHeaders();
        if (!auth) throw new NotAuthenticatedError();

        const headers: Record<string, string> = {
            Host: new URL(response.url).host,
            'User-Agent': auth['User-Agent'],
            Authorization: auth.Authorization,
            Accept: '*/*',
            Referer: referer,
        };
        const target = await this.http.resolveRedirect(response.url, headers);

        return { url: target.url, headers, contentType: target.contentType, isLive };
    }
}
