/**
 * Channel API
 * Live channel list, categories (groups) and lookups
 */

import type { HttpClient } from '../client/HttpClient.js';
import type { Cache } from '../client/Cache.js';
import { UpstreamError } from '../utils/errors.js';

export const DEFAULT_GROUP = 'Other';

export interface Channel {
    id: number;
    name: string;
    originalName: string;
    logo: string;
    group: string;
    hasArchive: boolean;
}

/** Raw response shape from /home/categories */
interface CategoriesResponse {
    categories?: Array<{
        name: string;
        channels?: Array<{ channelId: number }>;
    }>;
}

/** Raw response shape from /v2/television/channels */
interface ChannelsResponse {
    success?: boolean;
    errorMessage?: string;
    items?: Array<{
        channel?: {
            channelId: number;
            name?: string;
            originalName?: string;
            logoUrl?: string;
            hasArchive?: boolean;
        };
    }>;
}

export class ChannelApi {
    constructor(
        private readonly http: Pick<HttpClient, 'get'>,
        private readonly cache: Cache,
        private readonly language: string,
        private readonly cacheTtlSeconds?: number,
    ) { }

    async getChannels(): Promise<Channel[]> {
        const channels = await this.cache.getOrFetch(
            `channels_${this.language}`,
            () => this.fetchChannels(),
            this.cacheTtlSeconds,
        );
        return channels ?? [];
    }

    async getChannel(channelId: number | string): Promise<Channel | null> {
        return this.cache.getOrFetch(
            `channel_${this.language}_${channelId}`,
            async () => {
                const channels = await this.getChannels();
                return channels.find((c) => String(c.id) === String(channelId)) ?? null;
            },
            this.cacheTtlSeconds,
        );
    }

    /** Sorted, de-duplicated group names */
    async getGroups(): Promise<string[]> {
        const groups = await this.cache.getOrFetch(
            `channel_groups_${this.language}`,
            async () => {
                const channels = await this.getChannels();
                if (channels.length === 0) return null;
                return [...new Set(channels.map((c) => c.group))].sort();
            },
            this.cacheTtlSeconds,
        );
        return groups ?? [];
    }

    async getChannelsByGroup(groupName: string): Promise<Channel[]> {
        const group = groupName.toLowerCase();
        const channels = await this.cache.getOrFetch(
            `channels_group_${this.language}_${group}`,
            async () => {
                const all = await this.getChannels();
                if (all.length === 0) return null;
                return all.filter((c) => c.group.toLowerCase() === group);
            },
            this.cacheTtlSeconds,
        );
        return channels ?? [];
    }

    /**
     * Case-insensitive match on name or original name
     */
    async search(term: string): Promise<Channel[]> {
        if (!term) return [];
        const needle = term.toLowerCase();
        const channels = await this.getChannels();
        return channels.filter(
            (c) => c.name.toLowerCase().includes(needle) || c.originalName.toLowerCase().includes(needle),
        );
    }

    /** Drop every cached channel lookup for this language */
    clearCache(): number {
        return (
            this.cache.clear(`channels_${this.language}`) +
            this.cache.clear(`channel_groups_${this.language}`) +
            this.cache.clear(`channel_${this.language}_*`) +
            this.cache.clear(`channels_group_${this.language}_*`)
        );
    }

    private async fetchChannels(): Promise<Channel[] | null> {
        const categories = await this.http.get<CategoriesResponse>('/home/categories', {
            params: { language: this.language },
        });

        const groupByChannel = new Map<number, string>();
        for (const category of categories.categories ?? []) {
            for (const channel of category.channels ?? []) {
                groupByChannel.set(channel.channelId, category.name);
            }
        }

        const response = await this.http.get<ChannelsResponse>('/v2/television/channels', {
            params: { list: 'LIVE', queryScope: 'LIVE' },
        });
        if (response.success === false) {
            throw new UpstreamError('Channel list', response.errorMessage);
        }

        const channels: Channel[] = [];
        for (const item of response.items ?? []) {
            const raw = item.channel;
            if (!raw) continue;
            channels.push({
                id: raw.channelId,
                name: raw.name ?? '',
                originalName: raw.originalName || raw.name || '',
                logo: raw.logoUrl ?? '',
                group: groupByChannel.get(raw.channelId) ?? DEFAULT_GROUP,
                hasArchive: raw.hasArchive ?? false,
            });
        }

        // Empty lists are not cached so the next call asks again
        return channels.length > 0 ? channels : null;
    }
}
