/**
 * MCP Tool Registrar: Stream tools
 * get_live_stream, get_catchup_stream, get_catchup_by_time, get_catchup_availability
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { MagioClient } from '../../client/MagioClient.js';
import { jsonResult, mcpError } from './shared.js';

export function registerStreamTools(server: McpServer, client: MagioClient) {
    server.registerTool(
        'get_live_stream',
        {
            title: 'Live Stream',
            description:
                'Resolves the playable HLS URL for a channel\'s live broadcast, with the headers a player must send. URLs are short-lived and cached for one minute.',
            inputSchema: {
                channelId: z.number().int().describe('Channel id'),
            },
            annotations: { readOnlyHint: true },
        },
        async ({ channelId }) => {
            try {
                return jsonResult(await client.streams.getLiveStream(channelId));
            } catch (error) {
                return mcpError(error);
            }
        },
    );

    server.registerTool(
        'get_catchup_stream',
        {
            title: 'Catch-up Stream',
            description: 'Resolves the archive stream for a programme by its scheduleId from the guide.',
            inputSchema: {
                scheduleId: z.number().int().describe('Schedule id from get_epg'),
            },
            annotations: { readOnlyHint: true },
        },
        async ({ scheduleId }) => {
            try {
                return jsonResult(await client.streams.getCatchupStream(scheduleId));
            } catch (error) {
                return mcpError(error);
            }
        },
    );

    server.registerTool(
        'get_catchup_by_time',
        {
            title: 'Catch-up Stream by Time',
            description:
                'Finds the programme that aired on a channel within a time range and resolves its archive stream. Times are Unix seconds.',
            inputSchema: {
                channelId: z.number().int().describe('Channel id'),
                start: z.number().int().describe('Range start, Unix seconds'),
                end: z.number().int().describe('Range end, Unix seconds'),
            },
            annotations: { readOnlyHint: true },
        },
        async ({ channelId, start, end }) => {
            try {
                return jsonResult(await client.streams.getCatchupByTime(channelId, start, end));
            } catch (error) {
                return mcpError(error);
            }
        },
    );

    server.registerTool(
        'get_catchup_availability',
        {
            title: 'Catch-up Availability',
            description:
                'Reports whether a channel has an archive, how many days back it reaches and how many programmes the guide lists for the past week.',
            inputSchema: {
                channelId: z.number().int().describe('Channel id'),
            },
            annotations: { readOnlyHint: true },
        },
        async ({ channelId }) => {
            try {
                return jsonResult(await client.streams.getCatchupAvailability(channelId));
            } catch (error) {
                return mcpError(error);
            }
        },
    );
}
