/**
 * MCP Tool Registrar: EPG tools
 * get_epg, get_current_program, get_upcoming_programs
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { MagioClient } from '../../client/MagioClient.js';
import { jsonResult, mcpError } from './shared.js';

export function registerEpgTools(server: McpServer, client: MagioClient) {
    server.registerTool(
        'get_epg',
        {
            title: 'Get Programme Guide',
            description:
                'Returns the programme guide grouped by channel id. Each programme has a scheduleId (usable with get_catchup_stream), title, start and end as epoch milliseconds, duration in seconds, category and description. Omit channelId to query every channel.',
            inputSchema: {
                channelId: z.number().int().optional().describe('Channel id from list_channels'),
                daysBack: z.number().int().min(0).max(7).optional().describe('Days into the past (default 1)'),
                daysForward: z.number().int().min(0).max(7).optional().describe('Days into the future (default 1)'),
            },
            annotations: { readOnlyHint: true },
        },
        async ({ channelId, daysBack, daysForward }) => {
            try {
                return jsonResult(await client.epg.getEpg({ channelId, daysBack, daysForward }));
            } catch (error) {
                return mcpError(error);
            }
        },
    );

    server.registerTool(
        'get_current_program',
        {
            title: 'Current Programme',
            description: 'Returns the programme airing right now on a channel, or null when the guide has nothing.',
            inputSchema: {
                channelId: z.number().int().describe('Channel id'),
            },
            annotations: { readOnlyHint: true },
        },
        async ({ channelId }) => {
            try {
                return jsonResult(await client.epg.getCurrentProgram(channelId));
            } catch (error) {
                return mcpError(error);
            }
        },
    );

    server.registerTool(
        'get_upcoming_programs',
        {
            title: 'Upcoming Programmes',
            description: 'Returns the next programmes on a channel that have not started yet, soonest first.',
            inputSchema: {
                channelId: z.number().int().describe('Channel id'),
                count: z.number().int().min(1).max(50).optional().describe('How many (default 5)'),
            },
            annotations: { readOnlyHint: true },
        },
        async ({ channelId, count }) => {
            try {
                return jsonResult(await client.epg.getUpcoming(channelId, count));
            } catch (error) {
                return mcpError(error);
            }
        },
    );
}
