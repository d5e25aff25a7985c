/**
 * MCP Tool Registrar: Channel tools
 * list_channels, list_channel_groups, search_channels
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { MagioClient } from '../../client/MagioClient.js';
import { jsonResult, mcpError } from './shared.js';

export function registerChannelTools(server: McpServer, client: MagioClient) {
    server.registerTool(
        'list_channels',
        {
            title: 'List Channels',
            description:
                'Lists live TV channels with id, name, logo URL, group and whether the channel has a catch-up archive. Optionally restricted to one group (case-insensitive). Channel ids are what the EPG and stream tools take.',
            inputSchema: {
                group: z.string().optional().describe('Group name, e.g. "Sport"'),
            },
            annotations: { readOnlyHint: true },
        },
        async ({ group }) => {
            try {
                const channels = group
                    ? await client.channels.getChannelsByGroup(group)
                    : await client.channels.getChannels();
                return jsonResult(channels);
            } catch (error) {
                return mcpError(error);
            }
        },
    );

    server.registerTool(
        'list_channel_groups',
        {
            title: 'List Channel Groups',
            description: 'Lists the channel group names, sorted alphabetically.',
            annotations: { readOnlyHint: true },
        },
        async () => {
            try {
                return jsonResult(await client.channels.getGroups());
            } catch (error) {
                return mcpError(error);
            }
        },
    );

    server.registerTool(
        'search_channels',
        {
            title: 'Search Channels',
            description: 'Finds channels whose name or original name contains the search term (case-insensitive).',
            inputSchema: {
                term: z.string().describe('Part of the channel name'),
            },
            annotations: { readOnlyHint: true },
        },
        async ({ term }) => {
            try {
                return jsonResult(await client.channels.search(term));
            } catch (error) {
                return mcpError(error);
            }
        },
    );
}
