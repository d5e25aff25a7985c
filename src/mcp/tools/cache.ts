/**
 * MCP Tool Registrar: Cache tools
 * clear_cache
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { MagioClient } from '../../client/MagioClient.js';
import { jsonResult, mcpError } from './shared.js';

export function registerCacheTools(server: McpServer, client: MagioClient) {
    server.registerTool(
        'clear_cache',
        {
            title: 'Clear Cache',
            description:
                'Removes cached entries. With no pattern everything goes; a pattern is an exact key or a prefix ending in "*", e.g. "channels_*" or "stream_cz_*". Returns how many entries were removed.',
            inputSchema: {
                pattern: z.string().optional().describe('Exact key or prefix ending in *'),
            },
        },
        async ({ pattern }) => {
            try {
                return jsonResult({ removed: client.clearCache(pattern) });
            } catch (error) {
                return mcpError(error);
            }
        },
    );
}
