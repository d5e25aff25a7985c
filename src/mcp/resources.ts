/**
 * MCP Resource Registrar
 * Registers read-only data resources exposed via magio:// URIs
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { MagioClient } from '../client/MagioClient.js';

export function registerResources(server: McpServer, client: MagioClient) {
    server.registerResource(
        'cache-stats',
        'magio://diagnostics/cache',
        {
            description:
                'Cache contents and statistics: entry count, expired-but-unswept entries, entries per category, seconds left per key, hit/miss counts, evictions and hit rate.',
            mimeType: 'application/json',
        },
        async (uri) => ({
            contents: [
                {
                    uri: uri.href,
                    text: JSON.stringify(client.getCacheInfo(), null, 2),
                    mimeType: 'application/json',
                },
            ],
        }),
    );

    server.registerResource(
        'auth-status',
        'magio://auth/status',
        {
            description: 'Current session state, token expiry and last authentication error',
            mimeType: 'application/json',
        },
        async (uri) => ({
            contents: [
                {
                    uri: uri.href,
                    text: JSON.stringify(await client.getAuthStatus(), null, 2),
                    mimeType: 'application/json',
                },
            ],
        }),
    );
}
