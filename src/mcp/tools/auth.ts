/**
 * MCP Tool Registrar: Auth tools
 * auth_status, login, refresh_token, logout
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { MagioClient } from '../../client/MagioClient.js';
import { jsonResult, mcpError } from './shared.js';

export function registerAuthTools(server: McpServer, client: MagioClient) {
    server.registerTool(
        'auth_status',
        {
            title: 'Auth Status',
            description:
                'Reports whether the proxy holds a valid MagioTV session: state (LoggedOut, Valid, NeedsRefresh, Failed), language, device id, time until the access token expires, whether a refresh token is held, and the last auth error. Use this first when other tools report authentication problems.',
            annotations: { readOnlyHint: true },
        },
        async () => {
            try {
                return jsonResult(await client.getAuthStatus());
            } catch (error) {
                return mcpError(error);
            }
        },
    );

    server.registerTool(
        'login',
        {
            title: 'Log In',
            description:
                'Logs in with the configured MagioTV credentials. Without force, a still-valid session is kept and no network call is made.',
            inputSchema: {
                force: z.boolean().optional().describe('Run the full login even if the current token is valid'),
            },
        },
        async ({ force }) => {
            try {
                const success = await client.login(force ?? false);
                const status = await client.getAuthStatus();
                if (!success) {
                    return mcpError(new Error(status.lastError ?? 'Login failed'));
                }
                return jsonResult(status);
            } catch (error) {
                return mcpError(error);
            }
        },
    );

    server.registerTool(
        'refresh_token',
        {
            title: 'Refresh Token',
            description:
                'Makes sure the access token is valid for at least another minute, refreshing it (or logging in again) when needed.',
        },
        async () => {
            try {
                const success = await client.refreshToken();
                const status = await client.getAuthStatus();
                if (!success) {
                    return mcpError(new Error(status.lastError ?? 'Token refresh failed'));
                }
                return jsonResult(status);
            } catch (error) {
                return mcpError(error);
            }
        },
    );

    server.registerTool(
        'logout',
        {
            title: 'Log Out',
            description:
                'Forgets the session: clears tokens in memory, the cache and the token file. The device id is kept so the next login reuses the same device slot.',
            annotations: { destructiveHint: true },
        },
        async () => {
            try {
                const tokenFileRemoved = await client.logout();
                return jsonResult({ loggedOut: true, tokenFileRemoved });
            } catch (error) {
                return mcpError(error);
            }
        },
    );
}
