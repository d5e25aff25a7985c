#!/usr/bin/env node
/**
 * magio-connect MCP Server
 * Exposes the MagioTV session, guide and stream resolution via Model Context Protocol
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { getConfig } from './utils/config.js';
import { errorMessage } from './utils/errors.js';
import { createLogger } from './utils/logger.js';
import { MagioClient } from './client/MagioClient.js';
import { VERSION } from './version.js';
import {
    registerAuthTools,
    registerChannelTools,
    registerEpgTools,
    registerStreamTools,
    registerDeviceTools,
    registerCacheTools,
} from './mcp/tools/index.js';
import { registerResources } from './mcp/resources.js';

const logger = createLogger('mcp');

class MagioConnectMcpServer {
    private server: McpServer;
    private client: MagioClient;

    constructor() {
        this.server = new McpServer({
            name: 'magio-connect',
            version: VERSION,
        });

        this.client = new MagioClient(getConfig());

        registerAuthTools(this.server, this.client);
        registerChannelTools(this.server, this.client);
        registerEpgTools(this.server, this.client);
        registerStreamTools(this.server, this.client);
        registerDeviceTools(this.server, this.client);
        registerCacheTools(this.server, this.client);
        registerResources(this.server, this.client);
    }

    async start() {
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        logger.info('magio-connect MCP server running on stdio');
    }

    async close() {
        this.client.close();
        await this.server.close();
    }
}

const server = new MagioConnectMcpServer();
process.on('SIGINT', () => {
    server.close().then(
        () => process.exit(0),
        (err) => {
            console.error(`Failed to shut down: ${errorMessage(err)}`);
            process.exit(1);
        },
    );
});
server.start().catch((err) => {
    console.error(`Failed to start: ${errorMessage(err)}`);
    process.exit(1);
});
