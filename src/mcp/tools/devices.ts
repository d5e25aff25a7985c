/**
 * MCP Tool Registrar: Device tools
 * list_devices, remove_device
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { MagioClient } from '../../client/MagioClient.js';
import { tallyDevices } from '../../api/DeviceApi.js';
import { jsonResult, mcpError } from './shared.js';

export function registerDeviceTools(server: McpServer, client: MagioClient) {
    server.registerTool(
        'list_devices',
        {
            title: 'List Devices',
            description:
                'Lists devices registered on the account: this device, mobile devices and set-top boxes/TVs, plus per-type counts. The account has a limited number of device slots.',
            annotations: { readOnlyHint: true },
        },
        async () => {
            try {
                const devices = await client.devices.getDevices();
                return jsonResult({ devices, counts: tallyDevices(devices) });
            } catch (error) {
                return mcpError(error);
            }
        },
    );

    server.registerTool(
        'remove_device',
        {
            title: 'Remove Device',
            description:
                'Unregisters a device from the account, freeing its slot. Requires confirm=true. Removing this device ends the proxy\'s own session.',
            inputSchema: {
                deviceId: z.string().describe('Device id from list_devices'),
                confirm: z.boolean().describe('Must be true to proceed'),
            },
            annotations: { destructiveHint: true },
        },
        async ({ deviceId, confirm }) => {
            try {
                if (!confirm) {
                    return mcpError(new Error('Refusing to remove a device without confirm=true'));
                }
                await client.devices.deleteDevice(deviceId);
                return jsonResult({ removed: deviceId });
            } catch (error) {
                return mcpError(error);
            }
        },
    );
}
