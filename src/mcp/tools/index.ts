/**
 * MCP Tool Registrars: barrel export
 */

export { registerAuthTools } from './auth.js';
export { registerChannelTools } from './channels.js';
export { registerEpgTools } from './epg.js';
export { registerStreamTools } from './streams.js';
export { registerDeviceTools } from './devices.js';
export { registerCacheTools } from './cache.js';
