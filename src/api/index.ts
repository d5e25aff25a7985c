export { ChannelApi, DEFAULT_GROUP, type Channel } from './ChannelApi.js';
export { EpgApi, type Program, type EpgQuery, type ProgramMatch } from './EpgApi.js';
export {
    StreamApi,
    LIVE_STREAM_TTL_SECONDS,
    CATCHUP_STREAM_TTL_SECONDS,
    type Stream,
    type StreamApiConfig,
    type CatchupAvailability,
} from './StreamApi.js';
export { DeviceApi, tallyDevices, type Device, type DeviceKind, type DeviceCounts } from './DeviceApi.js';
