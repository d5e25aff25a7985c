export {
    AuthApi,
    AUTH_ENDPOINTS,
    type AuthClient,
    type AuthApiConfig,
    type AuthTransport,
    type TokenGrant,
    type DeviceIdentity,
} from './AuthApi.js';
export { AuthError, type AuthErrorKind } from './AuthError.js';
export {
    TokenManager,
    type TokenManagerConfig,
    type TokenManagerDeps,
    type AuthStatus,
    type AuthState,
    type AuthHeaders,
    type LoginOptions,
    DEFAULT_REFRESH_MARGIN_SECONDS,
    MAX_TOKEN_CACHE_SECONDS,
} from './TokenManager.js';
export { FileStore } from './FileStore.js';
export { NullTokenStore, loggedOutTokens, type TokenStore, type TokenSet } from './TokenStore.js';
export { ConfigDeviceIdentityStore, MemoryDeviceIdentityStore, type DeviceIdentityStore } from './DeviceIdentity.js';
