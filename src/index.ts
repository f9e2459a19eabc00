/**
 * iap-token-broker — Library Barrel Export
 */

// Client
export { IapClient, type IapClientConfig } from './client/IapClient.js';
export { HttpClient, type HttpClientConfig, type TokenProvider, type AuthorizationHeader } from './client/HttpClient.js';

// Auth
export * from './auth/index.js';

// Config
export { getConfig, resolveConfig, clearConfigCache, type Config, type SavedConfig } from './utils/config.js';
export { VERSION } from './version.js';
