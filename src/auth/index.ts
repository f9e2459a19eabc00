export { OAuthFlow, type OAuthConfig, type AuthorizeUrlParams } from './OAuthFlow.js';
export { CallbackServer, type CallbackServerOptions } from './CallbackServer.js';
export { TokenManager, type TokenManagerConfig, type TokenManagerDeps, type AuthStatus } from './TokenManager.js';
export { RefreshScheduler, type RefreshSchedulerConfig, type SchedulerState, type SchedulerStats } from './RefreshScheduler.js';
export { FileStore } from './FileStore.js';
export { TokenStore, type Credential, type CredentialStorage, type PersistedCredential } from './TokenStore.js';
export type { InteractiveAuthenticator, ConsentSession, InteractionPrompt, Refresher } from './Authenticator.js';
export * from './errors.js';
