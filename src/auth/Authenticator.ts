/**
 * Authenticator contracts
 */

import type { Credential } from './TokenStore.js';

export interface InteractionPrompt {
    /** URL the user opens to grant consent */
    url: string;
}

/**
 * A consent handshake in progress. The callback listener is already
 * accepting connections when the session is handed out.
 */
export interface ConsentSession {
    readonly prompt: InteractionPrompt;
    /**
     * Resolves with a refreshable credential. Rejects with ConsentTimeoutError,
     * ConsentDeniedError or TransientNetworkError.
     */
    awaitCompletion(timeoutMs: number): Promise<Credential>;
    /** Stop listening without waiting for the redirect */
    cancel(): void;
}

export interface InteractiveAuthenticator {
    begin(audience: string): Promise<ConsentSession>;
}

export interface Refresher {
    /**
     * Exchanges the credential's refresh token for a new one.
     * Rejects with RefreshRejectedError (refresh token expired or revoked),
     * ConfigurationError (client or request refused), TransientNetworkError,
     * MalformedResponseError or InteractionRequiredError (no refresh token).
     */
    refresh(credential: Credential): Promise<Credential>;
}
