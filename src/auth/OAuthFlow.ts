/**
 * OAuth Flow
 * Installed-application authorization code flow (loopback redirect + PKCE)
 * and refresh-token exchange against the identity provider's token endpoint
 */

import * as crypto from 'crypto';
import { z } from 'zod';
import type { Credential } from './TokenStore.js';
import type { ConsentSession, InteractiveAuthenticator, Refresher } from './Authenticator.js';
import { CallbackServer } from './CallbackServer.js';
import {
    AuthError,
    ConfigurationError,
    ConsentDeniedError,
    InteractionRequiredError,
    MalformedResponseError,
    RefreshRejectedError,
    TransientNetworkError,
} from './errors.js';
import { log } from '../utils/logger.js';

const tokenResponseSchema = z.object({
    access_token: z.string().min(1).optional(),
    id_token: z.string().min(1).optional(),
    refresh_token: z.string().min(1).optional(),
    token_type: z.string().optional(),
    expires_in: z.number().positive().optional(),
    scope: z.string().optional(),
});

type TokenResponse = z.infer<typeof tokenResponseSchema>;

const providerErrorSchema = z.object({
    error: z.string(),
    error_description: z.string().optional(),
});

export const DEFAULT_AUTHORIZE_URL = 'https://accounts.google.com/o/oauth2/auth';
export const DEFAULT_TOKEN_URL = 'https://oauth2.googleapis.com/token';
export const DEFAULT_SCOPES = ['openid', 'https://www.googleapis.com/auth/userinfo.email'];
const DEFAULT_EXPIRES_IN = 3600;

export interface OAuthConfig {
    clientId: string;
    clientSecret: string;
    authorizeUrl?: string;
    tokenUrl?: string;
    scopes?: string[];
    /** Loopback callback port; 0 picks an ephemeral one */
    callbackPort?: number;
    /** Extra attempts for transient refresh failures */
    maxRetries?: number;
    retryBaseDelayMs?: number;
}

export interface AuthorizeUrlParams {
    state: string;
    redirectUri: string;
    codeChallenge: string;
}

type RejectionFactory = (status: number, detail: string, providerError?: string) => AuthError;

function randomToken(bytes: number): string {
    return crypto.randomBytes(bytes).toString('base64url');
}

export function codeChallengeFor(verifier: string): string {
    return crypto.createHash('sha256').update(verifier).digest('base64url');
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class OAuthFlow implements InteractiveAuthenticator, Refresher {
    private readonly config: OAuthConfig;
    private readonly authorizeUrl: string;
    private readonly tokenUrl: string;

    constructor(config: OAuthConfig) {
        this.config = config;
        this.authorizeUrl = config.authorizeUrl || DEFAULT_AUTHORIZE_URL;
        this.tokenUrl = config.tokenUrl || DEFAULT_TOKEN_URL;
    }

    /**
     * Get the authorization URL to open in browser
     */
    getAuthorizeUrl({ state, redirectUri, codeChallenge }: AuthorizeUrlParams): string {
        const params = new URLSearchParams({
            client_id: this.config.clientId,
            redirect_uri: redirectUri,
            response_type: 'code',
            scope: (this.config.scopes ?? DEFAULT_SCOPES).join(' '),
            access_type: 'offline',
            prompt: 'consent',
            state,
            code_challenge: codeChallenge,
            code_challenge_method: 'S256',
        });

        return `${this.authorizeUrl}?${params.toString()}`;
    }

    /**
     * Start the loopback listener and hand back the prompt URL.
     */
    async begin(audience: string): Promise<ConsentSession> {
        const state = randomToken(16);
        const verifier = randomToken(32);
        const server = await CallbackServer.listen({
            port: this.config.callbackPort ?? 0,
            expectedState: state,
        });

        const redirectUri = server.redirectUri;
        const url = this.getAuthorizeUrl({
            state,
            redirectUri,
            codeChallenge: codeChallengeFor(verifier),
        });

        return {
            prompt: { url },
            awaitCompletion: async (timeoutMs: number) => {
                const code = await server.waitForCode(timeoutMs);
                return this.completeConsent(code, verifier, redirectUri, audience);
            },
            cancel: () => server.close(),
        };
    }

    /**
     * Exchange authorization code for tokens
     */
    async exchangeCode(code: string, verifier: string, redirectUri: string, audience: string): Promise<Credential> {
        const data = await this.postToken(
            {
                grant_type: 'authorization_code',
                client_id: this.config.clientId,
                client_secret: this.config.clientSecret,
                redirect_uri: redirectUri,
                code_verifier: verifier,
                code,
            },
            (status, detail) => new ConsentDeniedError(`Token exchange rejected (${status}): ${detail}`)
        );

        return this.toCredential(data, audience);
    }

    /**
     * Refresh an expiring credential, retrying transient failures with backoff
     */
    async refresh(credential: Credential, options: { withAudience?: boolean } = {}): Promise<Credential> {
        const maxRetries = this.config.maxRetries ?? 2;
        const baseDelay = this.config.retryBaseDelayMs ?? 500;

        for (let attempt = 0; ; attempt++) {
            try {
                return await this.refreshOnce(credential, options.withAudience ?? true);
            } catch (error) {
                if (!(error instanceof TransientNetworkError) || attempt >= maxRetries) {
                    throw error;
                }
                await sleep(baseDelay * 2 ** attempt);
            }
        }
    }

    private async refreshOnce(credential: Credential, withAudience: boolean): Promise<Credential> {
        if (!credential.refreshToken) {
            throw new InteractionRequiredError('Credential has no refresh token');
        }

        const params: Record<string, string> = {
            grant_type: 'refresh_token',
            client_id: this.config.clientId,
            client_secret: this.config.clientSecret,
            refresh_token: credential.refreshToken,
        };
        // Ask for an identity token minted for the protected resource
        if (withAudience && credential.audience !== this.config.clientId) {
            params.audience = credential.audience;
        }

        const data = await this.postToken(params, refreshRejection);

        return this.toCredential(data, credential.audience, credential.refreshToken);
    }

    private async completeConsent(
        code: string,
        verifier: string,
        redirectUri: string,
        audience: string
    ): Promise<Credential> {
        const credential = await this.exchangeCode(code, verifier, redirectUri, audience);
        if (!credential.refreshToken || audience === this.config.clientId) {
            return credential;
        }
        // The code exchange yields a token for this client; mint one for the audience
        try {
            return await this.refresh(credential);
        } catch (error) {
            if (error instanceof TransientNetworkError) {
                log.warn(`Audience token mint failed (${error.message}); keeping the exchanged token`);
                return credential;
            }
            if (!(error instanceof AuthError)) {
                throw error;
            }
            log.warn(`Audience token mint refused (${error.message}); refreshing without audience`);
        }

        try {
            return await this.refresh(credential, { withAudience: false });
        } catch (error) {
            if (error instanceof TransientNetworkError) {
                return credential;
            }
            throw error;
        }
    }

    private async postToken(params: Record<string, string>, rejected: RejectionFactory): Promise<TokenResponse> {
        let response: Response;
        try {
            response = await fetch(this.tokenUrl, {
                method: 'POST',
                headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
                body: new URLSearchParams(params).toString(),
            });
        } catch (error) {
            throw new TransientNetworkError(
                `Token endpoint unreachable: ${error instanceof Error ? error.message : String(error)}`,
                undefined,
                { cause: error }
            );
        }

        const text = await response.text();

        if (!response.ok) {
            if (response.status === 408 || response.status === 429 || response.status >= 500) {
                throw new TransientNetworkError(`Token endpoint returned ${response.status}`, response.status);
            }
            const providerError = parseProviderError(text);
            const detail = providerError
                ? providerError.error_description || providerError.error
                : text.slice(0, 200);
            throw rejected(response.status, detail, providerError?.error);
        }

        let body: unknown;
        try {
            body = JSON.parse(text);
        } catch {
            throw new MalformedResponseError('Token endpoint returned a non-JSON body');
        }

        const parsed = tokenResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new MalformedResponseError(
                `Token response has unexpected shape: ${parsed.error.issues.map((i) => i.path.join('.')).join(', ')}`
            );
        }
        return parsed.data;
    }

    private toCredential(data: TokenResponse, audience: string, previousRefreshToken?: string): Credential {
        const bearer = data.id_token ?? data.access_token;
        if (!bearer) {
            throw new MalformedResponseError('Token response contains neither id_token nor access_token');
        }

        const now = Date.now();
        const expiresIn = data.expires_in ?? DEFAULT_EXPIRES_IN;

        return {
            accessToken: bearer,
            refreshToken: data.refresh_token ?? previousRefreshToken,
            tokenType: data.token_type || 'Bearer',
            expiresAt: now + expiresIn * 1000,
            obtainedAt: now,
            audience,
            scope: data.scope,
        };
    }
}

/**
 * Only an invalid grant (or a bare 401/403) means the refresh token itself is
 * dead. Anything else the endpoint refuses is a client or request fault and
 * leaves the stored credential alone.
 */
function refreshRejection(status: number, detail: string, providerError?: string): AuthError {
    if (providerError === 'invalid_grant' || (!providerError && (status === 401 || status === 403))) {
        return new RefreshRejectedError(`Token refresh rejected (${status}): ${detail}`, status, providerError);
    }
    return new ConfigurationError(`Token endpoint refused the refresh request (${status}): ${detail}`);
}

function parseProviderError(text: string): z.infer<typeof providerErrorSchema> | null {
    try {
        const parsed = providerErrorSchema.safeParse(JSON.parse(text));
        return parsed.success ? parsed.data : null;
    } catch {
        return null;
    }
}
