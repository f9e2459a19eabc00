/**
 * Token Manager
 * The single accessor for a valid token: caching, single-flight renewal,
 * refresh with fallback to interactive consent
 */

import { TokenStore, type Credential, type CredentialStorage } from './TokenStore.js';
import type { InteractionPrompt, InteractiveAuthenticator, Refresher } from './Authenticator.js';
import {
    AuthError,
    InteractionRequiredError,
    RefreshRejectedError,
    TransientNetworkError,
} from './errors.js';
import { isWithinMargin } from '../utils/dates.js';
import { log } from '../utils/logger.js';

export interface TokenManagerConfig {
    audience: string;
    safetyMarginMs: number;
    consentTimeoutMs: number;
}

export interface TokenManagerDeps {
    storage: CredentialStorage;
    authenticator: InteractiveAuthenticator;
    refresher: Refresher;
    /** Surfaces the consent URL to the human. Defaults to logging it. */
    onPrompt?: (prompt: InteractionPrompt) => void | Promise<void>;
}

export interface AuthStatus {
    authenticated: boolean;
    audience: string;
    expiresAt?: Date;
    expiresInMs?: number;
    isExpired?: boolean;
    needsRefresh?: boolean;
    canRefresh?: boolean;
}

type RenewalMode = 'on-demand' | 'scheduled' | 'interactive';

export class TokenManager {
    private readonly config: TokenManagerConfig;
    private readonly store: TokenStore;
    private readonly authenticator: InteractiveAuthenticator;
    private readonly refresher: Refresher;
    private readonly onPrompt: (prompt: InteractionPrompt) => void | Promise<void>;
    private inFlight: Promise<Credential> | null = null;
    private inFlightMode: RenewalMode | null = null;

    constructor(config: TokenManagerConfig, deps: TokenManagerDeps) {
        this.config = config;
        this.store = new TokenStore(deps.storage);
        this.authenticator = deps.authenticator;
        this.refresher = deps.refresher;
        this.onPrompt = deps.onPrompt ?? ((prompt) => {
            log.warn('Authentication required. Open this URL to continue:');
            log.dim(`  ${prompt.url}`);
        });
    }

    get audience(): string {
        return this.config.audience;
    }

    /**
     * Load the persisted credential for the audience, or run the consent flow
     * when there is none. A stale persisted credential is left for the first
     * accessor call to refresh.
     */
    async initialize(): Promise<void> {
        await this.exclusive('interactive', async () => {
            const loaded = await this.store.load(this.config.audience);
            if (loaded) {
                this.store.set(loaded);
                log.info('Loaded cached credentials');
                return loaded;
            }
            log.info('No cached credentials found, starting consent flow...');
            return this.authenticateInteractively();
        });
    }

    /**
     * Get a token valid for immediate use (refreshes if needed)
     */
    async getValidToken(): Promise<string> {
        const current = this.store.current();
        if (current && !this.isStale(current)) {
            return current.accessToken;
        }

        try {
            const renewed = await this.renewOnDemand();
            return renewed.accessToken;
        } catch (error) {
            // Grace: a transient failure inside the margin still leaves a usable token
            const fallback = this.store.current();
            if (error instanceof TransientNetworkError && fallback && fallback.expiresAt > Date.now()) {
                log.warn(`Refresh failed transiently, using token valid until ${new Date(fallback.expiresAt).toISOString()}`);
                return fallback.accessToken;
            }
            if (error instanceof AuthError) {
                log.authFailure(error.kind, this.config.audience, error.message);
            }
            throw error;
        }
    }

    /**
     * Forced refresh without human interaction. Used by the background scheduler;
     * never starts a consent flow.
     */
    async refreshNow(): Promise<Credential> {
        return this.exclusive('scheduled', () => this.renew(false));
    }

    /**
     * Run the consent flow regardless of the cached credential
     */
    async authenticate(): Promise<Credential> {
        return this.exclusive('interactive', () => this.authenticateInteractively());
    }

    async getStatus(): Promise<AuthStatus> {
        const credential = this.store.current() ?? (await this.store.load(this.config.audience));

        if (!credential) {
            return { authenticated: false, audience: this.config.audience };
        }

        const now = Date.now();
        const isExpired = credential.expiresAt <= now;
        const canRefresh = !!credential.refreshToken;

        return {
            authenticated: !isExpired || canRefresh,
            audience: credential.audience,
            expiresAt: new Date(credential.expiresAt),
            expiresInMs: credential.expiresAt - now,
            isExpired,
            needsRefresh: this.isStale(credential),
            canRefresh,
        };
    }

    async logout(): Promise<void> {
        if (this.inFlight) {
            await this.inFlight.catch(() => undefined);
        }
        await this.store.clear(this.config.audience);
    }

    isRenewing(): boolean {
        return this.inFlight !== null;
    }

    /**
     * Join the running renewal, or start one that may go interactive. A joined
     * scheduled flight never asks for consent, so its rejection is followed by
     * one interactive renewal of our own.
     */
    private async renewOnDemand(): Promise<Credential> {
        const joined = this.inFlightMode;
        try {
            return await this.exclusive('on-demand', () => this.renew(true));
        } catch (error) {
            const recoverable = error instanceof RefreshRejectedError || error instanceof InteractionRequiredError;
            if (joined !== 'scheduled' || !recoverable) {
                throw error;
            }
            return this.exclusive('on-demand', () => this.renew(true));
        }
    }

    private isStale(credential: Credential): boolean {
        return isWithinMargin(credential.expiresAt, this.config.safetyMarginMs);
    }

    /**
     * Single flight: while a renewal runs, every caller shares its promise.
     */
    private exclusive(mode: RenewalMode, operation: () => Promise<Credential>): Promise<Credential> {
        if (this.inFlight) {
            return this.inFlight;
        }
        this.inFlightMode = mode;
        this.inFlight = operation().finally(() => {
            this.inFlight = null;
            this.inFlightMode = null;
        });
        log.dim(`  token renewal started (${mode})`);
        return this.inFlight;
    }

    private async renew(allowInteractive: boolean): Promise<Credential> {
        const current = this.store.current();

        if (current?.refreshToken) {
            try {
                const refreshed = await this.refresher.refresh(current);
                await this.store.save(refreshed);
                log.info(`Token refreshed, expires at ${new Date(refreshed.expiresAt).toISOString()}`);
                return refreshed;
            } catch (error) {
                if (!(error instanceof RefreshRejectedError)) {
                    throw error;
                }
                // Drop the rejected refresh token so it is never presented again
                log.authFailure(error.kind, this.config.audience, `${error.message}; re-authentication required`);
                await this.store.clear(this.config.audience);
                if (!allowInteractive) {
                    throw error;
                }
            }
        } else if (!allowInteractive) {
            throw new InteractionRequiredError(
                current ? 'Credential cannot be refreshed; re-authentication required' : 'No credential to refresh'
            );
        }

        return this.authenticateInteractively();
    }

    private async authenticateInteractively(): Promise<Credential> {
        const session = await this.authenticator.begin(this.config.audience);
        try {
            await this.onPrompt(session.prompt);
        } catch (error) {
            session.cancel();
            throw error;
        }
        const credential = await session.awaitCompletion(this.config.consentTimeoutMs);
        await this.store.save(credential);
        log.success('Authentication successful');
        return credential;
    }
}
