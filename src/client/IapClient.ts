/**
 * IAP Client
 * Facade wiring storage, OAuth flow, token manager, scheduler and HTTP client
 */

import {
    TokenManager,
    RefreshScheduler,
    OAuthFlow,
    FileStore,
    ConfigurationError,
    type AuthStatus,
    type CredentialStorage,
    type InteractionPrompt,
    type SchedulerStats,
} from '../auth/index.js';
import { HttpClient, type AuthorizationHeader } from './HttpClient.js';
import type { Config } from '../utils/config.js';

export interface IapClientConfig extends Config {
    storage?: CredentialStorage;
    onPrompt?: (prompt: InteractionPrompt) => void | Promise<void>;
    keepAlive?: boolean;
    authorizationHeader?: AuthorizationHeader;
}

export class IapClient {
    private readonly tokenManager: TokenManager;
    private readonly scheduler: RefreshScheduler;
    private readonly httpClient: HttpClient | null;

    constructor(config: IapClientConfig) {
        const oauthFlow = new OAuthFlow({
            clientId: config.clientId,
            clientSecret: config.clientSecret,
            callbackPort: config.callbackPort,
        });

        this.tokenManager = new TokenManager(
            {
                audience: config.audience,
                safetyMarginMs: config.safetyMarginMs,
                consentTimeoutMs: config.consentTimeoutMs,
            },
            {
                storage: config.storage ?? new FileStore(),
                authenticator: oauthFlow,
                refresher: oauthFlow,
                onPrompt: config.onPrompt,
            }
        );

        this.scheduler = new RefreshScheduler(this.tokenManager, {
            intervalMs: config.refreshIntervalMs,
            keepAlive: config.keepAlive,
        });

        this.httpClient = config.targetUrl
            ? new HttpClient({
                baseUrl: config.targetUrl,
                tokenProvider: this.tokenManager,
                authorizationHeader: config.authorizationHeader,
            })
            : null;
    }

    // ── Lifecycle ─────────────────────────────────────

    /**
     * Load or obtain a credential, then start background refresh
     */
    async start(): Promise<void> {
        await this.tokenManager.initialize();
        this.scheduler.start();
    }

    stop(): void {
        this.scheduler.stop();
    }

    // ── Auth ──────────────────────────────────────────

    async getValidToken(): Promise<string> {
        return this.tokenManager.getValidToken();
    }

    async getAuthStatus(): Promise<AuthStatus> {
        return this.tokenManager.getStatus();
    }

    async authenticate(): Promise<void> {
        await this.tokenManager.authenticate();
    }

    async logout(): Promise<void> {
        this.scheduler.stop();
        await this.tokenManager.logout();
    }

    schedulerStats(): SchedulerStats {
        return this.scheduler.stats();
    }

    // ── HTTP ──────────────────────────────────────────

    get http(): HttpClient {
        if (!this.httpClient) {
            throw new ConfigurationError('No target URL configured. Set IAP_TARGET_URL or run: iap-token config set targetUrl <url>');
        }
        return this.httpClient;
    }
}
