/**
 * Tests for OAuthFlow
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as http from 'http';
import { OAuthFlow, codeChallengeFor } from '../../src/auth/OAuthFlow.js';
import type { Credential } from '../../src/auth/TokenStore.js';
import {
    ConfigurationError,
    ConsentDeniedError,
    ConsentTimeoutError,
    InteractionRequiredError,
    MalformedResponseError,
    RefreshRejectedError,
    TransientNetworkError,
} from '../../src/auth/errors.js';

const AUDIENCE = 'proxy-client.example';

const config = {
    clientId: 'desktop-client-id',
    clientSecret: 'test-secret',
    maxRetries: 2,
    retryBaseDelayMs: 0,
};

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

function sentParams(fetchMock: ReturnType<typeof vi.fn>, call: number): URLSearchParams {
    const init: unknown = fetchMock.mock.calls[call][1];
    if (init && typeof init === 'object' && 'body' in init && typeof init.body === 'string') {
        return new URLSearchParams(init.body);
    }
    throw new Error('fetch was not called with a string body');
}

function hit(url: string): Promise<{ status: number; body: string }> {
    return new Promise((resolve, reject) => {
        http.get(url, (res) => {
            let body = '';
            res.setEncoding('utf8');
            res.on('data', (chunk: string) => (body += chunk));
            res.on('end', () => resolve({ status: res.statusCode ?? 0, body }));
        }).on('error', reject);
    });
}

const stored: Credential = {
    accessToken: 'old-token',
    refreshToken: 'refresh-token',
    tokenType: 'Bearer',
    expiresAt: 0,
    obtainedAt: 0,
    audience: AUDIENCE,
};

describe('OAuthFlow', () => {
    let fetchMock: ReturnType<typeof vi.fn>;

    beforeEach(() => {
        fetchMock = vi.fn();
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    describe('getAuthorizeUrl', () => {
        const params = {
            state: 'random-state',
            redirectUri: 'http://127.0.0.1:8085/',
            codeChallenge: 'challenge',
        };

        it('should generate an offline authorization URL with PKCE', () => {
            const url = new URL(new OAuthFlow(config).getAuthorizeUrl(params));

            expect(`${url.origin}${url.pathname}`).toBe('https://accounts.google.com/o/oauth2/auth');
            expect(url.searchParams.get('client_id')).toBe('desktop-client-id');
            expect(url.searchParams.get('redirect_uri')).toBe('http://127.0.0.1:8085/');
            expect(url.searchParams.get('response_type')).toBe('code');
            expect(url.searchParams.get('scope')).toBe('openid https://www.googleapis.com/auth/userinfo.email');
            expect(url.searchParams.get('access_type')).toBe('offline');
            expect(url.searchParams.get('prompt')).toBe('consent');
            expect(url.searchParams.get('state')).toBe('random-state');
            expect(url.searchParams.get('code_challenge')).toBe('challenge');
            expect(url.searchParams.get('code_challenge_method')).toBe('S256');
        });

        it('should use a custom authorize URL and scopes', () => {
            const flow = new OAuthFlow({
                ...config,
                authorizeUrl: 'https://idp.example/authorize',
                scopes: ['openid'],
            });
            const url = new URL(flow.getAuthorizeUrl(params));

            expect(url.host).toBe('idp.example');
            expect(url.searchParams.get('scope')).toBe('openid');
        });
    });

    describe('refresh', () => {
        it('should prefer the identity token and keep the refresh token', async () => {
            fetchMock.mockResolvedValueOnce(
                jsonResponse({ access_token: 'ya29.access', id_token: 'id-token', expires_in: 1800 })
            );
            const flow = new OAuthFlow(config);

            const before = Date.now();
            const refreshed = await flow.refresh(stored);

            expect(refreshed.accessToken).toBe('id-token');
            expect(refreshed.refreshToken).toBe('refresh-token');
            expect(refreshed.audience).toBe(AUDIENCE);
            expect(refreshed.tokenType).toBe('Bearer');
            expect(refreshed.expiresAt - refreshed.obtainedAt).toBe(1800 * 1000);
            expect(refreshed.obtainedAt).toBeGreaterThanOrEqual(before);
        });

        it('should send the refresh grant with the audience', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ id_token: 'id-token', expires_in: 3600 }));
            await new OAuthFlow(config).refresh(stored);

            expect(fetchMock.mock.calls[0][0]).toBe('https://oauth2.googleapis.com/token');
            const params = sentParams(fetchMock, 0);
            expect(params.get('grant_type')).toBe('refresh_token');
            expect(params.get('client_id')).toBe('desktop-client-id');
            expect(params.get('client_secret')).toBe('test-secret');
            expect(params.get('refresh_token')).toBe('refresh-token');
            expect(params.get('audience')).toBe(AUDIENCE);
        });

        it('should omit the audience when it is the client itself', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ id_token: 'id-token' }));
            await new OAuthFlow(config).refresh({ ...stored, audience: 'desktop-client-id' });

            expect(sentParams(fetchMock, 0).has('audience')).toBe(false);
        });

        it('should replace the refresh token when a new one is issued', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ id_token: 'id-token', refresh_token: 'rotated' }));
            const refreshed = await new OAuthFlow(config).refresh(stored);

            expect(refreshed.refreshToken).toBe('rotated');
        });

        it('should default the lifetime to one hour', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ access_token: 'access-only' }));
            const refreshed = await new OAuthFlow(config).refresh(stored);

            expect(refreshed.accessToken).toBe('access-only');
            expect(refreshed.expiresAt - refreshed.obtainedAt).toBe(3600 * 1000);
        });

        it('should classify invalid_grant as a rejected refresh token', async () => {
            fetchMock.mockResolvedValueOnce(
                jsonResponse({ error: 'invalid_grant', error_description: 'Token has been expired or revoked.' }, 400)
            );

            const error = await new OAuthFlow(config).refresh(stored).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(RefreshRejectedError);
            if (error instanceof RefreshRejectedError) {
                expect(error.status).toBe(400);
                expect(error.providerError).toBe('invalid_grant');
                expect(error.message).toBe('Token refresh rejected (400): Token has been expired or revoked.');
            }
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it('should treat a refused client as configuration, not as a dead refresh token', async () => {
            fetchMock.mockResolvedValueOnce(
                jsonResponse({ error: 'invalid_client', error_description: 'The OAuth client was not found.' }, 401)
            );

            const error = await new OAuthFlow(config).refresh(stored).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ConfigurationError);
            expect(error).not.toBeInstanceOf(RefreshRejectedError);
            if (error instanceof ConfigurationError) {
                expect(error.message).toBe(
                    'Token endpoint refused the refresh request (401): The OAuth client was not found.'
                );
            }
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it('should treat a wrong token URL as configuration', async () => {
            fetchMock.mockResolvedValueOnce(new Response('Not Found', { status: 404 }));

            await expect(new OAuthFlow(config).refresh(stored)).rejects.toThrow(
                'Token endpoint refused the refresh request (404): Not Found'
            );
        });

        it('should reject the refresh token on a bare 401', async () => {
            fetchMock.mockResolvedValueOnce(new Response('Unauthorized', { status: 401 }));

            const error = await new OAuthFlow(config).refresh(stored).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(RefreshRejectedError);
            if (error instanceof RefreshRejectedError) {
                expect(error.status).toBe(401);
                expect(error.providerError).toBeUndefined();
                expect(error.message).toBe('Token refresh rejected (401): Unauthorized');
            }
        });

        it('should retry 5xx answers and give up as transient', async () => {
            fetchMock.mockImplementation(async () => new Response('upstream error', { status: 503 }));

            await expect(new OAuthFlow(config).refresh(stored)).rejects.toBeInstanceOf(TransientNetworkError);
            expect(fetchMock).toHaveBeenCalledTimes(3);
        });

        it('should succeed when a retry gets through', async () => {
            fetchMock
                .mockResolvedValueOnce(new Response('busy', { status: 429 }))
                .mockResolvedValueOnce(jsonResponse({ id_token: 'after-retry' }));

            const refreshed = await new OAuthFlow(config).refresh(stored);

            expect(refreshed.accessToken).toBe('after-retry');
            expect(fetchMock).toHaveBeenCalledTimes(2);
        });

        it('should treat an unreachable endpoint as transient', async () => {
            fetchMock.mockRejectedValue(new TypeError('fetch failed'));

            await expect(
                new OAuthFlow({ ...config, maxRetries: 0 }).refresh(stored)
            ).rejects.toThrow('Token endpoint unreachable: fetch failed');
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it('should reject non-JSON bodies as malformed', async () => {
            fetchMock.mockResolvedValueOnce(new Response('<html>proxy page</html>', { status: 200 }));

            await expect(new OAuthFlow(config).refresh(stored)).rejects.toBeInstanceOf(MalformedResponseError);
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it('should reject responses without any token as malformed', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ token_type: 'Bearer', expires_in: 3600 }));

            await expect(new OAuthFlow(config).refresh(stored)).rejects.toThrow(
                'Token response contains neither id_token nor access_token'
            );
        });

        it('should require a refresh token', async () => {
            await expect(
                new OAuthFlow(config).refresh({ ...stored, refreshToken: undefined })
            ).rejects.toBeInstanceOf(InteractionRequiredError);
            expect(fetchMock).not.toHaveBeenCalled();
        });
    });

    describe('consent session', () => {
        it('should exchange the code with the PKCE verifier and mint an audience token', async () => {
            fetchMock
                .mockResolvedValueOnce(
                    jsonResponse({
                        access_token: 'ya29.access',
                        id_token: 'client-id-token',
                        refresh_token: 'new-refresh-token',
                        expires_in: 3600,
                        scope: 'openid email',
                    })
                )
                .mockResolvedValueOnce(jsonResponse({ id_token: 'audience-id-token', expires_in: 3600 }));
            const flow = new OAuthFlow(config);

            const session = await flow.begin(AUDIENCE);
            const prompt = new URL(session.prompt.url);
            const redirectUri = prompt.searchParams.get('redirect_uri') ?? '';
            const state = prompt.searchParams.get('state') ?? '';
            expect(redirectUri).toMatch(/^http:\/\/127\.0\.0\.1:\d+\/$/);

            const completion = session.awaitCompletion(5000);
            const response = await hit(`${redirectUri}?code=auth-code&state=${encodeURIComponent(state)}`);
            const result = await completion;

            expect(response.status).toBe(200);
            expect(response.body).toContain('Authentication Successful');

            const exchange = sentParams(fetchMock, 0);
            expect(exchange.get('grant_type')).toBe('authorization_code');
            expect(exchange.get('code')).toBe('auth-code');
            expect(exchange.get('redirect_uri')).toBe(redirectUri);
            expect(codeChallengeFor(exchange.get('code_verifier') ?? '')).toBe(
                prompt.searchParams.get('code_challenge')
            );

            const mint = sentParams(fetchMock, 1);
            expect(mint.get('grant_type')).toBe('refresh_token');
            expect(mint.get('refresh_token')).toBe('new-refresh-token');
            expect(mint.get('audience')).toBe(AUDIENCE);

            expect(result.accessToken).toBe('audience-id-token');
            expect(result.refreshToken).toBe('new-refresh-token');
            expect(result.audience).toBe(AUDIENCE);
        });

        it('should skip the audience mint when the audience is the client itself', async () => {
            fetchMock.mockResolvedValueOnce(
                jsonResponse({ id_token: 'own-id-token', refresh_token: 'new-refresh-token' })
            );
            const session = await new OAuthFlow(config).begin('desktop-client-id');
            const prompt = new URL(session.prompt.url);

            const completion = session.awaitCompletion(5000);
            await hit(`${prompt.searchParams.get('redirect_uri')}?code=c&state=${prompt.searchParams.get('state')}`);
            const result = await completion;

            expect(result.accessToken).toBe('own-id-token');
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it('should report a denied consent', async () => {
            const session = await new OAuthFlow(config).begin(AUDIENCE);
            const prompt = new URL(session.prompt.url);
            const redirectUri = prompt.searchParams.get('redirect_uri');
            const state = prompt.searchParams.get('state') ?? '';

            const assertion = expect(session.awaitCompletion(5000)).rejects.toBeInstanceOf(ConsentDeniedError);
            const response = await hit(`${redirectUri}?error=access_denied&state=${encodeURIComponent(state)}`);
            await assertion;

            expect(response.status).toBe(400);
            expect(response.body).toContain('access_denied');
            expect(fetchMock).not.toHaveBeenCalled();
        });

        it('should stop listening when the session is cancelled', async () => {
            const session = await new OAuthFlow(config).begin(AUDIENCE);
            const redirectUri = new URL(session.prompt.url).searchParams.get('redirect_uri') ?? '';

            session.cancel();

            await expect(hit(redirectUri)).rejects.toThrow();
        });

        it('should mint without the audience when the audience request is refused', async () => {
            fetchMock
                .mockResolvedValueOnce(jsonResponse({ id_token: 'client-id-token', refresh_token: 'new-refresh-token' }))
                .mockResolvedValueOnce(
                    jsonResponse({ error: 'invalid_request', error_description: 'Invalid audience' }, 400)
                )
                .mockResolvedValueOnce(jsonResponse({ id_token: 'plain-id-token' }));
            const session = await new OAuthFlow(config).begin(AUDIENCE);
            const prompt = new URL(session.prompt.url);

            const completion = session.awaitCompletion(5000);
            await hit(`${prompt.searchParams.get('redirect_uri')}?code=c&state=${prompt.searchParams.get('state')}`);
            const result = await completion;

            expect(fetchMock).toHaveBeenCalledTimes(3);
            expect(sentParams(fetchMock, 1).get('audience')).toBe(AUDIENCE);
            expect(sentParams(fetchMock, 2).has('audience')).toBe(false);
            expect(result.accessToken).toBe('plain-id-token');
            expect(result.refreshToken).toBe('new-refresh-token');
            expect(result.audience).toBe(AUDIENCE);
        });

        it('should keep the exchanged credential when the audience mint fails transiently', async () => {
            fetchMock
                .mockResolvedValueOnce(jsonResponse({ id_token: 'client-id-token', refresh_token: 'new-refresh-token' }))
                .mockImplementation(async () => new Response('unavailable', { status: 503 }));
            const session = await new OAuthFlow(config).begin(AUDIENCE);
            const prompt = new URL(session.prompt.url);

            const completion = session.awaitCompletion(5000);
            await hit(`${prompt.searchParams.get('redirect_uri')}?code=c&state=${prompt.searchParams.get('state')}`);
            const result = await completion;

            // one exchange, then the mint with its two retries
            expect(fetchMock).toHaveBeenCalledTimes(4);
            expect(result.accessToken).toBe('client-id-token');
            expect(result.refreshToken).toBe('new-refresh-token');
        });

        it('should report a rejected code exchange as denied', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'invalid_grant', error_description: 'Bad code' }, 400));
            const session = await new OAuthFlow(config).begin(AUDIENCE);
            const prompt = new URL(session.prompt.url);

            const assertion = expect(session.awaitCompletion(5000)).rejects.toThrow(
                'Token exchange rejected (400): Bad code'
            );
            await hit(`${prompt.searchParams.get('redirect_uri')}?code=c&state=${prompt.searchParams.get('state')}`);
            await assertion;
        });

        it('should time out when no callback arrives', async () => {
            const session = await new OAuthFlow(config).begin(AUDIENCE);

            await expect(session.awaitCompletion(50)).rejects.toBeInstanceOf(ConsentTimeoutError);
        });
    });
});
