/**
 * Tests for HttpClient
 */
import { describe, it, expect, vi } from 'vitest';
import type { InternalAxiosRequestConfig } from 'axios';
import { HttpClient } from '../../src/client/HttpClient.js';
import { InteractionRequiredError } from '../../src/auth/errors.js';

function createAdapter(data: unknown = { ok: true }) {
    return vi.fn(async (config: InternalAxiosRequestConfig) => ({
        data,
        status: 200,
        statusText: 'OK',
        headers: {},
        config,
    }));
}

describe('HttpClient', () => {
    it('should attach a fresh bearer token to every request', async () => {
        const getValidToken = vi
            .fn<() => Promise<string>>()
            .mockResolvedValueOnce('token-1')
            .mockResolvedValueOnce('token-2');
        const adapter = createAdapter();
        const client = new HttpClient({
            baseUrl: 'https://airflow.example.com/',
            tokenProvider: { getValidToken },
            adapter,
        });

        await client.get('/api/v2/version');
        await client.post('/api/v2/dags/etl/dagRuns', { conf: {} });

        expect(getValidToken).toHaveBeenCalledTimes(2);
        const [first] = adapter.mock.calls[0];
        const [second] = adapter.mock.calls[1];
        expect(first.baseURL).toBe('https://airflow.example.com');
        expect(first.url).toBe('/api/v2/version');
        expect(first.headers.get('Authorization')).toBe('Bearer token-1');
        expect(second.method).toBe('post');
        expect(second.headers.get('Authorization')).toBe('Bearer token-2');
    });

    it('should return the response body', async () => {
        const client = new HttpClient({
            baseUrl: 'https://airflow.example.com',
            tokenProvider: { getValidToken: async () => 'token' },
            adapter: createAdapter({ version: '3.0.1' }),
        });

        expect(await client.get('/api/v2/version')).toEqual({ version: '3.0.1' });
    });

    it('should use Proxy-Authorization when configured', async () => {
        const adapter = createAdapter();
        const client = new HttpClient({
            baseUrl: 'https://airflow.example.com',
            tokenProvider: { getValidToken: async () => 'proxy-token' },
            authorizationHeader: 'Proxy-Authorization',
            adapter,
        });

        await client.delete('/api/v2/dags/etl');

        const [config] = adapter.mock.calls[0];
        expect(config.headers.get('Proxy-Authorization')).toBe('Bearer proxy-token');
        expect(config.headers.has('Authorization')).toBe(false);
    });

    it('should not send the request when no token can be obtained', async () => {
        const adapter = createAdapter();
        const client = new HttpClient({
            baseUrl: 'https://airflow.example.com',
            tokenProvider: {
                getValidToken: async () => {
                    throw new InteractionRequiredError('No credential to refresh');
                },
            },
            adapter,
        });

        await expect(client.get('/api/v2/version')).rejects.toBeInstanceOf(InteractionRequiredError);
        expect(adapter).not.toHaveBeenCalled();
    });
});
