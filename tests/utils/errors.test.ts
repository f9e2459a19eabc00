/**
 * Tests for error utilities
 */
import { describe, it, expect } from 'vitest';
import { AxiosError, AxiosHeaders, type InternalAxiosRequestConfig } from 'axios';
import { errorMessage } from '../../src/utils/errors.js';
import { RefreshRejectedError, TransientNetworkError, isRetryable } from '../../src/auth/errors.js';

function axiosError(status: number, data: unknown): AxiosError {
    const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
    return new AxiosError('Request failed', 'ERR_BAD_RESPONSE', config, undefined, {
        data,
        status,
        statusText: '',
        headers: {},
        config,
    });
}

describe('errorMessage', () => {
    it('should prefer the response body of axios errors', () => {
        expect(errorMessage(axiosError(403, 'Forbidden by proxy'))).toBe('Forbidden by proxy');
        expect(errorMessage(axiosError(404, { message: 'DAG not found' }))).toBe('DAG not found');
        expect(errorMessage(axiosError(502, ''))).toBe('HTTP 502');
    });

    it('should prefix auth errors with their kind', () => {
        expect(errorMessage(new RefreshRejectedError('Token refresh rejected (400): revoked'))).toBe(
            'refresh_rejected: Token refresh rejected (400): revoked'
        );
    });

    it('should handle plain errors and other values', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom');
        expect(errorMessage('text')).toBe('text');
    });
});

describe('auth errors', () => {
    it('should carry their class name and kind', () => {
        const error = new TransientNetworkError('Token endpoint returned 503', 503);

        expect(error.name).toBe('TransientNetworkError');
        expect(error.kind).toBe('transient_network');
        expect(error.status).toBe(503);
    });

    it('should only mark transient failures as retryable', () => {
        expect(isRetryable(new TransientNetworkError('down'))).toBe(true);
        expect(isRetryable(new RefreshRejectedError('revoked'))).toBe(false);
        expect(isRetryable(new Error('other'))).toBe(false);
    });
});
