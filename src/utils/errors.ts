/**
 * Error utilities
 * Shared error formatting for CLI and HTTP error handling
 */

import { AxiosError } from 'axios';
import { AuthError } from '../auth/errors.js';

/**
 * Extracts a human-readable message from an unknown error value.
 * For AxiosErrors, prefers the API response body (which often contains
 * a more descriptive message than the generic HTTP status).
 * Auth failures are prefixed with their kind.
 */
export function errorMessage(error: unknown): string {
    if (error instanceof AxiosError && error.response) {
        const data: unknown = error.response.data;
        if (typeof data === 'string' && data.length > 0) return data;
        if (data && typeof data === 'object' && 'message' in data) return String(data.message);
        return `HTTP ${error.response.status || 'unknown'}`;
    }
    if (error instanceof AuthError) {
        return `${error.kind}: ${error.message}`;
    }
    return error instanceof Error ? error.message : String(error);
}
