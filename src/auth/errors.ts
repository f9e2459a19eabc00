/**
 * Auth Errors
 * Failure taxonomy shared by the authenticator, refresher, scheduler and accessor
 */

export type AuthErrorKind =
    | 'interaction_required'
    | 'refresh_rejected'
    | 'transient_network'
    | 'malformed_response'
    | 'consent_timeout'
    | 'consent_denied'
    | 'configuration';

export abstract class AuthError extends Error {
    abstract readonly kind: AuthErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** No usable credential exists; the interactive flow has to run. */
export class InteractionRequiredError extends AuthError {
    readonly kind = 'interaction_required';
}

/** The refresh token is expired, revoked or otherwise refused by the provider. */
export class RefreshRejectedError extends AuthError {
    readonly kind = 'refresh_rejected';

    constructor(
        message: string,
        readonly status?: number,
        readonly providerError?: string,
    ) {
        super(message);
    }
}

export class TransientNetworkError extends AuthError {
    readonly kind = 'transient_network';

    constructor(
        message: string,
        readonly status?: number,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }
}

export class MalformedResponseError extends AuthError {
    readonly kind = 'malformed_response';
}

export class ConsentTimeoutError extends AuthError {
    readonly kind = 'consent_timeout';

    constructor(readonly timeoutMs: number) {
        super(`Authentication timed out after ${Math.round(timeoutMs / 1000)}s`);
    }
}

export class ConsentDeniedError extends AuthError {
    readonly kind = 'consent_denied';
}

/** Missing or invalid audience / client identity. Fatal at startup. */
export class ConfigurationError extends AuthError {
    readonly kind = 'configuration';
}

export function isRetryable(error: unknown): boolean {
    return error instanceof TransientNetworkError;
}
