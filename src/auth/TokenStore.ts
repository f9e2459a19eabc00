/**
 * Token Store
 * Credential model, persistence contract and the in-memory holder
 */

import { z } from 'zod';

export interface Credential {
    /** Bearer presented to the proxy (the OIDC identity token when one is issued) */
    accessToken: string;
    refreshToken?: string;
    tokenType: string;
    expiresAt: number; // Unix timestamp ms
    obtainedAt: number; // Unix timestamp ms
    audience: string;
    scope?: string;
}

export const PERSISTED_RECORD_VERSION = 1;

export const persistedCredentialSchema = z.object({
    version: z.literal(PERSISTED_RECORD_VERSION),
    accessToken: z.string().min(1),
    refreshToken: z.string().min(1).optional(),
    tokenType: z.string().default('Bearer'),
    expiresAt: z.number().int().nonnegative(),
    obtainedAt: z.number().int().nonnegative(),
    audience: z.string().min(1),
    scope: z.string().optional(),
});

export type PersistedCredential = z.infer<typeof persistedCredentialSchema>;

export function toPersisted(credential: Credential): PersistedCredential {
    return { version: PERSISTED_RECORD_VERSION, ...credential };
}

export function fromPersisted(record: PersistedCredential): Credential {
    const { version: _version, ...credential } = record;
    return credential;
}

/**
 * Persistence for credentials, one record per audience.
 * `read` never throws: a missing or unreadable record is `null`.
 */
export interface CredentialStorage {
    read(audience: string): Promise<Credential | null>;
    write(credential: Credential): Promise<void>;
    remove(audience: string): Promise<void>;
    exists(audience: string): Promise<boolean>;
}

/**
 * Holds the process's single in-memory credential on top of a storage.
 * Only TokenManager mutates it, from inside its single-flight section.
 */
export class TokenStore {
    private credential: Credential | null = null;

    constructor(private readonly storage: CredentialStorage) {}

    async load(audience: string): Promise<Credential | null> {
        const loaded = await this.storage.read(audience);
        if (loaded && loaded.audience !== audience) {
            return null;
        }
        return loaded;
    }

    async save(credential: Credential): Promise<void> {
        await this.storage.write(credential);
        this.credential = credential;
    }

    current(): Credential | null {
        return this.credential;
    }

    set(credential: Credential | null): void {
        this.credential = credential;
    }

    async clear(audience: string): Promise<void> {
        this.credential = null;
        await this.storage.remove(audience);
    }
}
