/**
 * Tests for TokenStore (in-memory holder over a storage)
 */
import { describe, it, expect } from 'vitest';
import { TokenStore, toPersisted, fromPersisted } from '../../src/auth/TokenStore.js';
import { AUDIENCE, MemoryStorage, credential } from './fakes.js';

describe('TokenStore', () => {
    it('should start empty', () => {
        expect(new TokenStore(new MemoryStorage()).current()).toBeNull();
    });

    it('should persist and hold a saved credential', async () => {
        const storage = new MemoryStorage();
        const store = new TokenStore(storage);
        const c = credential();

        await store.save(c);

        expect(store.current()).toBe(c);
        expect(storage.records.get(AUDIENCE)).toBe(c);
    });

    it('should not touch memory when loading', async () => {
        const store = new TokenStore(new MemoryStorage([credential()]));

        expect((await store.load(AUDIENCE))?.accessToken).toBe('cached-token');
        expect(store.current()).toBeNull();
    });

    it('should refuse a loaded record for another audience', async () => {
        const storage = new MemoryStorage();
        storage.records.set(AUDIENCE, credential({ audience: 'old-proxy.example' }));

        expect(await new TokenStore(storage).load(AUDIENCE)).toBeNull();
    });

    it('should clear memory and storage together', async () => {
        const storage = new MemoryStorage();
        const store = new TokenStore(storage);
        await store.save(credential());

        await store.clear(AUDIENCE);

        expect(store.current()).toBeNull();
        expect(storage.records.size).toBe(0);
    });

    it('should convert to and from the persisted record', () => {
        const c = credential({ scope: 'openid email' });
        const record = toPersisted(c);

        expect(record.version).toBe(1);
        expect(fromPersisted(record)).toEqual(c);
    });
});
