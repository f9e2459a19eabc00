/**
 * File Credential Store
 * Plain JSON records at ~/.iap-token-broker/credentials/<digest>.json (chmod 600)
 */

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import {
    persistedCredentialSchema,
    toPersisted,
    fromPersisted,
    type Credential,
    type CredentialStorage,
} from './TokenStore.js';
import { getConfigDir } from '../utils/config.js';

const CREDENTIALS_DIR_NAME = 'credentials';

export class FileStore implements CredentialStorage {
    private readonly dir: string;

    constructor(baseDir: string = getConfigDir()) {
        this.dir = path.join(baseDir, CREDENTIALS_DIR_NAME);
    }

    /**
     * Path of the record for an audience. Audiences are client ids or URLs,
     * so the file name is a digest rather than the raw value.
     */
    pathFor(audience: string): string {
        const digest = crypto.createHash('sha256').update(audience).digest('hex').slice(0, 32);
        return path.join(this.dir, `${digest}.json`);
    }

    async write(credential: Credential): Promise<void> {
        if (!fs.existsSync(this.dir)) {
            fs.mkdirSync(this.dir, { recursive: true, mode: 0o700 });
        }

        const target = this.pathFor(credential.audience);
        const tmp = `${target}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`;

        try {
            fs.writeFileSync(tmp, JSON.stringify(toPersisted(credential), null, 2) + '\n', {
                mode: 0o600,
            });
            fs.renameSync(tmp, target);
        } catch (error) {
            fs.rmSync(tmp, { force: true });
            throw error;
        }
    }

    async read(audience: string): Promise<Credential | null> {
        const file = this.pathFor(audience);
        if (!fs.existsSync(file)) {
            return null;
        }

        try {
            const parsed = persistedCredentialSchema.safeParse(
                JSON.parse(fs.readFileSync(file, 'utf8')),
            );
            if (!parsed.success || parsed.data.audience !== audience) {
                return null;
            }
            return fromPersisted(parsed.data);
        } catch {
            return null;
        }
    }

    async remove(audience: string): Promise<void> {
        fs.rmSync(this.pathFor(audience), { force: true });
    }

    async exists(audience: string): Promise<boolean> {
        return fs.existsSync(this.pathFor(audience));
    }
}
