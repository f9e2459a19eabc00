/**
 * Shared command utilities
 * Common helpers used across all CLI command modules
 */

import open from 'open';
import ora, { type Ora } from 'ora';
import { getConfig } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import { IapClient, type IapClientConfig } from '../client/IapClient.js';
import type { InteractionPrompt } from '../auth/index.js';

/**
 * Prints the consent URL, tries to open it in the browser and shows a
 * spinner until the returned stop function is called.
 */
export function createBrowserPrompt(): {
    onPrompt: (prompt: InteractionPrompt) => Promise<void>;
    done: () => void;
} {
    let spinner: Ora | null = null;

    return {
        onPrompt: async (prompt) => {
            log.header('🔐 Authentication required');
            log.info('Sign in with the account that has access to the protected resource.');
            log.dim(`  ${prompt.url}`);
            try {
                await open(prompt.url);
            } catch (error) {
                log.warn(`Could not open a browser (${errorMessage(error)}); open the URL above manually.`);
            }
            spinner = ora({ text: 'Waiting for authentication...', stream: process.stderr }).start();
        },
        done: () => {
            spinner?.stop();
            spinner = null;
        },
    };
}

/**
 * Creates an IapClient from the resolved configuration.
 * Used by all CLI commands that need a token.
 */
export function createClient(overrides: Partial<IapClientConfig> = {}): IapClient {
    return new IapClient({ ...getConfig(), ...overrides });
}

/**
 * Logs the failure and exits with status 1
 */
export function fail(action: string, error: unknown): never {
    log.error(`${action} failed: ${errorMessage(error)}`);
    process.exit(1);
}
