/**
 * Auth CLI Commands
 * iap-token auth login | logout | status
 */

import { Command } from 'commander';
import { log } from '../utils/logger.js';
import { formatDuration } from '../utils/dates.js';
import { createBrowserPrompt, createClient, fail } from './shared.js';

export function createAuthCommand(): Command {
    const auth = new Command('auth').description('Manage the identity-aware proxy credential');

    auth.command('login')
        .description('Run the browser consent flow and store a refreshable credential')
        .action(async () => {
            const prompt = createBrowserPrompt();
            try {
                const client = createClient({ onPrompt: prompt.onPrompt });
                await client.authenticate();
                prompt.done();

                const status = await client.getAuthStatus();
                log.kv('Audience', status.audience);
                if (status.expiresAt) {
                    log.kv('Token Expires', status.expiresAt.toLocaleString());
                }
                log.kv('Can Refresh', status.canRefresh ? 'Yes' : 'No');
            } catch (error) {
                prompt.done();
                fail('Authentication', error);
            }
        });

    auth.command('logout')
        .description('Clear the stored credential')
        .action(async () => {
            try {
                await createClient().logout();
                log.success('Logged out successfully');
            } catch (error) {
                fail('Logout', error);
            }
        });

    auth.command('status')
        .description('Show current authentication status')
        .action(async () => {
            try {
                const status = await createClient().getAuthStatus();

                if (!status.authenticated) {
                    log.warn('Not authenticated. Run: iap-token auth login');
                    return;
                }

                log.success('Authenticated');
                log.kv('Audience', status.audience);
                if (status.expiresAt && status.expiresInMs !== undefined) {
                    log.kv('Token Expires', status.expiresAt.toLocaleString());
                    log.kv('Remaining', formatDuration(status.expiresInMs));
                    log.kv('Expired', status.isExpired ? 'Yes' : 'No');
                    log.kv('Needs Refresh', status.needsRefresh ? 'Yes' : 'No');
                    log.kv('Can Refresh', status.canRefresh ? 'Yes' : 'No');
                }
            } catch (error) {
                fail('Status check', error);
            }
        });

    return auth;
}
