/**
 * Token CLI Commands
 * iap-token token | request <path> | watch
 */

import { Command } from 'commander';
import { log } from '../utils/logger.js';
import { formatDuration } from '../utils/dates.js';
import { createBrowserPrompt, createClient, fail } from './shared.js';

export function createTokenCommand(): Command {
    return new Command('token')
        .description('Print a valid bearer token to stdout (e.g. for curl)')
        .action(async () => {
            const prompt = createBrowserPrompt();
            try {
                const client = createClient({ onPrompt: prompt.onPrompt });
                await client.start();
                const token = await client.getValidToken();
                client.stop();
                prompt.done();
                process.stdout.write(`${token}\n`);
            } catch (error) {
                prompt.done();
                fail('Token request', error);
            }
        });
}

export function createRequestCommand(): Command {
    return new Command('request')
        .description('Send a request to the protected resource through the proxy')
        .argument('<path>', 'Path relative to the target URL, e.g. /api/v2/version')
        .option('-X, --method <method>', 'HTTP method', 'GET')
        .option('-d, --data <json>', 'JSON request body')
        .option('--proxy-header', 'Send the token as Proxy-Authorization')
        .action(async (path: string, options: { method: string; data?: string; proxyHeader?: boolean }) => {
            const prompt = createBrowserPrompt();
            try {
                const client = createClient({
                    onPrompt: prompt.onPrompt,
                    authorizationHeader: options.proxyHeader ? 'Proxy-Authorization' : 'Authorization',
                });
                await client.start();

                const body: unknown = options.data ? JSON.parse(options.data) : undefined;
                const result = await client.http.request({
                    method: options.method.toUpperCase(),
                    url: path,
                    data: body,
                });
                client.stop();
                prompt.done();
                process.stdout.write(
                    (typeof result === 'string' ? result : JSON.stringify(result, null, 2)) + '\n'
                );
            } catch (error) {
                prompt.done();
                fail('Request', error);
            }
        });
}

export function createWatchCommand(): Command {
    return new Command('watch')
        .description('Keep the credential refreshed in the background until interrupted')
        .action(async () => {
            const prompt = createBrowserPrompt();
            try {
                const client = createClient({ onPrompt: prompt.onPrompt, keepAlive: true });
                await client.start();
                prompt.done();

                const status = await client.getAuthStatus();
                log.success(`Watching credential for ${status.audience}`);
                if (status.expiresInMs !== undefined) {
                    log.kv('Expires In', formatDuration(status.expiresInMs));
                }

                process.once('SIGINT', () => {
                    client.stop();
                    const stats = client.schedulerStats();
                    log.info(`Stopped after ${stats.runs} refreshes (${stats.failures} failed)`);
                });
            } catch (error) {
                prompt.done();
                fail('Watch', error);
            }
        });
}
