/**
 * Config CLI Commands
 * iap-token config init | show | set <key> <value> | path
 */

import { Command } from 'commander';
import * as readline from 'readline';
import chalk from 'chalk';
import { log } from '../utils/logger.js';
import {
    readSavedConfig,
    writeSavedConfig,
    updateSavedConfig,
    getConfigDir,
    SAVED_CONFIG_KEYS,
    type SavedConfig,
} from '../utils/config.js';

const MASK = '••••••';

function mask(secret: string | undefined): string {
    return MASK + (secret?.slice(-4) || '');
}

function ask(rl: readline.Interface, prompt: string, defaultValue?: string): Promise<string> {
    const display = defaultValue ? `${prompt} ${chalk.dim(`(${defaultValue})`)} ` : `${prompt} `;
    return new Promise((resolve) => {
        rl.question(display, (answer) => {
            resolve(answer.trim() || defaultValue || '');
        });
    });
}

function isConfigKey(key: string): key is keyof SavedConfig {
    return SAVED_CONFIG_KEYS.some((k) => k === key);
}

export function createConfigCommand(): Command {
    const config = new Command('config').description('Manage iap-token-broker configuration');

    // ── config init ──────────────────────────────────
    config
        .command('init')
        .description('Interactive setup — saves settings to ~/.iap-token-broker/config.json')
        .action(async () => {
            const existing = readSavedConfig();

            if (existing) {
                log.info('Existing configuration found. Values will be used as defaults.');
                log.dim(`  Config file: ${getConfigDir()}/config.json`);
            }

            const rl = readline.createInterface({
                input: process.stdin,
                output: process.stderr,
            });

            try {
                log.header('iap-token-broker Setup');
                log.dim('  Settings are saved to ~/.iap-token-broker/config.json (chmod 600)');
                log.dim('  Credentials are saved to ~/.iap-token-broker/credentials/ (chmod 600)');

                const audience = await ask(rl, '  Proxy OAuth client ID (audience):', existing?.audience);
                const clientId = await ask(rl, '  Desktop OAuth client ID:', existing?.clientId);
                const clientSecret = await ask(
                    rl,
                    '  Desktop OAuth client secret:',
                    existing?.clientSecret ? mask(existing.clientSecret) : undefined
                );
                const targetUrl = await ask(rl, '  Target URL (optional):', existing?.targetUrl);

                rl.close();

                // If user entered the masked secret, keep the original
                const resolvedSecret =
                    clientSecret.startsWith(MASK) && existing?.clientSecret
                        ? existing.clientSecret
                        : clientSecret;

                if (!audience || !clientId || !resolvedSecret) {
                    log.error('Audience, client ID and client secret are required');
                    process.exit(1);
                }

                writeSavedConfig({
                    ...(existing ?? {}),
                    audience,
                    clientId,
                    clientSecret: resolvedSecret,
                    ...(targetUrl ? { targetUrl } : {}),
                });

                log.success('Configuration saved!');
                log.kv('Location', `${getConfigDir()}/config.json`);
                log.info('Next step: authenticate');
                log.dim('  iap-token auth login');
            } catch (error) {
                rl.close();
                log.error(`Setup failed: ${error instanceof Error ? error.message : error}`);
                process.exit(1);
            }
        });

    // ── config show ──────────────────────────────────
    config
        .command('show')
        .description('Display saved configuration (secrets masked)')
        .action(() => {
            const saved = readSavedConfig();

            if (!saved) {
                log.warn('No configuration found. Run: iap-token config init');
                return;
            }

            log.header('iap-token-broker Configuration');
            log.kv('Config File', `${getConfigDir()}/config.json`);
            for (const key of SAVED_CONFIG_KEYS) {
                const value = saved[key];
                if (value === undefined) continue;
                log.kv(key, key === 'clientSecret' ? mask(value) : value);
            }
        });

    // ── config set ───────────────────────────────────
    config
        .command('set')
        .description('Set a single config value')
        .argument('<key>', `Config key: ${SAVED_CONFIG_KEYS.join(', ')}`)
        .argument('<value>', 'Value to set')
        .action((key: string, value: string) => {
            if (!isConfigKey(key)) {
                log.error(`Invalid key "${key}". Valid keys: ${SAVED_CONFIG_KEYS.join(', ')}`);
                process.exit(1);
            }

            updateSavedConfig({ [key]: value });
            log.success(`Set ${key} = ${key === 'clientSecret' ? mask(value) : value}`);
        });

    // ── config path ──────────────────────────────────
    config
        .command('path')
        .description('Print the config directory path')
        .action(() => {
            console.log(getConfigDir());
        });

    return config;
}
