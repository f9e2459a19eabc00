/**
 * Config utility
 *
 * Resolution chain (highest priority wins):
 * 1. Environment variables (IAP_AUDIENCE, IAP_CLIENT_ID, etc.)
 * 2. Global config file (~/.iap-token-broker/config.json)
 * 3. Project-local .env (cwd fallback)
 *
 * Persistent config lives at ~/.iap-token-broker/config.json
 * Credentials live at ~/.iap-token-broker/credentials/
 */

import { parse as parseDotenv } from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';
import { z } from 'zod';
import { parseDuration } from './dates.js';
import { ConfigurationError } from '../auth/errors.js';

// ── Config Dir ──────────────────────────────────────

const CONFIG_DIR_NAME = '.iap-token-broker';
const CONFIG_FILE_NAME = 'config.json';

export const DEFAULT_REFRESH_INTERVAL_MS = 50 * 60 * 1000;
export const DEFAULT_SAFETY_MARGIN_MS = 5 * 60 * 1000;
export const DEFAULT_CONSENT_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Get config directory path (~/.iap-token-broker/)
 */
export function getConfigDir(): string {
    const dir = path.join(
        process.env.HOME || process.env.USERPROFILE || '/tmp',
        CONFIG_DIR_NAME
    );
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    return dir;
}

function getConfigFilePath(): string {
    return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

// ── Saved Config (persistent) ───────────────────────

const savedConfigSchema = z.object({
    audience: z.string().optional(),
    clientId: z.string().optional(),
    clientSecret: z.string().optional(),
    targetUrl: z.string().optional(),
    refreshInterval: z.string().optional(),
    safetyMargin: z.string().optional(),
    consentTimeout: z.string().optional(),
    callbackPort: z.string().optional(),
});

export type SavedConfig = z.infer<typeof savedConfigSchema>;

export const SAVED_CONFIG_KEYS = savedConfigSchema.keyof().options;

/**
 * Read the saved global config file
 */
export function readSavedConfig(): SavedConfig | null {
    const configPath = getConfigFilePath();
    if (!fs.existsSync(configPath)) return null;

    try {
        const parsed = savedConfigSchema.safeParse(JSON.parse(fs.readFileSync(configPath, 'utf8')));
        return parsed.success ? parsed.data : null;
    } catch {
        return null;
    }
}

/**
 * Write config to the global config file
 */
export function writeSavedConfig(config: SavedConfig): void {
    const configPath = getConfigFilePath();
    fs.writeFileSync(
        configPath,
        JSON.stringify(config, null, 2) + '\n',
        { mode: 0o600 }
    );
}

/**
 * Update specific fields in the saved config
 */
export function updateSavedConfig(updates: Partial<SavedConfig>): SavedConfig {
    const merged = { ...(readSavedConfig() ?? {}), ...updates };
    writeSavedConfig(merged);
    return merged;
}

// ── Resolved Config (runtime) ───────────────────────

export interface Config {
    /** Client id of the protected resource (the proxy's OAuth client) */
    audience: string;
    /** This tool's registered desktop OAuth client */
    clientId: string;
    clientSecret: string;
    targetUrl?: string;
    refreshIntervalMs: number;
    safetyMarginMs: number;
    consentTimeoutMs: number;
    /** 0 picks an ephemeral port */
    callbackPort: number;
}

const resolvedConfigSchema = z
    .object({
        audience: z.string().min(1),
        clientId: z.string().min(1),
        clientSecret: z.string().min(1),
        targetUrl: z.string().url().optional(),
        refreshIntervalMs: z.number().int().positive(),
        safetyMarginMs: z.number().int().nonnegative(),
        consentTimeoutMs: z.number().int().positive(),
        callbackPort: z.number().int().min(0).max(65535),
    })
    .refine((c) => c.safetyMarginMs < c.refreshIntervalMs, {
        message: 'safety margin must be shorter than the refresh interval',
        path: ['safetyMarginMs'],
    });

const ENV_NAMES: Record<keyof SavedConfig, string> = {
    audience: 'IAP_AUDIENCE',
    clientId: 'IAP_CLIENT_ID',
    clientSecret: 'IAP_CLIENT_SECRET',
    targetUrl: 'IAP_TARGET_URL',
    refreshInterval: 'IAP_REFRESH_INTERVAL',
    safetyMargin: 'IAP_SAFETY_MARGIN',
    consentTimeout: 'IAP_CONSENT_TIMEOUT',
    callbackPort: 'IAP_CALLBACK_PORT',
};

let cachedConfig: Config | null = null;

function durationOrDefault(key: keyof SavedConfig, raw: string | undefined, fallback: number): number {
    if (!raw) return fallback;
    try {
        return parseDuration(raw);
    } catch (error) {
        throw new ConfigurationError(
            `${ENV_NAMES[key]}: ${error instanceof Error ? error.message : String(error)}`
        );
    }
}

/**
 * Merge environment, saved config and .env values, then validate.
 * Exposed separately from getConfig() so it can be exercised without caching.
 */
export function resolveConfig(
    env: NodeJS.ProcessEnv,
    saved: SavedConfig | null,
    dotenv: Record<string, string> = {}
): Config {
    const pick = (key: keyof SavedConfig): string | undefined =>
        env[ENV_NAMES[key]] || saved?.[key] || dotenv[ENV_NAMES[key]] || undefined;

    const missing = (['audience', 'clientId', 'clientSecret'] as const).filter((key) => !pick(key));
    if (missing.length > 0) {
        throw new ConfigurationError(
            'iap-token-broker is not configured.\n\n' +
            'Run this first:\n' +
            '  iap-token config init\n\n' +
            'Or set environment variables:\n' +
            missing.map((key) => `  export ${ENV_NAMES[key]}=...`).join('\n') +
            '\n'
        );
    }

    const port = pick('callbackPort');
    const candidate = {
        audience: pick('audience'),
        clientId: pick('clientId'),
        clientSecret: pick('clientSecret'),
        targetUrl: pick('targetUrl'),
        refreshIntervalMs: durationOrDefault('refreshInterval', pick('refreshInterval'), DEFAULT_REFRESH_INTERVAL_MS),
        safetyMarginMs: durationOrDefault('safetyMargin', pick('safetyMargin'), DEFAULT_SAFETY_MARGIN_MS),
        consentTimeoutMs: durationOrDefault('consentTimeout', pick('consentTimeout'), DEFAULT_CONSENT_TIMEOUT_MS),
        callbackPort: port ? Number(port) : 0,
    };

    const parsed = resolvedConfigSchema.safeParse(candidate);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');
        throw new ConfigurationError(`Invalid configuration:\n${details}`);
    }
    return parsed.data;
}

/**
 * Resolve config using the priority chain:
 * 1. Environment variables
 * 2. Global config (~/.iap-token-broker/config.json)
 * 3. Project-local .env
 */
export function getConfig(): Config {
    if (cachedConfig) return cachedConfig;

    // Layer 3: project-local .env, parsed without touching process.env
    const envPath = path.resolve(process.cwd(), '.env');
    const dotenv = fs.existsSync(envPath) ? parseDotenv(fs.readFileSync(envPath, 'utf-8')) : {};

    cachedConfig = resolveConfig(process.env, readSavedConfig(), dotenv);
    return cachedConfig;
}

/**
 * Clear the cached config (for testing or after config changes)
 */
export function clearConfigCache(): void {
    cachedConfig = null;
}
