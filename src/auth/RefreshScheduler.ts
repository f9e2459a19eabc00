/**
 * Refresh Scheduler
 *
 * Refreshes the token on a fixed cadence, independent of request traffic.
 * Idle → Sleeping → Refreshing → Sleeping ... until stopped. Failures are
 * logged and the next tick serves as the retry; a rejected refresh token is
 * left for the next accessor call to resolve through the consent flow.
 */

import type { Credential } from './TokenStore.js';
import { AuthError, type AuthErrorKind } from './errors.js';
import { log } from '../utils/logger.js';

export type SchedulerState = 'idle' | 'sleeping' | 'refreshing';

export interface RefreshTarget {
    readonly audience: string;
    refreshNow(): Promise<Credential>;
}

export interface RefreshSchedulerConfig {
    intervalMs: number;
    /** Keep the event loop alive while sleeping (long-running daemons) */
    keepAlive?: boolean;
}

export interface SchedulerStats {
    runs: number;
    successes: number;
    failures: number;
    lastRunAt: Date | null;
    lastErrorKind: AuthErrorKind | 'unknown' | null;
}

export class RefreshScheduler {
    private readonly target: RefreshTarget;
    private readonly intervalMs: number;
    private readonly keepAlive: boolean;
    private timer: NodeJS.Timeout | null = null;
    private _state: SchedulerState = 'idle';
    private readonly _stats: SchedulerStats = {
        runs: 0,
        successes: 0,
        failures: 0,
        lastRunAt: null,
        lastErrorKind: null,
    };

    constructor(target: RefreshTarget, config: RefreshSchedulerConfig) {
        this.target = target;
        this.intervalMs = config.intervalMs;
        this.keepAlive = config.keepAlive ?? false;
    }

    get state(): SchedulerState {
        return this._state;
    }

    start(): void {
        if (this._state !== 'idle') return;
        log.dim(`  background refresh every ${Math.round(this.intervalMs / 60000)}min`);
        this.sleep();
    }

    stop(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        this._state = 'idle';
    }

    stats(): SchedulerStats {
        return { ...this._stats };
    }

    private sleep(): void {
        this._state = 'sleeping';
        this.timer = setTimeout(() => {
            this.timer = null;
            void this.tick();
        }, this.intervalMs);
        if (!this.keepAlive) {
            this.timer.unref();
        }
    }

    private async tick(): Promise<void> {
        if (this._state !== 'sleeping') return;
        this._state = 'refreshing';
        this._stats.runs++;
        this._stats.lastRunAt = new Date();

        try {
            await this.target.refreshNow();
            this._stats.successes++;
            this._stats.lastErrorKind = null;
        } catch (error) {
            this._stats.failures++;
            this.report(error);
        }

        // stop() may have been called while the refresh was in flight
        if (this._state === 'refreshing') {
            this.sleep();
        }
    }

    private report(error: unknown): void {
        if (!(error instanceof AuthError)) {
            this._stats.lastErrorKind = 'unknown';
            log.error(`Background token refresh failed: ${error instanceof Error ? error.message : String(error)}`);
            return;
        }

        this._stats.lastErrorKind = error.kind;
        log.authFailure(error.kind, this.target.audience, error.message);
        if (error.kind === 'refresh_rejected' || error.kind === 'interaction_required') {
            log.warn('Background refresh cannot recover; the next token request will re-authenticate');
        }
    }
}
