/**
 * @fileoverview ClipboardPoller - Fixed-period, non-reentrant tick loop
 * @module services/ClipboardPoller
 *
 * One timer drives all clipboard sampling. The next tick is scheduled only
 * after the current one settles, so ticks never overlap. A failing tick is
 * logged and the loop carries on.
 *
 * Usage:
 * ```typescript
 * const poller = new ClipboardPoller(() => manager.pollOnce().then(() => undefined));
 * poller.start();
 * // ...
 * poller.stop();
 * await poller.whenIdle();
 * ```
 */

import { POLL_INTERVAL_MS } from '../core/Constants';
import type { Callback } from '../types';

/**
 * Tick callback type
 */
export type PollTick = () => Promise<void>;

/**
 * Poller options
 */
export interface ClipboardPollerOptions {
    /** Period between the end of one tick and the start of the next */
    intervalMs?: number;
    /** Called with the error of a failed tick */
    onTickError?: Callback<unknown>;
}

/**
 * Tick counters
 */
export interface PollerStats {
    ticks: number;
    failedTicks: number;
}

export class ClipboardPoller {
    private readonly tick: PollTick;
    private readonly intervalMs: number;
    private readonly onTickError: Callback<unknown> | undefined;

    private timer: ReturnType<typeof setTimeout> | null = null;
    private inFlight: Promise<void> | null = null;
    private running = false;
    private stats: PollerStats = { ticks: 0, failedTicks: 0 };

    constructor(tick: PollTick, options: ClipboardPollerOptions = {}) {
        this.tick = tick;
        this.intervalMs = options.intervalMs ?? POLL_INTERVAL_MS;
        this.onTickError = options.onTickError;
    }

    /**
     * Start polling. No-op if already running.
     * If a tick from a previous run is still in flight, the chain resumes
     * from its completion instead of starting a second timer.
     */
    start(): void {
        if (this.running) return;
        this.running = true;
        if (this.inFlight === null) {
            this._schedule();
        }
        console.log(`[ClipboardPoller] Started (${this.intervalMs}ms)`);
    }

    /**
     * Stop polling. A tick already in flight runs to completion;
     * await whenIdle() to wait for it.
     */
    stop(): void {
        if (!this.running) return;
        this.running = false;

        if (this.timer !== null) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        console.log('[ClipboardPoller] Stopped');
    }

    /**
     * Resolves once no tick is in flight
     */
    whenIdle(): Promise<void> {
        return this.inFlight ?? Promise.resolve();
    }

    isRunning(): boolean {
        return this.running;
    }

    getStats(): PollerStats {
        return { ...this.stats };
    }

    private _schedule(): void {
        this.timer = setTimeout(() => {
            this.timer = null;
            this.inFlight = this._runTick().finally(() => {
                this.inFlight = null;
                if (this.running) {
                    this._schedule();
                }
            });
        }, this.intervalMs);
    }

    private async _runTick(): Promise<void> {
        this.stats.ticks++;
        try {
            await this.tick();
        } catch (error) {
            this.stats.failedTicks++;
            console.error('[ClipboardPoller] Tick failed:', error);
            try {
                this.onTickError?.(error);
            } catch (handlerError) {
                console.error('[ClipboardPoller] Tick error handler failed:', handlerError);
            }
        }
    }
}
