/**
 * src/utils/adaptiveController.ts
 *
 * Adaptive pacing per (source, role).
 *
 * Each pair carries a concurrency limit C and an inter-request delay D,
 * recomputed from the shared ErrorRateWindow every `adjustEvery` reports,
 * after `adjustIntervalMs`, or at once on a blocked verdict:
 *
 *   rate > high                      C ← max(floor, ⌊C/2⌋)   D ← min(max, D · up)
 *   rate < low, held for sustainMs   C ← min(ceiling, C + 1)  D ← max(min, D · down)
 *
 * C is enforced across processes with a shared slot set: beforeRequest()
 * waits for a slot, then for the paced delay plus jitter. report() frees the
 * slot, records the verdict and, on a blocked verdict, cools down every pool
 * resource the request used.
 *
 * Thresholds, floors and ceilings come from the source profile table, so a
 * stricter source is just a smaller ceiling in config/sources.json.
 */

import { log } from '@crawlee/core';
import { storeKey, type SharedStore } from '../broker/sharedStore.js';
import type { PacingPolicy } from '../config/sources.js';
import type { ProcessRole, RequestVerdict } from '../sources/types.js';
import { describeError, ok, transientFailure, type Outcome } from './errors.js';
import { ErrorRateWindow, weightedErrorRate } from './errorRateWindow.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface PacingState {
    source: string;
    role: ProcessRole;
    concurrency: number;
    delayMs: number;
    errorRate: number;
    reportsSinceAdjust: number;
    lastAdjustedAt: number;
    /** When the rate first dropped below the low threshold, or null. */
    lowSince: number | null;
    lastRequestAt: number;
}

export interface PacingTicket {
    source: string;
    role: ProcessRole;
    holder: string;
    /** Paced delay actually waited, jitter included. */
    delayMs: number;
}

/** Anything whose resources can be cooled down after a block. */
export interface CooldownTarget {
    cooldown(resourceId: string, reason: string): Promise<void>;
}

export interface ImplicatedResource {
    pool: CooldownTarget;
    resourceId: string;
}

export interface ControllerReport {
    verdict: RequestVerdict;
    ticket?: PacingTicket;
    resources?: ImplicatedResource[];
}

export interface AdaptiveControllerOptions {
    namespace?: string;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
    /** Poll interval while waiting for a concurrency slot. */
    slotPollMs?: number;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

// ─── Controller ───────────────────────────────────────────────────────────────

export class AdaptiveController {
    private readonly states = new Map<string, PacingState>();
    private readonly namespace: string;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly random: () => number;
    private readonly slotPollMs: number;

    constructor(
        private readonly window: ErrorRateWindow,
        private readonly store: SharedStore,
        private readonly policyFor: (source: string) => PacingPolicy,
        options: AdaptiveControllerOptions = {},
    ) {
        this.namespace = options.namespace ?? 'crawl';
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? sleep;
        this.random = options.random ?? Math.random;
        this.slotPollMs = options.slotPollMs ?? 250;
    }

    private slotsKey(source: string, role: ProcessRole): string {
        return storeKey(this.namespace, 'slots', source, role);
    }

    getState(source: string, role: ProcessRole): PacingState {
        const id = `${source}/${role}`;
        let state = this.states.get(id);
        if (!state) {
            const policy = this.policyFor(source);
            state = {
                source,
                role,
                concurrency: Math.min(policy.concurrencyCeiling, Math.max(policy.concurrencyFloor, policy.initialConcurrency)),
                delayMs: Math.min(policy.maxDelayMs, Math.max(policy.minDelayMs, policy.baseDelayMs)),
                errorRate: 0,
                reportsSinceAdjust: 0,
                lastAdjustedAt: this.now(),
                lowSince: null,
                lastRequestAt: 0,
            };
            this.states.set(id, state);
        }
        return state;
    }

    /**
     * Waits until the caller may send its next request and returns the ticket
     * to hand back to report(). `holder` identifies the caller's slot. A store
     * failure while claiming the slot comes back as a transient outcome.
     */
    async beforeRequest(source: string, role: ProcessRole, holder: string): Promise<Outcome<PacingTicket>> {
        const policy = this.policyFor(source);
        const state = this.getState(source, role);

        try {
            for (;;) {
                const now = this.now();
                const admitted = await this.store.claimSlot(
                    this.slotsKey(source, role),
                    holder,
                    state.concurrency,
                    now,
                    now + policy.slotTtlMs,
                );
                if (admitted) break;
                await this.sleep(this.slotPollMs);
            }
        } catch (err) {
            return transientFailure(`pacing slot ${source}/${role}`, err);
        }

        const jitter = Math.round(this.random() * policy.jitterMs);
        const elapsed = this.now() - state.lastRequestAt;
        const wait = Math.max(0, state.delayMs + jitter - elapsed);
        if (wait > 0) await this.sleep(wait);
        state.lastRequestAt = this.now();

        return ok({ source, role, holder, delayMs: wait });
    }

    /**
     * Records an outcome. Store problems are logged and swallowed here so that
     * reporting never stalls the worker loop.
     */
    async report(source: string, role: ProcessRole, report: ControllerReport): Promise<PacingState> {
        const state = this.getState(source, role);
        const policy = this.policyFor(source);

        try {
            if (report.ticket) {
                await this.store.scheduleRemove(this.slotsKey(source, role), report.ticket.holder);
            }
            await this.window.record(source, role, report.verdict);
        } catch (err) {
            log.warning(`[Controller] ${source}/${role}: could not record outcome: ${describeError(err)}`);
        }

        if (report.verdict === 'blocked') {
            for (const implicated of report.resources ?? []) {
                try {
                    await implicated.pool.cooldown(implicated.resourceId, 'blocked');
                } catch (err) {
                    log.warning(`[Controller] Cooldown of ${implicated.resourceId} failed: ${describeError(err)}`);
                }
            }
        }

        state.reportsSinceAdjust++;
        const due =
            report.verdict === 'blocked' ||
            state.reportsSinceAdjust >= policy.adjustEvery ||
            this.now() - state.lastAdjustedAt >= policy.adjustIntervalMs;
        if (due) {
            try {
                await this.adjust(source, role, report.verdict === 'blocked');
            } catch (err) {
                log.warning(`[Controller] ${source}/${role}: adjustment skipped: ${describeError(err)}`);
            }
        }
        return state;
    }

    /** One adjustment cycle from the current window. */
    async adjust(source: string, role: ProcessRole, force = false): Promise<PacingState> {
        const policy = this.policyFor(source);
        const state = this.getState(source, role);
        const counts = await this.window.read(source, role);
        const now = this.now();

        state.reportsSinceAdjust = 0;
        state.lastAdjustedAt = now;
        if (counts.total < policy.minSamples && !force) return state;

        const rate = weightedErrorRate(counts, policy.blockedWeight);
        const before = { concurrency: state.concurrency, delayMs: state.delayMs };
        state.errorRate = rate;

        if (rate > policy.highErrorRate) {
            state.lowSince = null;
            state.concurrency = Math.max(policy.concurrencyFloor, Math.floor(state.concurrency / 2));
            state.delayMs = Math.min(policy.maxDelayMs, Math.max(state.delayMs, 1) * policy.delayIncreaseFactor);
        } else if (rate < policy.lowErrorRate) {
            state.lowSince ??= now;
            if (now - state.lowSince >= policy.sustainMs) {
                state.concurrency = Math.min(policy.concurrencyCeiling, state.concurrency + 1);
                state.delayMs = Math.max(policy.minDelayMs, state.delayMs * policy.delayDecreaseFactor);
                // The next step up needs another sustained stretch.
                state.lowSince = now;
            }
        } else {
            state.lowSince = null;
        }

        if (before.concurrency !== state.concurrency || before.delayMs !== state.delayMs) {
            const pct = (rate * 100).toFixed(1);
            const message =
                `[Controller] ${source}/${role} error rate ${pct}% over ${counts.total} request(s): ` +
                `concurrency ${before.concurrency}→${state.concurrency}, ` +
                `delay ${Math.round(before.delayMs)}→${Math.round(state.delayMs)}ms`;
            if (rate > policy.highErrorRate) log.warning(message);
            else log.info(message);
        }
        return state;
    }

    /** Backoff for a task that failed `attempts` times: min(max, base · 2^attempts) + jitter. */
    retryDelay(attempts: number, baseMs: number, maxMs: number): number {
        const exponential = Math.min(maxMs, baseMs * Math.pow(2, Math.max(0, attempts)));
        return Math.round(exponential + this.random() * baseMs);
    }

    snapshot(): PacingState[] {
        return [...this.states.values()].map((s) => ({ ...s }));
    }
}
