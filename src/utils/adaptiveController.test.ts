import { describe, it, expect, vi } from 'vitest';
import { MemoryStore } from '../broker/memoryStore.js';
import { PacingPolicySchema, type PacingPolicy } from '../config/sources.js';
import { AdaptiveController, type PacingTicket } from './adaptiveController.js';
import { ErrorRateWindow, weightedErrorRate } from './errorRateWindow.js';
import type { RequestVerdict } from '../sources/types.js';

function setup(overrides: Partial<PacingPolicy> = {}) {
    const now = { value: 10_000_000 };
    const clock = () => now.value;
    const store = new MemoryStore({ now: clock });
    const window = new ErrorRateWindow(store, { namespace: 't', windowMs: 60_000, bucketMs: 10_000, now: clock });
    const policy = PacingPolicySchema.parse({
        concurrencyFloor: 1,
        concurrencyCeiling: 8,
        initialConcurrency: 8,
        baseDelayMs: 1_000,
        minDelayMs: 500,
        maxDelayMs: 8_000,
        jitterMs: 0,
        highErrorRate: 0.3,
        lowErrorRate: 0.05,
        sustainMs: 0,
        minSamples: 5,
        ...overrides,
    });
    const sleeps: number[] = [];
    let onPoll: (() => Promise<void>) | null = null;
    const controller = new AdaptiveController(window, store, () => policy, {
        namespace: 't',
        now: clock,
        random: () => 0,
        slotPollMs: 250,
        sleep: async (ms) => {
            sleeps.push(ms);
            now.value += ms;
            if (ms === 250 && onPoll) {
                const hook = onPoll;
                onPoll = null;
                await hook();
            }
        },
    });
    const record = async (verdict: RequestVerdict, times: number) => {
        for (let i = 0; i < times; i++) await window.record('X', 'worker', verdict);
    };
    return {
        now,
        store,
        window,
        controller,
        sleeps,
        record,
        setOnPoll: (hook: () => Promise<void>) => {
            onPoll = hook;
        },
    };
}

async function admit(controller: AdaptiveController, holder: string): Promise<PacingTicket> {
    const outcome = await controller.beforeRequest('X', 'worker', holder);
    if (!outcome.ok) throw outcome.error;
    return outcome.value;
}

describe('weightedErrorRate', () => {
    it('weights blocked outcomes and caps at 1', () => {
        expect(weightedErrorRate({ total: 10, failures: 1, blocked: 1 }, 3)).toBeCloseTo(0.4);
        expect(weightedErrorRate({ total: 2, failures: 0, blocked: 2 }, 3)).toBe(1);
        expect(weightedErrorRate({ total: 0, failures: 0, blocked: 0 }, 3)).toBe(0);
    });
});

describe('ErrorRateWindow', () => {
    it('forgets buckets older than the window', async () => {
        const { window, now, record } = setup();
        await record('failure', 3);
        expect(await window.read('X', 'worker')).toEqual({ total: 3, failures: 3, blocked: 0 });

        now.value += 70_000;
        await record('success', 1);
        expect(await window.read('X', 'worker')).toEqual({ total: 1, failures: 0, blocked: 0 });
    });
});

describe('AdaptiveController', () => {
    it('never raises concurrency while the error rate stays high', async () => {
        const { controller, record } = setup();
        await record('failure', 10);

        const seen: Array<[number, number]> = [];
        for (let cycle = 0; cycle < 5; cycle++) {
            const state = await controller.adjust('X', 'worker');
            seen.push([state.concurrency, state.delayMs]);
        }

        expect(seen).toEqual([
            [4, 2_000],
            [2, 4_000],
            [1, 8_000],
            [1, 8_000],
            [1, 8_000],
        ]);
    });

    it('speeds up one step per cycle up to the ceiling while the rate stays low', async () => {
        const { controller, record } = setup({ initialConcurrency: 2, concurrencyCeiling: 4 });
        await record('success', 10);

        const concurrency: number[] = [];
        for (let cycle = 0; cycle < 4; cycle++) {
            concurrency.push((await controller.adjust('X', 'worker')).concurrency);
        }

        expect(concurrency).toEqual([3, 4, 4, 4]);
        expect(controller.getState('X', 'worker').delayMs).toBe(500);
    });

    it('waits for the sustain period before speeding up', async () => {
        const { controller, record, now } = setup({ initialConcurrency: 2, sustainMs: 60_000 });
        await record('success', 10);

        expect((await controller.adjust('X', 'worker')).concurrency).toBe(2);
        now.value += 30_000;
        expect((await controller.adjust('X', 'worker')).concurrency).toBe(2);
        now.value += 30_000;
        await record('success', 10);
        expect((await controller.adjust('X', 'worker')).concurrency).toBe(3);
    });

    it('leaves pacing alone below the minimum sample count', async () => {
        const { controller, record } = setup();
        await record('failure', 4);

        const state = await controller.adjust('X', 'worker');

        expect(state.concurrency).toBe(8);
        expect(state.delayMs).toBe(1_000);
    });

    it('reacts to a single blocked verdict at once and cools the resources down', async () => {
        const { controller, window } = setup({ initialConcurrency: 4 });
        const pool = { cooldown: vi.fn(async () => {}) };

        const state = await controller.report('X', 'worker', {
            verdict: 'blocked',
            resources: [{ pool, resourceId: 'r1' }],
        });

        expect(await window.read('X', 'worker')).toEqual({ total: 1, failures: 0, blocked: 1 });
        expect(state.errorRate).toBe(1);
        expect(state.concurrency).toBe(2);
        expect(state.delayMs).toBe(2_000);
        expect(pool.cooldown).toHaveBeenCalledWith('r1', 'blocked');
    });

    it('paces consecutive requests by the current delay', async () => {
        const { controller, sleeps } = setup();

        const first = await admit(controller, 'w1');
        await controller.report('X', 'worker', { verdict: 'success', ticket: first });
        const second = await admit(controller, 'w1');

        expect(first.delayMs).toBe(0);
        expect(second.delayMs).toBe(1_000);
        expect(sleeps).toEqual([1_000]);
    });

    it('holds a caller until a concurrency slot frees up', async () => {
        const { controller, sleeps, setOnPoll } = setup({ initialConcurrency: 1 });

        const first: PacingTicket = await admit(controller, 'a');
        setOnPoll(async () => {
            await controller.report('X', 'worker', { verdict: 'success', ticket: first });
        });
        const second = await admit(controller, 'b');

        expect(second.holder).toBe('b');
        expect(sleeps[0]).toBe(250);
    });

    it('returns a transient failure when the slot set is unreachable', async () => {
        const { controller, store, sleeps } = setup();
        vi.spyOn(store, 'claimSlot').mockRejectedValue(new Error('ECONNREFUSED'));

        const outcome = await controller.beforeRequest('X', 'worker', 'w1');

        expect(outcome.ok).toBe(false);
        if (outcome.ok) return;
        expect(outcome.error.kind).toBe('transient');
        expect(outcome.error.message).toContain('pacing slot X/worker');
        expect(sleeps).toEqual([]);
    });

    it('computes exponential retry delays', () => {
        const { controller } = setup();
        expect(controller.retryDelay(0, 1_000, 60_000)).toBe(1_000);
        expect(controller.retryDelay(2, 1_000, 60_000)).toBe(4_000);
        expect(controller.retryDelay(10, 1_000, 60_000)).toBe(60_000);
    });
});
