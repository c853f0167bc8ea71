import { describe, it, expect, vi } from 'vitest';
import { MemoryStore } from './broker/memoryStore.js';
import { parseSourceTable } from './config/sources.js';
import { selectorExtractor } from './extractors/selectorExtractor.js';
import type { Fetcher } from './fetch/httpFetcher.js';
import { planSeedTasks, runMaster } from './master.js';
import { RecordDeduplicator } from './pipeline/dedup.js';
import { IngestionPipeline } from './pipeline/pipeline.js';
import { MemoryRowStore } from './pipeline/sinks/memoryRowStore.js';
import { AdaptiveController } from './utils/adaptiveController.js';
import { ErrorRateWindow, weightedErrorRate } from './utils/errorRateWindow.js';
import { Monitor } from './utils/monitor.js';
import { ResourcePool, resourceId } from './utils/resourcePool.js';
import { createRunContext } from './utils/runContext.js';
import { FatalError } from './utils/errors.js';
import { TaskQueue } from './utils/taskQueue.js';
import { CrawlWorker, type WorkerDeps, type WorkerOptions } from './worker.js';

const SEARCH_HTML = `
<html><body><ul>
  <li class="goods" data-sku="P1"><span class="name">手机 Pro</span><span class="price">¥1,999.00</span></li>
</ul></body></html>`;

const profiles = parseSourceTable({
    sources: [
        {
            id: 'X',
            keywords: ['手机'],
            maxPages: 1,
            urls: { search: 'https://shop.example/search?q={keyword}&page={page}' },
            extract: {
                search: { item: '.goods', fields: { product_id: '@data-sku', name: '.name', price: '.price' } },
            },
            pacing: { baseDelayMs: 0, minDelayMs: 0, jitterMs: 0 },
        },
    ],
});

async function setup(
    fetcher: Fetcher,
    options: Partial<WorkerOptions> = {},
    batchSize = 1,
    maintenance?: WorkerDeps['maintenance'],
) {
    const clock = { value: Date.parse('2026-10-19T08:00:00.000Z') };
    const now = () => clock.value;
    const sleep = async (ms: number) => {
        clock.value += ms;
    };
    const store = new MemoryStore({ now });
    const namespace = 't';

    const window = new ErrorRateWindow(store, { namespace, now });
    const controller = new AdaptiveController(window, store, (source) => profiles.get(source).pacing, {
        namespace,
        now,
        sleep,
        random: () => 0,
    });
    const pools = {
        egress: new ResourcePool('egress', store, profiles.pools.egress, { namespace, now, random: () => 0 }),
        identity: new ResourcePool('identity', store, profiles.pools.identity, { namespace, now, random: () => 0 }),
        token: new ResourcePool('token', store, profiles.pools.token, { namespace, now, random: () => 0 }),
    };
    await pools.egress.seed([{ value: 'direct' }]);
    await pools.identity.seed([{ value: 'Mozilla/5.0 (Linux; Android 14; Pixel 8) AppleWebKit/537.36' }]);

    const queue = new TaskQueue(store, { namespace, visibilityTimeoutMs: 30_000, now });
    const monitor = new Monitor(store, { namespace, now });
    const rowStore = new MemoryRowStore();
    const dedup = new RecordDeduplicator(store, undefined, { namespace });
    const pipeline = new IngestionPipeline(rowStore, [], dedup, monitor, queue, { batchSize, now });

    const worker = new CrawlWorker(
        {
            context: createRunContext('worker', now()),
            queue,
            controller,
            pools,
            profiles,
            pipeline,
            monitor,
            fetcher,
            extractor: selectorExtractor,
            maintenance,
        },
        { sources: ['X'], maxIdlePolls: 1, retryBaseDelayMs: 1_000, now, sleep, ...options },
    );

    await runMaster(queue, planSeedTasks(profiles, ['X']));
    return { clock, store, window, controller, pools, queue, monitor, rowStore, pipeline, worker };
}

describe('CrawlWorker', () => {
    it('carries a seeded search task through to one committed product row', async () => {
        const fetcher = vi.fn<Fetcher>(async (plan) => ({
            status: 200,
            body: SEARCH_HTML,
            elapsedMs: 120,
            finalUrl: plan.url,
        }));
        const { worker, rowStore, monitor, pipeline, queue } = await setup(fetcher);

        const summary = await worker.run();
        await pipeline.close();

        expect(summary.results.done).toBe(1);
        expect(fetcher.mock.calls[0]?.[0].url).toBe('https://shop.example/search?q=%E6%89%8B%E6%9C%BA&page=1');
        expect(fetcher.mock.calls[0]?.[0].proxyUrl).toBeUndefined();
        expect(await rowStore.count('product')).toBe(1);
        expect(rowStore.rows('product')[0]?.key).toBe('P1');
        expect((await monitor.readDay()).items.product).toBe(1);

        const stats = await queue.stats('X');
        expect(stats.ok && stats.value).toMatchObject({ pending: 0, inFlight: 0, delayed: 0, dead: 0 });
    });

    it('requeues a blocked fetch and cools its resources down', async () => {
        const fetcher = vi.fn<Fetcher>(async (plan) => ({
            status: 200,
            body: '<html><body>访问过于频繁，请稍后再试</body></html>',
            elapsedMs: 80,
            finalUrl: plan.url,
        }));
        const { worker, window, queue, pools, monitor, clock } = await setup(fetcher);

        expect(await worker.processNext('X')).toBe('requeued');

        const counts = await window.read('X', 'worker');
        expect(counts).toEqual({ total: 1, failures: 0, blocked: 1 });
        expect(weightedErrorRate(counts, 3)).toBe(1);

        const stats = await queue.stats('X');
        expect(stats.ok && stats.value).toMatchObject({ pending: 0, inFlight: 0, delayed: 1, dead: 0 });
        expect((await monitor.readDay()).blocked).toBe(1);

        const [egress] = await pools.egress.snapshot();
        expect(egress?.cooldownUntil).toBeGreaterThan(clock.value);

        // Retry is due after one base delay, but the only egress is still cooling down.
        clock.value += 1_000;
        expect(await worker.processNext('X')).toBe('deferred');
        expect(fetcher).toHaveBeenCalledTimes(1);
    });

    it('buries a task once it runs out of attempts', async () => {
        const fetcher = vi.fn<Fetcher>(async (plan) => ({
            status: 500,
            body: '<html>internal error</html>',
            elapsedMs: 40,
            finalUrl: plan.url,
        }));
        const { worker, queue, store } = await setup(fetcher, { maxAttempts: 1 });

        expect(await worker.processNext('X')).toBe('buried');

        const stats = await queue.stats('X');
        expect(stats.ok && stats.value).toMatchObject({ pending: 0, inFlight: 0, delayed: 0, dead: 1 });
        const [dead] = await store.listRange('t:queue:X:dead', 0, 0);
        expect(JSON.parse(dead ?? '{}')).toMatchObject({ key: 'search:手机:1', attempts: 1, reason: 'status 500' });
    });

    it('gives up with a fatal error once the store stays unreachable', async () => {
        const fetcher = vi.fn<Fetcher>();
        const { worker, store, pipeline } = await setup(fetcher, { maxStoreOutages: 2 });
        vi.spyOn(store, 'popLease').mockRejectedValue(new Error('connection refused'));

        await expect(worker.run()).rejects.toThrow(FatalError);
        await pipeline.close();

        expect(worker.summary.results.unavailable).toBe(2);
        expect(fetcher).not.toHaveBeenCalled();
    });

    it('defers without spending an attempt when a pool is empty', async () => {
        const fetcher = vi.fn<Fetcher>();
        const { worker, queue, store } = await setup(fetcher);
        await store.deleteKey('t:pool:identity:members');

        expect(await worker.processNext('X')).toBe('deferred');
        expect(fetcher).not.toHaveBeenCalled();

        const raw = await store.hashGet('t:queue:X:tasks', 'search:手机:1');
        expect(JSON.parse(raw ?? '{}')).toMatchObject({ attempts: 0 });
        const stats = await queue.stats('X');
        expect(stats.ok && stats.value).toMatchObject({ delayed: 1, inFlight: 0 });
    });

    it('keeps a task leased until the batch holding its records is committed', async () => {
        const fetcher = vi.fn<Fetcher>(async (plan) => ({
            status: 200,
            body: SEARCH_HTML,
            elapsedMs: 90,
            finalUrl: plan.url,
        }));
        const { worker, queue, pipeline, rowStore } = await setup(fetcher, {}, 50);

        expect(await worker.processNext('X')).toBe('done');
        const buffered = await queue.stats('X');
        expect(buffered.ok && buffered.value).toMatchObject({ pending: 0, inFlight: 1 });
        expect(pipeline.pending).toBe(1);

        await pipeline.flush();

        const committed = await queue.stats('X');
        expect(committed.ok && committed.value).toMatchObject({ pending: 0, inFlight: 0, delayed: 0 });
        expect(await rowStore.count('product')).toBe(1);
    });

    it('requeues a task whose records the row-store rejected', async () => {
        const fetcher = vi.fn<Fetcher>(async (plan) => ({
            status: 200,
            body: SEARCH_HTML,
            elapsedMs: 90,
            finalUrl: plan.url,
        }));
        const { worker, queue, pipeline, rowStore, clock } = await setup(fetcher, {}, 50);
        vi.spyOn(rowStore, 'write').mockRejectedValue(new Error('connection terminated'));

        expect(await worker.processNext('X')).toBe('done');
        const report = await pipeline.flush();
        expect(report?.committed).toBe(0);

        const stats = await queue.stats('X');
        expect(stats.ok && stats.value).toMatchObject({ pending: 0, inFlight: 0, delayed: 1, dead: 0 });

        clock.value += 1_000;
        const again = await queue.dequeue('X');
        expect(again.ok && again.value).toMatchObject({ key: 'search:手机:1', attempts: 0 });
    });

    it('requeues without fetching when the pacing slot cannot be claimed', async () => {
        const fetcher = vi.fn<Fetcher>();
        const { worker, queue, store } = await setup(fetcher);
        const claim = store.claimSlot.bind(store);
        vi.spyOn(store, 'claimSlot').mockImplementation(async (key, holder, limit, now, deadline) => {
            if (key.includes(':slots:')) throw new Error('ECONNRESET');
            return claim(key, holder, limit, now, deadline);
        });

        expect(await worker.processNext('X')).toBe('unavailable');
        expect(fetcher).not.toHaveBeenCalled();
        expect(await store.scheduleSize(`t:pool:egress:leases:${resourceId('direct')}`)).toBe(0);

        const raw = await store.hashGet('t:queue:X:tasks', 'search:手机:1');
        expect(JSON.parse(raw ?? '{}')).toMatchObject({ attempts: 0 });
        const stats = await queue.stats('X');
        expect(stats.ok && stats.value).toMatchObject({ delayed: 1, inFlight: 0 });
    });

    it('runs pool upkeep on the heartbeat and carries on when it fails', async () => {
        const fetcher = vi.fn<Fetcher>(async (plan) => ({
            status: 200,
            body: SEARCH_HTML,
            elapsedMs: 90,
            finalUrl: plan.url,
        }));
        const run = vi.fn(async () => {
            throw new Error('ECONNRESET');
        });
        const { worker, pipeline } = await setup(fetcher, { heartbeatIntervalMs: 0 }, 1, { run });

        const summary = await worker.run();
        await pipeline.close();

        expect(summary.results.done).toBe(1);
        expect(run).toHaveBeenCalledTimes(2);
    });
});
