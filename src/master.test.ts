import { describe, it, expect, vi } from 'vitest';
import { MemoryStore } from './broker/memoryStore.js';
import { parseSourceTable } from './config/sources.js';
import { TaskQueue } from './utils/taskQueue.js';
import { planSeedTasks, runMaster } from './master.js';

const profiles = parseSourceTable({
    defaults: { maxPages: 2 },
    sources: [
        { id: 'X', keywords: ['手机', '笔记本电脑'] },
        { id: 'Y', keywords: ['耳机'], maxPages: 1 },
    ],
});

class DownStore extends MemoryStore {
    override async addToSet(): Promise<boolean> {
        throw new Error('connection refused');
    }
}

describe('planSeedTasks', () => {
    it('plans keyword × page per source', () => {
        const tasks = planSeedTasks(profiles, ['X', 'Y']);
        expect(tasks.map((t) => `${t.source}/${t.key}`)).toEqual([
            'X/search:手机:1',
            'X/search:手机:2',
            'X/search:笔记本电脑:1',
            'X/search:笔记本电脑:2',
            'Y/search:耳机:1',
        ]);
        expect(tasks[1]).toEqual({ source: 'X', key: 'search:手机:2', kind: 'search', payload: { keyword: '手机', page: 2 } });
    });

    it('lets explicit keywords replace the profile list', () => {
        expect(planSeedTasks(profiles, ['Y'], ['平板']).map((t) => t.key)).toEqual(['search:平板:1']);
    });
});

describe('runMaster', () => {
    it('counts keys an earlier run already seeded as duplicates', async () => {
        const queue = new TaskQueue(new MemoryStore(), { namespace: 't', visibilityTimeoutMs: 30_000 });
        const tasks = planSeedTasks(profiles, ['X']);

        expect(await runMaster(queue, tasks)).toEqual({ planned: 4, inserted: 4, duplicates: 0, failed: 0 });
        expect(await runMaster(queue, tasks)).toEqual({ planned: 4, inserted: 0, duplicates: 4, failed: 0 });
    });

    it('retries with backoff and reports what it could not seed', async () => {
        const queue = new TaskQueue(new DownStore(), { namespace: 't', visibilityTimeoutMs: 30_000 });
        const sleep = vi.fn(async () => undefined);

        const report = await runMaster(queue, planSeedTasks(profiles, ['Y']), { retries: 2, retryDelayMs: 100, sleep });

        expect(report).toEqual({ planned: 1, inserted: 0, duplicates: 0, failed: 1 });
        expect(sleep.mock.calls).toEqual([[100], [200]]);
    });
});
