/**
 * src/master.ts
 *
 * The Master role: enumerate seed search tasks (keyword × page per source)
 * and push them onto the shared queue. Enqueue-only; the seen-set drops keys
 * an earlier run already produced.
 */

import { log } from '@crawlee/core';
import type { SourceProfileTable } from './config/sources.js';
import type { NewTask } from './sources/types.js';
import type { TaskQueue } from './utils/taskQueue.js';

export interface SeedReport {
    planned: number;
    inserted: number;
    duplicates: number;
    /** Tasks the queue refused through every retry. */
    failed: number;
}

export interface MasterOptions {
    retries?: number;
    retryDelayMs?: number;
    sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export function searchTaskKey(keyword: string, page: number): string {
    return `search:${keyword}:${page}`;
}

/** `keywords` overrides every profile's own list. */
export function planSeedTasks(profiles: SourceProfileTable, sources: string[], keywords?: string[]): NewTask[] {
    const tasks: NewTask[] = [];
    for (const source of sources) {
        const profile = profiles.get(source);
        const terms = keywords && keywords.length > 0 ? keywords : profile.keywords;
        if (terms.length === 0) log.warning(`[Master] ${source} has no keywords; nothing to seed`);
        for (const keyword of terms) {
            for (let page = 1; page <= profile.maxPages; page++) {
                tasks.push({ source, key: searchTaskKey(keyword, page), kind: 'search', payload: { keyword, page } });
            }
        }
    }
    return tasks;
}

export async function runMaster(queue: TaskQueue, tasks: NewTask[], options: MasterOptions = {}): Promise<SeedReport> {
    const retries = options.retries ?? 3;
    const retryDelayMs = options.retryDelayMs ?? 1_000;
    const wait = options.sleep ?? sleep;
    const report: SeedReport = { planned: tasks.length, inserted: 0, duplicates: 0, failed: 0 };

    for (const task of tasks) {
        for (let attempt = 0; ; attempt++) {
            const outcome = await queue.enqueue(task);
            if (outcome.ok) {
                if (outcome.value) report.inserted++;
                else report.duplicates++;
                break;
            }
            if (attempt >= retries) {
                report.failed++;
                log.error(`[Master] Gave up on ${task.source}/${task.key}: ${outcome.error.message}`);
                break;
            }
            await wait(retryDelayMs * 2 ** attempt);
        }
    }

    log.info(
        `[Master] Seeded ${report.inserted}/${report.planned} task(s), ` +
            `${report.duplicates} already known, ${report.failed} failed`,
    );
    return report;
}
