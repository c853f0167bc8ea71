/**
 * src/sources/types.ts
 *
 * Shared types for tasks, fetch outcomes and extracted records across every
 * source. A "source" is one target platform; everything source-specific lives
 * in config/sources.json, never in branches over these types.
 */

// ─── Process Role ─────────────────────────────────────────────────────────────

export const PROCESS_ROLES = ['master', 'worker'] as const;

/** master: enqueue-only seeding. worker: the full fetch/extract/report loop. */
export type ProcessRole = (typeof PROCESS_ROLES)[number];

export function isProcessRole(value: string): value is ProcessRole {
    return (PROCESS_ROLES as readonly string[]).includes(value);
}

// ─── Task ─────────────────────────────────────────────────────────────────────

export const TASK_KINDS = ['search', 'product', 'comments', 'shop'] as const;
export type TaskKind = (typeof TASK_KINDS)[number];

export interface TaskPayload {
    keyword?: string;
    page?: number;
    productId?: string;
    shopId?: string;
    /** Key of the task this one was derived from. */
    parentKey?: string;
}

export interface Task {
    source: string;
    /** Dedup identity within the source, e.g. "search:手机:1". */
    key: string;
    kind: TaskKind;
    payload: TaskPayload;
    /** > 0 jumps the queue. */
    priority: number;
    enqueuedAt: number;
    attempts: number;
}

export type NewTask = Pick<Task, 'source' | 'key' | 'kind' | 'payload'> & { priority?: number };

// ─── Fetch ────────────────────────────────────────────────────────────────────

export interface FetchResponse {
    status: number;
    body: string | null;
    elapsedMs: number;
    finalUrl: string;
}

/** What the detector, controller and monitor see about one request. */
export interface FetchOutcome {
    task: Task;
    status: number | null;
    /** Leading part of the body, enough for classification. */
    bodySample: string | null;
    bodyBytes: number;
    elapsedMs: number;
    blocked: boolean;
}

export type RequestVerdict = 'success' | 'failure' | 'blocked';

// ─── Records ──────────────────────────────────────────────────────────────────

export const RECORD_KINDS = ['product', 'comment', 'shop'] as const;
export type RecordKind = (typeof RECORD_KINDS)[number];

/** Extractor output before normalization. Field names are snake_case column names. */
export interface RawRecord {
    kind: RecordKind;
    source: string;
    fields: Record<string, unknown>;
}

export interface ExtractionResult {
    records: RawRecord[];
    tasks: NewTask[];
}
