import * as crypto from 'crypto';
import * as os from 'os';
import type { ProcessRole } from '../sources/types.js';

export interface RunContext {
    /** Stable for the life of the process; names its heartbeat and slots. */
    workerId: string;
    role: ProcessRole;
    host: string;
    pid: number;
    startedAt: number;
}

export function createRunContext(role: ProcessRole, now: number = Date.now()): RunContext {
    const host = os.hostname();
    return {
        workerId: `${role}-${host}-${process.pid}-${crypto.randomUUID().slice(0, 8)}`,
        role,
        host,
        pid: process.pid,
        startedAt: now,
    };
}
