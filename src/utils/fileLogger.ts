/**
 * src/utils/fileLogger.ts
 *
 * Mirrors every line written to stdout and stderr into LOG_FILE.
 *
 * BEHAVIOUR
 * ─────────
 *  • initFileLogger() appends to the file; a restarted worker keeps its
 *    earlier history.
 *  • Once the file passes the size limit it is renamed to `<file>.1`
 *    (replacing the previous backup) and a fresh file is started.
 *  • closeFileLogger() ends the stream and restores the original writers.
 */

import * as fs from 'fs';
import * as path from 'path';

const DEFAULT_MAX_BYTES = 25 * 1024 * 1024; // 25 MB
const SIZE_CHECK_EVERY = 1024 * 1024;

type StreamWrite = typeof process.stdout.write;
type WriteCallback = Exclude<Parameters<StreamWrite>[2], undefined>;

interface MirrorState {
    file: string;
    maxBytes: number;
    stream: fs.WriteStream;
    bytesSinceCheck: number;
    rotating: boolean;
    stdoutWrite: StreamWrite;
    stderrWrite: StreamWrite;
}

let state: MirrorState | null = null;

function chunkText(chunk: Uint8Array | string): string {
    return typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf-8');
}

/** Moves `file` to `file.1`, replacing any earlier backup. */
export function rotateLogFile(file: string): void {
    const backup = `${file}.1`;
    if (fs.existsSync(backup)) fs.rmSync(backup);
    if (fs.existsSync(file)) fs.renameSync(file, backup);
}

function rotate(current: MirrorState): void {
    if (current.rotating) return;
    current.rotating = true;
    const previous = current.stream;
    try {
        previous.end();
        rotateLogFile(current.file);
        current.stream = fs.createWriteStream(current.file, { flags: 'a', encoding: 'utf-8' });
        current.stream.write(`--- LOG ROTATED AT ${new Date().toISOString()} ---\n`);
    } catch (err) {
        current.stream = fs.createWriteStream(current.file, { flags: 'a', encoding: 'utf-8' });
        current.stderrWrite.call(process.stderr, `[FileLogger] Rotation failed: ${String(err)}\n`);
    } finally {
        current.rotating = false;
        current.bytesSinceCheck = 0;
    }
}

function mirror(text: string): void {
    const current = state;
    if (!current || current.rotating) return;
    current.stream.write(text);
    current.bytesSinceCheck += Buffer.byteLength(text);
    if (current.bytesSinceCheck < SIZE_CHECK_EVERY) return;
    current.bytesSinceCheck = 0;
    try {
        if (fs.statSync(current.file).size > current.maxBytes) setImmediate(() => rotate(current));
    } catch {
        // File removed underneath the stream.
        setImmediate(() => rotate(current));
    }
}

function hook(original: StreamWrite, target: NodeJS.WriteStream): StreamWrite {
    const write = original.bind(target);
    return (chunk: Uint8Array | string, encodingOrCb?: BufferEncoding | WriteCallback, cb?: WriteCallback): boolean => {
        mirror(chunkText(chunk));
        if (typeof encodingOrCb === 'function') return write(chunk, encodingOrCb);
        return write(chunk, encodingOrCb, cb);
    };
}

/**
 * Starts mirroring into `file`. Call once, before the first log line that
 * should reach the file.
 */
export function initFileLogger(file: string, maxBytes: number = DEFAULT_MAX_BYTES): void {
    if (state) return;
    const resolved = path.resolve(process.cwd(), file);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });

    const stdoutWrite = process.stdout.write;
    const stderrWrite = process.stderr.write;
    state = {
        file: resolved,
        maxBytes,
        stream: fs.createWriteStream(resolved, { flags: 'a', encoding: 'utf-8' }),
        bytesSinceCheck: 0,
        rotating: false,
        stdoutWrite,
        stderrWrite,
    };
    process.stdout.write = hook(stdoutWrite, process.stdout);
    process.stderr.write = hook(stderrWrite, process.stderr);

    console.log(`[FileLogger] ✓ Mirroring output to ${resolved} (rotates at ${Math.round(maxBytes / 1024 / 1024)}MB)`);
}

/** Flush and close the log file. Call in the finally/cleanup block. */
export function closeFileLogger(): void {
    if (!state) return;
    process.stdout.write = state.stdoutWrite;
    process.stderr.write = state.stderrWrite;
    state.stream.end();
    state = null;
}
