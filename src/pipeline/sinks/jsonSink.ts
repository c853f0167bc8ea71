/**
 * src/pipeline/sinks/jsonSink.ts
 *
 * Array-wrapped JSON documents, one object per record. Appending to an
 * existing day file rewrites only its closing bracket, so the file stays a
 * valid JSON array between batches.
 */

import * as fs from 'fs';
import { DayFileSink, fileExists } from './fileSinkBase.js';

const CLOSING = '\n]';

function render(columns: string[], row: Record<string, unknown>): string {
    const ordered: Record<string, unknown> = {};
    for (const column of columns) ordered[column] = row[column] ?? null;
    return `  ${JSON.stringify(ordered)}`;
}

export class JsonSink extends DayFileSink {
    readonly name = 'json';

    constructor(dataDir: string) {
        super(dataDir, 'json');
    }

    protected async appendRows(file: string, columns: string[], rows: Array<Record<string, unknown>>): Promise<void> {
        const items = rows.map((row) => render(columns, row)).join(',\n');
        if (!(await fileExists(file))) {
            await fs.promises.writeFile(file, `[\n${items}${CLOSING}`, 'utf-8');
            return;
        }

        const handle = await fs.promises.open(file, 'r+');
        try {
            const { size } = await handle.stat();
            const tail = Buffer.alloc(CLOSING.length);
            await handle.read(tail, 0, CLOSING.length, Math.max(0, size - CLOSING.length));
            if (size < 3 || tail.toString('utf-8') !== CLOSING) {
                throw new Error(`${file} is not a closed JSON array`);
            }
            await handle.write(`,\n${items}${CLOSING}`, size - CLOSING.length, 'utf-8');
        } finally {
            await handle.close();
        }
    }
}
