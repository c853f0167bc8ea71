/**
 * src/pipeline/sinks/csvSink.ts
 *
 * Header-plus-rows interchange files. The header is written once, when the
 * day's file is created; later batches append rows only.
 */

import * as fs from 'fs';
import { stringify } from 'csv-stringify/sync';
import { DayFileSink, fileExists } from './fileSinkBase.js';

export class CsvSink extends DayFileSink {
    readonly name = 'csv';

    constructor(dataDir: string) {
        super(dataDir, 'csv');
    }

    protected async appendRows(file: string, columns: string[], rows: Array<Record<string, unknown>>): Promise<void> {
        const header = !(await fileExists(file));
        const text = stringify(rows, { header, columns, bom: false });
        await fs.promises.appendFile(file, text, 'utf-8');
    }
}
