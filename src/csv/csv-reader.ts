import { parse, Options, Parser } from 'csv-parse';
import { parse as parseSync } from 'csv-parse/sync';
import { isCommentRow, IterableRowStream, Row, RowStream } from './row-stream';

function parserOptions(delimiter: string): Options {
    return {
        delimiter,
        bom: true,
        relax_column_count: true,
        relax_quotes: true,
        skip_empty_lines: true
    };
}

function isRow(record: unknown): record is Row {
    return Array.isArray(record) && record.every(cell => typeof cell === 'string');
}

async function* records(parser: Parser): AsyncIterable<Row> {
    for await (const record of parser) {
        if (!isRow(record)) {
            throw new Error(`Unexpected CSV record: ${JSON.stringify(record)}`);
        }
        yield record;
    }
}

/**
 * Read CSV rows from a byte stream one record at a time.
 * Comment rows (first cell starting with '#') are dropped.
 */
export function createRowReader(input: NodeJS.ReadableStream, delimiter: string): RowStream {
    const parser = parse(parserOptions(delimiter));
    input.on('error', (e: Error) => {
        parser.destroy(e);
    });
    input.pipe(parser);
    return new IterableRowStream(records(parser), { skipComments: true });
}

/**
 * Parse a whole CSV document held in memory, dropping comment rows.
 */
export function parseTable(text: string | Buffer, delimiter: string): Row[] {
    const parsed: unknown[] = parseSync(text, parserOptions(delimiter));
    const rows: Row[] = [];
    for (const record of parsed) {
        if (!isRow(record)) {
            throw new Error(`Unexpected CSV record: ${JSON.stringify(record)}`);
        }
        if (!isCommentRow(record)) {
            rows.push(record);
        }
    }
    return rows;
}
