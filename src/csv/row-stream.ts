export type Row = string[];

/**
 * Pull-based stream of CSV rows.
 * Readers produce one, projectors transform one into another, and writers drain one.
 */
export interface RowStream {
    /**
     * Get the next row in the stream.
     * @returns Promise resolving to the next row, or null if the stream is exhausted
     */
    next(): Promise<Row | null>;

    /**
     * Close the stream and release the source behind it.
     */
    close(): Promise<void>;
}

export type RowSource = AsyncIterable<Row> | Iterable<Row>;

export type IterableRowStreamOptions = {
    /** Drop rows whose first cell starts with '#'. */
    skipComments?: boolean
};

function isAsyncSource(rows: RowSource): rows is AsyncIterable<Row> {
    return Symbol.asyncIterator in rows;
}

/**
 * Pulls rows from an array, a generator or a csv-parse parser.
 * Closing early returns the underlying iterator, so generator cleanup runs
 * and parser streams are destroyed.
 */
export class IterableRowStream implements RowStream {
    private source: AsyncIterator<Row> | Iterator<Row> | null;
    private readonly skipComments: boolean;

    constructor(rows: RowSource, options: IterableRowStreamOptions = {}) {
        this.source = isAsyncSource(rows)
            ? rows[Symbol.asyncIterator]()
            : rows[Symbol.iterator]();
        this.skipComments = options.skipComments ?? false;
    }

    async next(): Promise<Row | null> {
        while (this.source !== null) {
            const result = await this.source.next();
            if (result.done) {
                await this.close();
                return null;
            }
            if (!this.skipComments || !isCommentRow(result.value)) {
                return result.value;
            }
        }
        return null;
    }

    async close(): Promise<void> {
        const source = this.source;
        this.source = null;
        if (source !== null && source.return) {
            await source.return();
        }
    }
}

export function arrayToRowStream(rows: Row[]): RowStream {
    return new IterableRowStream(rows);
}

/**
 * Drain a stream into an array, closing it afterwards.
 */
export async function collectRows(stream: RowStream): Promise<Row[]> {
    try {
        const rows: Row[] = [];
        let row: Row | null;
        while ((row = await stream.next()) !== null) {
            rows.push(row);
        }
        return rows;
    } finally {
        await stream.close();
    }
}

export function isCommentRow(row: Row): boolean {
    return row.length > 0 && row[0].startsWith('#');
}
