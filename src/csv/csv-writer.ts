import { once } from 'events';
import { Options, stringify, Stringifier } from 'csv-stringify';
import { stringify as stringifySync } from 'csv-stringify/sync';
import { Row, RowStream } from './row-stream';

/**
 * csv-stringify options for records of the given width.
 * A single empty cell is quoted, otherwise the record would read back as a blank line.
 */
function recordOptions(delimiter: string, width: number): Options {
    return {
        delimiter,
        record_delimiter: '\n',
        quoted_empty: width === 1
    };
}

/**
 * Stream rows to a writable as CSV using csv-stringify.
 * The output is left open so that process.stdout can be used as the target.
 * The first row decides the record width; projected rows all share it.
 * Closes the row stream on every exit path.
 * @returns the number of records written
 */
export async function writeRows(
    rows: RowStream,
    output: NodeJS.WritableStream,
    delimiter: string
): Promise<number> {
    // Resolves once every record has been handed to the output
    function endedAsync(stream: NodeJS.EventEmitter): Promise<void> {
        return new Promise((resolve, reject) => {
            stream.once('end', resolve);
            stream.once('error', reject);
        });
    }

    let stringifier: Stringifier | null = null;
    let count = 0;
    try {
        let row: Row | null;
        while ((row = await rows.next()) !== null) {
            if (stringifier === null) {
                stringifier = stringify(recordOptions(delimiter, row.length));
                stringifier.pipe(output, { end: false });
            }
            if (!stringifier.write(row)) {
                await once(stringifier, 'drain');
            }
            count++;
        }
        if (stringifier !== null) {
            const ended = endedAsync(stringifier);
            stringifier.end();
            await ended;
        }
    } catch (error) {
        if (stringifier !== null) {
            stringifier.unpipe(output);
            stringifier.destroy();
        }
        throw error;
    } finally {
        await rows.close();
    }
    return count;
}

/**
 * Format a whole table as CSV text.
 */
export function formatTable(rows: Row[], delimiter: string): string {
    const width = rows.length > 0 ? rows[0].length : 0;
    return stringifySync(rows, recordOptions(delimiter, width));
}
