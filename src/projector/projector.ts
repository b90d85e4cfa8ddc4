import { Trace } from "jinaga";
import { ProjectorConfig } from "../config";
import { createRowReader } from "../csv/csv-reader";
import { IterableRowStream, collectRows, Row, RowStream } from "../csv/row-stream";
import { writeRows } from "../csv/csv-writer";
import { SchemaMismatchError } from "../errors";
import { headerIndices, missingColumns, setDifference, unmatchedColumns } from "./columns";
import { roundRow } from "./rounding";

export type ProjectionSettings = Pick<ProjectorConfig, 'columns' | 'complement' | 'round'>;

/**
 * Projects a table, header first, onto a set of columns.
 * Implementations differ only in how much of the input they hold at once.
 */
export interface TableProjector {
    project(source: RowStream): RowStream;
}

/**
 * Column positions resolved from a header, applied to every following row.
 */
export class ProjectionPlan {
    private constructor(
        public readonly indices: number[],
        private readonly precision: number
    ) { }

    static fromHeader(header: Row, settings: ProjectionSettings): ProjectionPlan {
        const missing = missingColumns(settings.columns, header);
        if (missing.length > 0) {
            throw new SchemaMismatchError(missing, header);
        }

        const columns = settings.complement
            ? setDifference(header, settings.columns)
            : settings.columns;
        const indices = headerIndices(header, columns);
        const unmatched = unmatchedColumns(columns, indices);
        if (unmatched.length > 0) {
            Trace.warn(`Columns requested out of header order were dropped: ${unmatched.join(', ')}`);
        }
        return new ProjectionPlan(indices, settings.round);
    }

    projectHeader(header: Row): Row {
        return this.indices.map(i => header[i] ?? '');
    }

    projectRow(row: Row): Row {
        const projected = this.indices.map(i => row[i] ?? '');
        return this.precision >= 0 ? roundRow(projected, this.precision) : projected;
    }
}

/**
 * Resolves columns from the first row, then emits each row as it is read.
 */
export class StreamingProjector implements TableProjector {
    constructor(private readonly settings: ProjectionSettings) { }

    project(source: RowStream): RowStream {
        return new IterableRowStream(this.rows(source));
    }

    private async *rows(source: RowStream): AsyncIterable<Row> {
        try {
            const header = await source.next();
            if (header === null) {
                return;
            }
            const plan = ProjectionPlan.fromHeader(header, this.settings);
            yield plan.projectHeader(header);

            let row: Row | null;
            while ((row = await source.next()) !== null) {
                yield plan.projectRow(row);
            }
        } finally {
            await source.close();
        }
    }
}

/**
 * Loads the whole table before emitting anything.
 */
export class BulkProjector implements TableProjector {
    constructor(private readonly settings: ProjectionSettings) { }

    project(source: RowStream): RowStream {
        return new IterableRowStream(this.rows(source));
    }

    private async *rows(source: RowStream): AsyncIterable<Row> {
        const table = await collectRows(source);
        if (table.length === 0) {
            return;
        }
        const [header, ...data] = table;
        const plan = ProjectionPlan.fromHeader(header, this.settings);
        const projected = [plan.projectHeader(header), ...data.map(row => plan.projectRow(row))];
        yield* projected;
    }
}

export function createProjector(config: ProjectorConfig): TableProjector {
    return config.inMemory
        ? new BulkProjector(config)
        : new StreamingProjector(config);
}

/**
 * Read CSV from input, project it and write CSV to output.
 * @returns the number of records written, header included
 */
export async function selectColumns(
    config: ProjectorConfig,
    input: NodeJS.ReadableStream,
    output: NodeJS.WritableStream
): Promise<number> {
    const projector = createProjector(config);
    const rows = projector.project(createRowReader(input, config.inputDelimiter));
    return await writeRows(rows, output, config.outputDelimiter);
}
