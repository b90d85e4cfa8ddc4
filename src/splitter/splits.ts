import { extname } from "path";
import { Row } from "../csv/row-stream";

export type Split = {
    index: number,
    /** First data column of the split (inclusive). */
    left: number,
    /** End of the split's column range (exclusive), clamped to the header. */
    right: number,
    fileName: string
};

/**
 * Path without its final extension: "data/wide.csv" becomes "data/wide".
 */
export function stripExtension(file: string): string {
    return file.slice(0, file.length - extname(file).length);
}

/**
 * Partition the columns after the key column into chunks of `ncols`.
 * Split files are named after the input with a zero padded index,
 * e.g. base0.csv .. base9.csv, or base00.csv .. base10.csv.
 */
export function computeSplits(header: Row, ncols: number, file: string): Split[] {
    const columnCount = header.length - 1;
    if (columnCount <= 0) {
        return [];
    }
    const width = ncols <= 0 ? columnCount : ncols;
    const count = Math.ceil(columnCount / width);
    const digits = String(count - 1).length;
    const basename = stripExtension(file);

    const splits: Split[] = [];
    for (let index = 0; index < count; index++) {
        const left = index * width + 1;
        splits.push({
            index,
            left,
            right: Math.min(left + width, header.length),
            fileName: `${basename}${String(index).padStart(digits, '0')}.csv`
        });
    }
    return splits;
}

/**
 * Restrict a table to the key column plus the split's columns.
 * The key column's header cell is left empty.
 */
export function splitTable(header: Row, rows: Row[], split: Split): Row[] {
    return [
        ['', ...header.slice(split.left, split.right)],
        ...rows.map(row => [...row.slice(0, 1), ...row.slice(split.left, split.right)])
    ];
}
