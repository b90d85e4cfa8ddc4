/**
 * Compute universe - subset, preserving the order (and repeats) of the universe.
 */
export function setDifference(universe: string[], subset: string[]): string[] {
    const excluded = new Set(subset);
    return universe.filter(column => !excluded.has(column));
}

/**
 * Requested columns that the header does not contain, in request order.
 */
export function missingColumns(requested: string[], header: string[]): string[] {
    return setDifference(requested, header);
}

/**
 * Find the header positions of the given columns by scanning the header
 * left to right with a second cursor into the column list.
 * A column is only matched at or after the previous match, so columns
 * requested out of header order are left unmatched.
 */
export function headerIndices(header: string[], columns: string[]): number[] {
    const indices: number[] = [];
    for (let i = 0; i < header.length && indices.length < columns.length; i++) {
        if (header[i] === columns[indices.length]) {
            indices.push(i);
        }
    }
    return indices;
}

/**
 * The columns the scan left unmatched: everything from the first column it could not place.
 */
export function unmatchedColumns(columns: string[], indices: number[]): string[] {
    return columns.slice(indices.length);
}
