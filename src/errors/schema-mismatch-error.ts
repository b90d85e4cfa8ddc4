import { TabularError } from './base';

/**
 * Raised when requested columns are absent from the header.
 */
export class SchemaMismatchError extends TabularError {
    readonly missing: string[];
    readonly available: string[];

    constructor(missing: string[], available: string[]) {
        const hint = available.length > 0
            ? `available columns are: ${available.map(c => `'${c}'`).join(', ')}`
            : 'the table has no columns';
        super('The following columns are not present.', hint);
        this.name = 'SchemaMismatchError';
        this.missing = missing;
        this.available = available;
    }

    protected override detail(): string {
        return this.missing.map(c => `'${c}'`).join(', ');
    }
}
