import { ConfigurationError } from "./errors";

export type ProjectorOptions = {
    columns?: string,
    complement?: boolean | string,
    inputDelimiter?: string,
    outputDelimiter?: string,
    inMemory?: boolean | string,
    round?: number
};

export type ProjectorConfig = {
    columns: string[],
    complement: boolean,
    inputDelimiter: string,
    outputDelimiter: string,
    inMemory: boolean,
    /** Decimal digits to round numeric cells to; negative disables rounding. */
    round: number
};

export type SplitterOptions = {
    file: string,
    ncols?: number,
    delimiter?: string,
    tex?: boolean
};

export type SplitterConfig = {
    file: string,
    /** Data columns per split; zero or less keeps every column in one split. */
    ncols: number,
    delimiter: string,
    tex: boolean
};

// Number.prototype.toFixed accepts at most 100 digits.
const MaxPrecision = 100;

const trueStrings = ['yes', 'true', 't', 'y', '1'];
const falseStrings = ['no', 'false', 'f', 'n', '0'];

export function parseBoolean(value: string, option = 'value'): boolean {
    const lower = value.toLowerCase();
    if (trueStrings.includes(lower)) {
        return true;
    }
    if (falseStrings.includes(lower)) {
        return false;
    }
    throw new ConfigurationError(option, 'Boolean value expected.',
        `use one of ${[...trueStrings, ...falseStrings].join(', ')}`);
}

export function parseColumnList(columns: string): string[] {
    return columns.trim().split(',');
}

export function resolveDelimiter(delimiter: string, option = 'delimiter'): string {
    const resolved = delimiter === '\\t' ? '\t' : delimiter;
    if (resolved.length === 0) {
        throw new ConfigurationError(option, 'Delimiter must not be empty.');
    }
    return resolved;
}

function toBoolean(value: boolean | string | undefined, fallback: boolean, option: string): boolean {
    if (value === undefined) {
        return fallback;
    }
    return typeof value === 'boolean' ? value : parseBoolean(value, option);
}

export function createProjectorConfig(options: ProjectorOptions): ProjectorConfig {
    const inputDelimiter = resolveDelimiter(options.inputDelimiter ?? ',', 'input-delimiter');
    const outputDelimiter = options.outputDelimiter
        ? resolveDelimiter(options.outputDelimiter, 'output-delimiter')
        : inputDelimiter;
    const round = options.round ?? -1;
    if (!Number.isInteger(round) || round > MaxPrecision) {
        throw new ConfigurationError('round', `Rounding precision must be an integer no greater than ${MaxPrecision}.`);
    }

    return {
        columns: parseColumnList(options.columns ?? ''),
        complement: toBoolean(options.complement, false, 'complement'),
        inputDelimiter,
        outputDelimiter,
        inMemory: toBoolean(options.inMemory, false, 'in-memory'),
        round
    };
}

export function createSplitterConfig(options: SplitterOptions): SplitterConfig {
    const ncols = options.ncols ?? 0;
    if (!Number.isInteger(ncols)) {
        throw new ConfigurationError('ncols', 'Number of columns per chunk must be an integer.');
    }
    return {
        file: options.file,
        ncols,
        delimiter: resolveDelimiter(options.delimiter ?? ','),
        tex: options.tex ?? false
    };
}
