import { spawn } from "child_process";
import { ExternalToolError } from "../errors";

/**
 * Renders a delimited file in another format.
 */
export interface Converter {
    readonly name: string;
    convert(inputPath: string): Promise<Buffer>;
}

const separatorCodes: { [delimiter: string]: string } = {
    ',': 'c',
    ';': 's',
    '\t': 't',
    ' ': 'p',
    ':': 'l'
};

export function separatorCode(delimiter: string): string {
    const code = separatorCodes[delimiter];
    if (code === undefined) {
        throw new ExternalToolError('csv2latex', `Delimiter ${JSON.stringify(delimiter)} is not supported for LaTeX conversion.`, null,
            `supported delimiters are: ${Object.keys(separatorCodes).map(d => JSON.stringify(d)).join(', ')}`);
    }
    return code;
}

export function csv2latexArguments(separator: string, inputPath: string): string[] {
    return ['-s', separator, '-n', '-r', '2', '-p', 'r', '-e', '-c', '0.75', inputPath];
}

/**
 * Runs csv2latex as a subprocess and captures what it prints.
 */
export class Csv2LatexConverter implements Converter {
    readonly name = 'csv2latex';
    private readonly separator: string;

    constructor(delimiter: string, private readonly command: string = 'csv2latex') {
        this.separator = separatorCode(delimiter);
    }

    convert(inputPath: string): Promise<Buffer> {
        return new Promise((resolve, reject) => {
            const child = spawn(this.command, csv2latexArguments(this.separator, inputPath), {
                stdio: ['ignore', 'pipe', 'inherit']
            });
            const chunks: Buffer[] = [];
            child.stdout.on('data', (chunk: Buffer) => {
                chunks.push(chunk);
            });
            child.once('error', (e: Error) => {
                reject(new ExternalToolError(this.name, `Could not run ${this.command}: ${e.message}`));
            });
            child.once('close', (code: number | null) => {
                if (code === 0) {
                    resolve(Buffer.concat(chunks));
                }
                else {
                    reject(new ExternalToolError(this.name, `Conversion of '${inputPath}' failed.`, code));
                }
            });
        });
    }
}
