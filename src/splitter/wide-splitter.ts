import { Trace } from "jinaga";
import { readFile, writeFile } from "fs/promises";
import { SplitterConfig } from "../config";
import { parseTable } from "../csv/csv-reader";
import { formatTable } from "../csv/csv-writer";
import { Row } from "../csv/row-stream";
import { InputFileError } from "../errors";
import { Converter, Csv2LatexConverter } from "./converter";
import { computeSplits, Split, splitTable, stripExtension } from "./splits";

export type SplitResult = {
    files: string[],
    texFiles: string[]
};

/**
 * Splits a wide CSV file into several files of `ncols` data columns each.
 * Every file carries the header and the first (key) column.
 */
export class WideSplitter {
    private readonly converter: Converter | null;

    constructor(
        private readonly config: SplitterConfig,
        converter?: Converter
    ) {
        // Built eagerly so that an unsupported delimiter fails before anything is written
        this.converter = config.tex
            ? converter ?? new Csv2LatexConverter(config.delimiter)
            : null;
    }

    async run(): Promise<SplitResult> {
        const [header, ...rows] = await this.readTable();
        const splits = computeSplits(header, this.config.ncols, this.config.file);
        if (splits.length === 0) {
            Trace.warn(`'${this.config.file}' has no columns after the key column; nothing to split.`);
        }

        for (const split of splits) {
            await this.writeSplit(header, rows, split);
        }
        const files = splits.map(split => split.fileName);

        const texFiles = this.converter ? await this.convertAll(this.converter, files) : [];
        return { files, texFiles };
    }

    private async readTable(): Promise<Row[]> {
        let text: Buffer;
        try {
            text = await readFile(this.config.file);
        }
        catch (e) {
            throw new InputFileError(this.config.file, e instanceof Error ? e.message : String(e));
        }
        const table = parseTable(text, this.config.delimiter);
        if (table.length === 0) {
            throw new InputFileError(this.config.file, 'the file has no header row');
        }
        return table;
    }

    private async writeSplit(header: Row, rows: Row[], split: Split): Promise<void> {
        const table = splitTable(header, rows, split);
        await writeFile(split.fileName, formatTable(table, this.config.delimiter));
        Trace.info(`Wrote ${split.fileName} (columns ${split.left}-${split.right - 1})`);
    }

    private async convertAll(converter: Converter, files: string[]): Promise<string[]> {
        const texFiles: string[] = [];
        for (const file of files) {
            const texFile = stripExtension(file) + '.tex';
            const rendered = await converter.convert(file);
            await writeFile(texFile, rendered);
            Trace.info(`Wrote ${texFile} using ${converter.name}`);
            texFiles.push(texFile);
        }
        return texFiles;
    }
}
