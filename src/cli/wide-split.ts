#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { createSplitterConfig } from "../config";
import { WideSplitter } from "../splitter/wide-splitter";
import { wideSplitArguments } from "./arguments";
import { reportFailure } from "./report";

async function main() {
    const argv = await wideSplitArguments(hideBin(process.argv)).parseAsync();

    const config = createSplitterConfig({
        file: String(argv._[0]),
        ncols: argv.ncols,
        delimiter: argv.delimiter,
        tex: argv.tex,
    });
    const { files, texFiles } = await new WideSplitter(config).run();
    console.log(`Wrote ${files.length} split(s) and ${texFiles.length} .tex file(s).`);
}

main().catch(reportFailure);
