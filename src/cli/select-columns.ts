#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { createProjectorConfig } from "../config";
import { selectColumns } from "../projector/projector";
import { selectColumnsArguments } from "./arguments";
import { reportFailure } from "./report";

async function main() {
    const argv = await selectColumnsArguments(hideBin(process.argv)).parseAsync();

    const config = createProjectorConfig({
        columns: argv.columns,
        complement: argv.complement,
        inputDelimiter: argv.inputDelimiter,
        outputDelimiter: argv.outputDelimiter,
        inMemory: argv.inMemory,
        round: argv.round,
    });
    await selectColumns(config, process.stdin, process.stdout);
}

main().catch(reportFailure);
