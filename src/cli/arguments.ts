import yargs from "yargs";
import { parseBoolean } from "../config";

// A bare `--complement` means true; any other value must be a boolean string.
function optionalBoolean(option: string) {
    return (value: string | boolean): boolean => {
        if (typeof value === 'boolean') {
            return value;
        }
        return value === '' ? true : parseBoolean(value, option);
    };
}

export function selectColumnsArguments(args: string[]) {
    return yargs(args)
        .usage("Select columns from a csv file.\nRead from stdin and write to stdout.")
        .option("columns", {
            type: "string",
            default: "",
            description: "Columns to select/drop",
        })
        .option("complement", {
            type: "string",
            default: "false",
            coerce: optionalBoolean("complement"),
            description: "If true, the given columns will be dropped",
        })
        .option("input-delimiter", {
            type: "string",
            default: ",",
            description: "Delimiter in the input csv file",
        })
        .option("output-delimiter", {
            type: "string",
            default: "",
            description: "If empty, the input delimiter is used for the output",
        })
        .option("in-memory", {
            type: "string",
            default: "false",
            coerce: optionalBoolean("in-memory"),
            description: "Read the entire input before writing any output",
        })
        .option("round", {
            type: "number",
            default: -1,
            description: "If non-negative, number of decimal digits to round numeric values to",
        })
        .strict()
        .help()
        .alias("help", "h");
}

export function wideSplitArguments(args: string[]) {
    return yargs(args)
        .usage("$0 <file>\n\nSplit csv in column groups.")
        .demandCommand(1, 1, "The csv file to split is required.", "Only one csv file can be split at a time.")
        .option("ncols", {
            alias: "n",
            type: "number",
            default: 0,
            description: "Number of columns per chunk",
        })
        .option("delimiter", {
            alias: "d",
            type: "string",
            default: ",",
            description: "csv delimiter",
        })
        .option("tex", {
            alias: "t",
            type: "boolean",
            default: false,
            description: "Convert output chunks to .tex",
        })
        .strict()
        .help()
        .alias("help", "h");
}
