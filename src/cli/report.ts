import { Trace } from "jinaga";
import { TabularError } from "../errors";

/**
 * Print a fatal error to the error stream and mark the process as failed.
 */
export function reportFailure(error: unknown): void {
    if (error instanceof TabularError) {
        console.error(error.format());
    }
    else {
        Trace.error(error);
    }
    process.exitCode = 1;
}
