import { TabularError } from './base';

/**
 * Raised when the external converter cannot be used or fails.
 */
export class ExternalToolError extends TabularError {
    readonly tool: string;
    readonly exitCode: number | null;

    constructor(tool: string, message: string, exitCode: number | null = null, hint?: string) {
        super(message, hint);
        this.name = 'ExternalToolError';
        this.tool = tool;
        this.exitCode = exitCode;
    }

    protected override detail(): string {
        return this.exitCode === null
            ? `${this.tool}`
            : `${this.tool} exited with status ${this.exitCode}`;
    }
}
