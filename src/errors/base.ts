/**
 * Base class for every failure raised by the column tools.
 * Carries an optional hint that the command-line programs print under the message.
 */
export class TabularError extends Error {
    readonly hint?: string;

    constructor(message: string, hint?: string) {
        super(message);
        this.name = 'TabularError';
        this.hint = hint;
    }

    format(): string {
        const lines = [`error: ${this.message}`];
        const detail = this.detail();
        if (detail) {
            lines.push(`   └── ${detail}`);
        }
        if (this.hint) {
            lines.push(`help: ${this.hint}`);
        }
        return lines.join('\n');
    }

    protected detail(): string | undefined {
        return undefined;
    }
}
