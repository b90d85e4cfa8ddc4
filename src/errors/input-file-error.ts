import { TabularError } from './base';

export class InputFileError extends TabularError {
    readonly path: string;
    readonly reason: string;

    constructor(path: string, reason: string) {
        super(`Cannot read '${path}'.`);
        this.name = 'InputFileError';
        this.path = path;
        this.reason = reason;
    }

    protected override detail(): string {
        return this.reason;
    }
}
