import { TabularError } from './base';

/**
 * Raised while building a configuration, before any input is read.
 */
export class ConfigurationError extends TabularError {
    readonly option: string;

    constructor(option: string, message: string, hint?: string) {
        super(message, hint);
        this.name = 'ConfigurationError';
        this.option = option;
    }

    protected override detail(): string {
        return `option '${this.option}'`;
    }
}
