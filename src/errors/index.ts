export { TabularError } from './base';
export { ConfigurationError } from './configuration-error';
export { ExternalToolError } from './external-tool-error';
export { InputFileError } from './input-file-error';
export { SchemaMismatchError } from './schema-mismatch-error';
