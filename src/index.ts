/**
 * reexport-mapper
 *
 * Maps the public names of a downstream Python package's entry points to the
 * upstream core symbols they re-export.
 */

export { PythonParser, BaseParser, extractModuleFacts } from './parsers';
export type { PythonParseOptions, PythonParseResult, ParseError } from './parsers';
export * from './reexports';

export { logger, config } from './utils';
