export { PythonParser, extractModuleFacts } from './python';
export type { PythonParseOptions, PythonParseResult } from './python';
export * from './base';
export * from './python/';
