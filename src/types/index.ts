export * from './entities.js';
export * from './diagnostics.js';
export * from './errors.js';
export * from './options.js';
export type { LineType, LineToken, ParserState } from './parser.js';
