export { splitTriple, parseTriple, formatTriple, relationKey, isEncodableLabel } from './triple.js';
export { parseSchema, readSchema } from './schema.js';
export type { SchemaParseOptions } from './schema.js';
