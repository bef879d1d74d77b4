export { ParsedRowStream, parserFor } from './ParsedRowStream.js';
export type { ParsedRowStreamOptions } from './ParsedRowStream.js';

// Ports
export type { SourceParser, ParsedRecord, ParserOptions } from './domain/ports/SourceParser.js';

// Parsers
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export { JsonParser } from './infrastructure/parsers/JsonParser.js';
export type { JsonParserOptions } from './infrastructure/parsers/JsonParser.js';
