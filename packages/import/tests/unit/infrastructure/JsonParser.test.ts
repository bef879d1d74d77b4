import { describe, it, expect } from 'vitest';
import { BufferSource, IngestionError, StreamSource } from '@tabingest/core';
import { JsonParser } from '../../../src/infrastructure/parsers/JsonParser.js';
import { chunksOf, recordsOf } from '../../helpers.js';

describe('JsonParser', () => {
  describe('JSON array format', () => {
    it('should parse a JSON array of objects', () => {
      const parser = new JsonParser();

      const records = parser.parseText(JSON.stringify([{ email: 'alice@example.com', age: 30 }, { email: 'bob@example.com' }]));

      expect(records).toEqual([{ email: 'alice@example.com', age: 30 }, { email: 'bob@example.com' }]);
    });

    it('should return nothing for an empty array or blank text', () => {
      const parser = new JsonParser();

      expect(parser.parseText('[]')).toEqual([]);
      expect(parser.parseText('  \n ')).toEqual([]);
    });

    it('should reject a document that is not an array', () => {
      const parser = new JsonParser({ format: 'array' });

      expect(() => parser.parseText('{"key": "value"}')).toThrow('Expected a JSON array of objects');
    });

    it('should reject an item that is not an object and point at its row', () => {
      const parser = new JsonParser();

      let caught: unknown;
      try {
        parser.parseText('[{"a": 1}, 2]');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(IngestionError);
      expect(caught).toMatchObject({ code: 'PARSE_FAILED', message: 'Item 2 of the array is not an object', rowNumber: 3 });
    });

    it('should keep nested values as JSON text', () => {
      const parser = new JsonParser();

      const records = parser.parseText(JSON.stringify([{ name: 'Alice', address: { city: 'Madrid' }, tags: ['a', 'b'] }]));

      expect(records).toEqual([{ name: 'Alice', address: '{"city":"Madrid"}', tags: '["a","b"]' }]);
    });
  });

  describe('NDJSON format', () => {
    it('should parse one object per line and mark blank lines', () => {
      const parser = new JsonParser();

      expect(parser.parseText('{"a":1}\n\n{"a":2}')).toEqual([{ a: 1 }, null, { a: 2 }]);
    });

    it('should report the line of invalid JSON', () => {
      const parser = new JsonParser({ format: 'ndjson' });

      expect(() => parser.parseText('{"a":1}\nnot json')).toThrow('Line 2 is not valid JSON');
    });

    it('should stream records across chunk boundaries', async () => {
      const source = new StreamSource(chunksOf('{"a":', '1}\n{"a":2}\n'));

      expect(await recordsOf(new JsonParser(), source, [])).toEqual([{ a: 1 }, { a: 2 }]);
    });
  });

  describe('columns', () => {
    it('should list keys in order of first appearance', async () => {
      const source = new BufferSource('[{"b": 1}, {"a": 2, "b": 3}, {"c": 4}]');

      expect(await new JsonParser().columns(source)).toEqual(['b', 'a', 'c']);
    });
  });
});
