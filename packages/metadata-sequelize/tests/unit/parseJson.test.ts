import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { jsonColumn, parseJson } from '../../src/utils/parseJson.js';

describe('parseJson', () => {
  it('should return object as-is when already parsed', () => {
    const obj = { name: 'Alice', age: 30 };
    expect(parseJson(obj)).toBe(obj);
  });

  it('should parse a JSON string into an object', () => {
    expect(parseJson('{"name":"Alice","age":30}')).toEqual({ name: 'Alice', age: 30 });
  });

  it('should return null as-is', () => {
    expect(parseJson(null)).toBeNull();
  });
});

describe('jsonColumn', () => {
  it('should validate the parsed value', () => {
    expect(jsonColumn(z.array(z.string()), '["email","name"]')).toEqual(['email', 'name']);
    expect(() => jsonColumn(z.array(z.string()), '[1]')).toThrow();
  });
});
