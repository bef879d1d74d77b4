import { describe, it, expect } from 'vitest';
import type { SchemaInput } from '../../../src/domain/model/Schema.js';
import {
  applySchemaPatch,
  createSchemaDefinition,
  fieldNames,
  recordSchemaUsage,
  requiredFields,
  validateColumnLabels,
} from '../../../src/domain/model/Schema.js';
import { InvalidSchemaError } from '../../../src/domain/errors.js';
import { customerSchema } from '../../helpers.js';

function issuesOf(run: () => unknown): readonly string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof InvalidSchemaError) return error.issues;
    throw error;
  }
  throw new Error('expected InvalidSchemaError');
}

describe('createSchemaDefinition', () => {
  it('should fill in defaults', () => {
    const schema = createSchemaDefinition(customerSchema, 'schema-1', 1000);

    expect(schema).toMatchObject({
      id: 'schema-1',
      name: 'Customers',
      collection: 'customers',
      indexes: [],
      duplicateKey: ['email'],
      duplicateStrategy: 'skip',
      dataStartRow: 2,
      usageCount: 0,
      lastUsedAt: null,
      createdAt: 1000,
      updatedAt: 1000,
    });
    expect(schema.fields[1]?.attribute).toEqual({ field: 'name', type: 'String', description: '', required: false });
  });

  it('should reject duplicate key fields that are not mapped', () => {
    const input: SchemaInput = { ...customerSchema, duplicateKey: ['email', 'phone'] };

    expect(issuesOf(() => createSchemaDefinition(input, 'id', 0))).toEqual([
      "duplicate key references unknown field 'phone'",
    ]);
  });

  it('should reject indexes on unknown fields', () => {
    const input: SchemaInput = { ...customerSchema, indexes: [{ field: 'phone', kind: 'unique' }] };

    expect(issuesOf(() => createSchemaDefinition(input, 'id', 0))).toEqual(["index references unknown field 'phone'"]);
  });

  it('should reject column labels repeated in another case', () => {
    const input: SchemaInput = {
      ...customerSchema,
      duplicateKey: [],
      fields: [
        { column: 'Email', attribute: { field: 'email', type: 'String' } },
        { column: 'EMAIL', attribute: { field: 'email_copy', type: 'String' } },
      ],
    };

    expect(issuesOf(() => createSchemaDefinition(input, 'id', 0))).toEqual(["duplicate column label 'EMAIL'"]);
  });

  it('should reject reserved names regardless of case', () => {
    expect(issuesOf(() => createSchemaDefinition({ ...customerSchema, name: 'Admin' }, 'id', 0))).toEqual([
      'name is a reserved name',
    ]);
  });

  it('should report malformed collection names with their path', () => {
    expect(issuesOf(() => createSchemaDefinition({ ...customerSchema, collection: 'bad name!' }, 'id', 0))).toEqual([
      'collection must be 1-64 letters, digits, hyphens or underscores',
    ]);
  });

  it('should reject a schema without columns', () => {
    expect(issuesOf(() => createSchemaDefinition({ ...customerSchema, fields: [], duplicateKey: [] }, 'id', 0))).toEqual([
      'fields must contain at least one column',
    ]);
  });

  it('should carry every problem in the error message', () => {
    const input: SchemaInput = { ...customerSchema, duplicateKey: ['phone'], indexes: [{ field: 'zip', kind: 'ascending' }] };

    expect(() => createSchemaDefinition(input, 'id', 0)).toThrow(
      "Invalid schema: duplicate key references unknown field 'phone'; index references unknown field 'zip'",
    );
  });
});

describe('applySchemaPatch', () => {
  it('should merge the patch and bump updatedAt', () => {
    const schema = createSchemaDefinition(customerSchema, 'schema-1', 1000);
    const patched = applySchemaPatch(schema, { duplicateStrategy: 'upsert' }, 2000);

    expect(patched.duplicateStrategy).toBe('upsert');
    expect(patched.id).toBe('schema-1');
    expect(patched.createdAt).toBe(1000);
    expect(patched.updatedAt).toBe(2000);
  });

  it('should re-validate the merged result', () => {
    const schema = createSchemaDefinition(customerSchema, 'schema-1', 1000);
    const fields = customerSchema.fields.filter((f) => f.attribute.field !== 'email');

    expect(issuesOf(() => applySchemaPatch(schema, { fields }, 2000))).toEqual([
      "duplicate key references unknown field 'email'",
    ]);
  });
});

describe('schema helpers', () => {
  it('should list field names and required fields in order', () => {
    const schema = createSchemaDefinition(customerSchema, 'schema-1', 0);
    expect(fieldNames(schema)).toEqual(['email', 'name', 'amount']);
    expect(requiredFields(schema)).toEqual(['email']);
  });

  it('should record usage', () => {
    const schema = recordSchemaUsage(createSchemaDefinition(customerSchema, 'schema-1', 0), 500);
    expect(schema.usageCount).toBe(1);
    expect(schema.lastUsedAt).toBe(500);
  });
});

describe('validateColumnLabels', () => {
  it('should accept distinct labels', () => {
    expect(() => validateColumnLabels(['Email', 'Name'])).not.toThrow();
  });

  it('should report empty and repeated labels', () => {
    expect(issuesOf(() => validateColumnLabels(['Name', ' ', 'name ']))).toEqual([
      'column 2 has an empty label',
      "duplicate column label 'name'",
    ]);
  });

  it('should require at least one label', () => {
    expect(issuesOf(() => validateColumnLabels([]))).toEqual(['at least one column label is required']);
  });
});
