import { describe, it, expect } from 'vitest';
import * as BatchMapper from '../../src/mappers/BatchMapper.js';
import * as AuditEntryMapper from '../../src/mappers/AuditEntryMapper.js';
import { createBatch, createEntry } from '../fixtures.js';

describe('BatchMapper', () => {
  it('should map a batch to a row and back', () => {
    const batch = createBatch({ source: { path: 'in.csv', hash: 'abc123' } });

    expect(BatchMapper.toDomain({ ...BatchMapper.toRow(batch), position: 1 })).toEqual(batch);
  });

  it('should leave out a missing source hash', () => {
    const row = BatchMapper.toRow(createBatch());

    expect(row.sourceHash).toBeNull();
    expect(BatchMapper.toDomain({ ...row, position: 1 }).source).toEqual({ path: 'customers.csv' });
  });

  it('should reject an unknown status', () => {
    const row = { ...BatchMapper.toRow(createBatch()), position: 1, status: 'PAUSED' };

    expect(() => BatchMapper.toDomain(row)).toThrow();
  });
});

describe('AuditEntryMapper', () => {
  it('should encode dates in document snapshots', () => {
    const entry = createEntry(1, { after: { email: 'a@example.com', joined: new Date('2024-01-02T00:00:00.000Z') } });

    const row = AuditEntryMapper.toRow(entry);

    expect(row.after).toEqual({ email: 'a@example.com', joined: { $date: '2024-01-02T00:00:00.000Z' } });
    expect(AuditEntryMapper.toDomain({ ...row, id: 1 })).toEqual(entry);
  });

  it('should keep nested fields, nulls and BSON wrappers in document snapshots', () => {
    const before = {
      email: 'a@example.com',
      tags: ['vip', 2],
      address: { city: 'Oslo', since: new Date('2020-05-06T00:00:00.000Z') },
      note: null,
      owner: { $oid: '65a1b2c3d4e5f60718293a4b' },
    };
    const entry = createEntry(1, { operation: 'update', before });

    const row = AuditEntryMapper.toRow(entry);

    expect(row.before).toEqual({
      email: 'a@example.com',
      tags: ['vip', 2],
      address: { city: 'Oslo', since: { $date: '2020-05-06T00:00:00.000Z' } },
      note: null,
      owner: { $oid: '65a1b2c3d4e5f60718293a4b' },
    });
    expect(AuditEntryMapper.toDomain({ ...row, id: 1, before: JSON.stringify(row.before) }).before).toEqual(before);
  });

  it('should read snapshots stored as JSON text', () => {
    const row = { ...AuditEntryMapper.toRow(createEntry(1)), id: 1, after: '{"email":"user1@example.com"}' };

    expect(AuditEntryMapper.toDomain(row).after).toEqual({ email: 'user1@example.com' });
  });
});
