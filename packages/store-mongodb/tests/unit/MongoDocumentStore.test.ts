import { describe, it, expect, beforeEach } from 'vitest';
import mongoose, { Types } from 'mongoose';
import { StoreUnavailableError, UniqueConstraintViolation } from '@tabingest/core';
import { MongoDocumentStore, indexName, toStoredDocument } from '../../src/MongoDocumentStore.js';
import { FakeDatabase, serverError } from '../helpers.js';

describe('MongoDocumentStore', () => {
  let db: FakeDatabase;
  let store: MongoDocumentStore;

  beforeEach(() => {
    db = new FakeDatabase();
    store = new MongoDocumentStore(db.provider);
  });

  it('should insert a document under a new ObjectId and read it back', async () => {
    const joined = new Date('2024-01-02T00:00:00.000Z');

    const id = await store.insert('customers', { email: 'alice@example.com', joined, active: true });

    expect(id).toMatch(/^[0-9a-f]{24}$/);
    expect(db.collection('customers').records[0]?.['_id']).toBeInstanceOf(Types.ObjectId);
    expect(await store.get('customers', id)).toEqual({ id, fields: { email: 'alice@example.com', joined, active: true } });
  });

  it('should find a document by key', async () => {
    const id = await store.insert('customers', { email: 'alice@example.com', amount: 10 });
    await store.insert('customers', { email: 'bob@example.com', amount: 20 });

    expect(await store.findOne('customers', { email: 'alice@example.com' })).toEqual({
      id,
      fields: { email: 'alice@example.com', amount: 10 },
    });
    expect(await store.findOne('customers', { email: 'carol@example.com' })).toBeNull();
  });

  it('should replace a document by id and keep its id', async () => {
    const id = await store.insert('customers', { email: 'alice@example.com', amount: 10 });

    expect(await store.replace('customers', id, { email: 'alice@example.com', amount: 15 })).toBe(true);
    expect(await store.get('customers', id)).toEqual({ id, fields: { email: 'alice@example.com', amount: 15 } });
  });

  it('should treat unknown and malformed ids as missing', async () => {
    const unknown = new Types.ObjectId().toHexString();

    expect(await store.replace('customers', unknown, { email: 'x@example.com' })).toBe(false);
    expect(await store.replace('customers', 'not-an-id', { email: 'x@example.com' })).toBe(false);
    expect(await store.delete('customers', 'not-an-id')).toBe(false);
    expect(await store.get('customers', 'not-an-id')).toBeNull();
  });

  it('should write a read snapshot back with nested fields and BSON types intact', async () => {
    const _id = new Types.ObjectId();
    const owner = new Types.ObjectId();
    db.collection('customers').records.push({
      _id,
      email: 'alice@example.com',
      owner,
      price: Types.Decimal128.fromString('9.99'),
      address: { city: 'Oslo' },
      tags: ['vip'],
      note: null,
    });
    const found = await store.findOne('customers', { email: 'alice@example.com' });
    expect(found?.id).toBe(_id.toHexString());

    await store.replace('customers', _id.toHexString(), { email: 'alice@example.com', amount: 15 });
    expect(await store.replace('customers', _id.toHexString(), found?.fields ?? {})).toBe(true);

    const record = db.collection('customers').records[0];
    expect(record?.['owner']).toBeInstanceOf(Types.ObjectId);
    expect(String(record?.['owner'])).toBe(owner.toHexString());
    expect(String(record?.['price'])).toBe('9.99');
    expect(record?.['address']).toEqual({ city: 'Oslo' });
    expect(record?.['tags']).toEqual(['vip']);
    expect(record?.['note']).toBeNull();
    expect(record?.['amount']).toBeUndefined();
  });

  it('should address documents whose _id is not an ObjectId', async () => {
    db.collection('customers').records.push({ _id: 'cust-1', email: 'alice@example.com' }, { _id: 7, email: 'bob@example.com' });

    expect((await store.findOne('customers', { email: 'alice@example.com' }))?.id).toBe('ejson:"cust-1"');
    expect((await store.findOne('customers', { email: 'bob@example.com' }))?.id).toBe('ejson:7');

    expect(await store.replace('customers', 'ejson:"cust-1"', { email: 'alice@example.com', amount: 5 })).toBe(true);
    expect(db.collection('customers').records[0]).toEqual({ _id: 'cust-1', email: 'alice@example.com', amount: 5 });
    expect(await store.get('customers', 'ejson:7')).toEqual({ id: 'ejson:7', fields: { email: 'bob@example.com' } });
    expect(await store.delete('customers', 'ejson:7')).toBe(true);
    expect(await store.get('customers', 'ejson:{')).toBeNull();
  });

  it('should delete a document once', async () => {
    const id = await store.insert('customers', { email: 'alice@example.com' });

    expect(await store.delete('customers', id)).toBe(true);
    expect(await store.delete('customers', id)).toBe(false);
    expect(await store.count('customers')).toBe(0);
  });

  describe('ensureIndex', () => {
    it('should create named indexes with the right direction', async () => {
      await store.ensureIndex('customers', { field: 'email', kind: 'unique', reason: '' });
      await store.ensureIndex('customers', { field: 'joined', kind: 'descending', reason: '' });
      await store.ensureIndex('customers', { field: 'notes', kind: 'text', reason: '' });

      expect([...db.collection('customers').indexes]).toEqual([
        ['idx_email_unique', { spec: { email: 1 }, unique: true }],
        ['idx_joined_desc', { spec: { joined: -1 }, unique: false }],
        ['idx_notes_text', { spec: { notes: 'text' }, unique: false }],
      ]);
    });

    it('should leave an existing conflicting index alone', async () => {
      db.collection('customers').failWith = serverError(85, 'Index already exists with a different name');

      await expect(store.ensureIndex('customers', { field: 'email', kind: 'ascending', reason: '' })).resolves.toBeUndefined();
    });

    it('should refuse a unique index over repeated values', async () => {
      await store.insert('customers', { email: 'alice@example.com' });
      await store.insert('customers', { email: 'alice@example.com' });

      await expect(store.ensureIndex('customers', { field: 'email', kind: 'unique', reason: '' })).rejects.toBeInstanceOf(
        UniqueConstraintViolation,
      );
    });
  });

  describe('error mapping', () => {
    it('should turn a duplicate key into UniqueConstraintViolation', async () => {
      await store.ensureIndex('customers', { field: 'email', kind: 'unique', reason: '' });
      await store.insert('customers', { email: 'alice@example.com' });

      const error = await store.insert('customers', { email: 'alice@example.com' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UniqueConstraintViolation);
      expect(error).toMatchObject({ collection: 'customers', message: "Duplicate key in 'customers'" });
    });

    it('should turn a network failure into StoreUnavailableError', async () => {
      db.collection('customers').failWith = new mongoose.mongo.MongoNetworkError('connection reset');

      await expect(store.count('customers')).rejects.toBeInstanceOf(StoreUnavailableError);
    });

    it('should pass other errors through', async () => {
      db.collection('customers').failWith = serverError(2, 'BadValue');

      await expect(store.count('customers')).rejects.toThrow('BadValue');
    });
  });
});

describe('indexName', () => {
  it('should name indexes after field and kind', () => {
    expect(indexName({ field: 'email', kind: 'unique', reason: '' })).toBe('idx_email_unique');
    expect(indexName({ field: 'amount', kind: 'ascending', reason: '' })).toBe('idx_amount_asc');
  });
});

describe('toStoredDocument', () => {
  it('should keep every field but _id, with other BSON types as Extended JSON', () => {
    const _id = new Types.ObjectId();
    const owner = new Types.ObjectId();
    const when = new Date('2024-05-06T00:00:00.000Z');

    const stored = toStoredDocument({
      _id,
      name: 'A',
      ok: false,
      when,
      tags: ['x'],
      nested: { a: 1, at: when },
      gone: null,
      owner,
      price: Types.Decimal128.fromString('9.99'),
    });

    expect(stored).toEqual({
      id: _id.toHexString(),
      fields: {
        name: 'A',
        ok: false,
        when,
        tags: ['x'],
        nested: { a: 1, at: when },
        gone: null,
        owner: { $oid: owner.toHexString() },
        price: { $numberDecimal: '9.99' },
      },
    });
  });

  it('should tag ids that are not ObjectIds', () => {
    expect(toStoredDocument({ _id: 'cust-1' }).id).toBe('ejson:"cust-1"');
    expect(toStoredDocument({ _id: 7 }).id).toBe('ejson:7');
  });
});
