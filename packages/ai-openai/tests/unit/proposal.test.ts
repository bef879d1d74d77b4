import { describe, it, expect } from 'vitest';
import { aiResponseSchema, sanitizeCollectionName, sanitizeFieldName, toProposal } from '../../src/proposal.js';

function response(attributes: Record<string, string>, collection = 'people') {
  return aiResponseSchema.parse({
    normalized_attributes: Object.fromEntries(
      Object.entries(attributes).map(([label, field]) => [label, { field_name: field, data_type: 'String' }]),
    ),
    suggested_indexes: [],
    duplicate_detection_columns: [],
    collection_name: collection,
  });
}

describe('sanitizeFieldName', () => {
  it('should join words with underscores', () => {
    expect(sanitizeFieldName(' first name ')).toBe('first_name');
    expect(sanitizeFieldName('e-mail / address')).toBe('e_mail_address');
  });

  it('should prefix a name starting with a digit', () => {
    expect(sanitizeFieldName('2nd phone')).toBe('f_2nd_phone');
  });

  it('should fall back when nothing usable remains', () => {
    expect(sanitizeFieldName('***')).toBe('field');
  });
});

describe('sanitizeCollectionName', () => {
  it('should keep dashes and replace other characters', () => {
    expect(sanitizeCollectionName('crm-contacts 2024')).toBe('crm-contacts_2024');
    expect(sanitizeCollectionName('!!!')).toBe('');
  });
});

describe('toProposal', () => {
  it('should leave out labels the response does not cover', () => {
    const proposal = toProposal(['Name', 'Notes'], response({ Name: 'name' }));

    expect(proposal.fields.map((f) => f.column)).toEqual(['Name']);
  });

  it('should disambiguate repeated field names', () => {
    const proposal = toProposal(['Name', 'Nom'], response({ Name: 'name', Nom: 'name' }));

    expect(proposal.fields.map((f) => f.attribute.field)).toEqual(['name', 'name_2']);
  });

  it('should reject a collection name with no usable characters', () => {
    expect(() => toProposal(['Name'], response({ Name: 'name' }, '???'))).toThrow(
      'The AI response has no usable collection name',
    );
  });
});
