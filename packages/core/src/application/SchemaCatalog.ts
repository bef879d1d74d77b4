import { randomUUID } from 'node:crypto';
import type { Logger } from 'winston';
import type { SchemaDefinition, SchemaInput, SchemaPatch } from '../domain/model/Schema.js';
import type { DocumentStore } from '../domain/ports/DocumentStore.js';
import type { MetadataStore } from '../domain/ports/MetadataStore.js';
import type { ColumnMapping } from '../domain/services/ColumnMapper.js';
import type { EventBus } from './EventBus.js';
import { applySchemaPatch, createSchemaDefinition, recordSchemaUsage } from '../domain/model/Schema.js';
import { resolveColumnMapping } from '../domain/services/ColumnMapper.js';
import { NotFoundError } from '../domain/errors.js';

/** A saved schema that can import a given file, with how well it fits. */
export interface SchemaMatch {
  readonly schema: SchemaDefinition;
  readonly mapping: ColumnMapping;
  /** Mapped columns over file labels plus missing fields, in [0, 1]. */
  readonly coverage: number;
}

/** CRUD over schema templates, plus usage tracking and index materialization. */
export class SchemaCatalog {
  constructor(
    private readonly metadata: MetadataStore,
    private readonly documents: DocumentStore,
    private readonly eventBus: EventBus,
    private readonly logger: Logger,
  ) {}

  async create(input: SchemaInput): Promise<SchemaDefinition> {
    const schema = createSchemaDefinition(input, randomUUID(), Date.now());
    // a template whose indexes cannot be built is never saved
    await this.materializeIndexes(schema);
    await this.metadata.saveSchema(schema);

    this.logger.info('Schema created', { schemaId: schema.id, name: schema.name, collection: schema.collection });
    this.eventBus.emit({
      type: 'schema:created',
      schemaId: schema.id,
      name: schema.name,
      collection: schema.collection,
      timestamp: Date.now(),
    });
    return schema;
  }

  async update(id: string, patch: SchemaPatch): Promise<SchemaDefinition> {
    const existing = await this.get(id);
    const updated = applySchemaPatch(existing, patch, Date.now());
    if (patch.indexes !== undefined || updated.collection !== existing.collection) {
      await this.materializeIndexes(updated);
    }
    await this.metadata.saveSchema(updated);
    this.logger.info('Schema updated', { schemaId: id });
    return updated;
  }

  /** Remove the template. Documents already imported under it stay where they are. */
  async delete(id: string): Promise<void> {
    const deleted = await this.metadata.deleteSchema(id);
    if (!deleted) throw new NotFoundError('schema', id);
    this.logger.info('Schema deleted', { schemaId: id });
  }

  async get(id: string): Promise<SchemaDefinition> {
    const schema = await this.metadata.getSchema(id);
    if (!schema) throw new NotFoundError('schema', id);
    return schema;
  }

  list(): Promise<readonly SchemaDefinition[]> {
    return this.metadata.listSchemas();
  }

  async recordUsage(id: string): Promise<SchemaDefinition> {
    const updated = recordSchemaUsage(await this.get(id), Date.now());
    await this.metadata.saveSchema(updated);
    return updated;
  }

  /**
   * Saved schemas able to import a file with these labels, best fit first.
   *
   * Schemas with a missing required field are left out. Ties in coverage go to
   * the most recently used schema.
   */
  async resolve(labels: readonly string[], threshold?: number): Promise<SchemaMatch[]> {
    const matches: SchemaMatch[] = [];
    for (const schema of await this.metadata.listSchemas()) {
      const mapping = resolveColumnMapping(labels, schema, threshold);
      if (mapping.missingRequired.length > 0) continue;
      const denominator = labels.length + mapping.missingFields.length;
      matches.push({ schema, mapping, coverage: denominator === 0 ? 0 : mapping.mapped.length / denominator });
    }

    return matches.sort(
      (a, b) =>
        b.coverage - a.coverage ||
        (b.schema.lastUsedAt ?? -1) - (a.schema.lastUsedAt ?? -1) ||
        b.schema.createdAt - a.schema.createdAt,
    );
  }

  /** Create every declared index. Indexes that already exist are left alone by the store. */
  async materializeIndexes(schema: SchemaDefinition): Promise<void> {
    for (const index of schema.indexes) {
      await this.documents.ensureIndex(schema.collection, index);
    }
    if (schema.indexes.length > 0) {
      this.logger.debug('Indexes materialized', { schemaId: schema.id, count: schema.indexes.length });
    }
  }
}
