import { ConnectionError, Op, Sequelize, TimeoutError } from 'sequelize';
import type { Options } from 'sequelize';
import type { AuditLogEntry, DataQualityIssue, ImportBatch, MetadataStore, SchemaDefinition } from '@tabingest/core';
import { BatchStatus, StoreUnavailableError, isFinished } from '@tabingest/core';
import { defineSchemaModel } from './models/SchemaModel.js';
import type { SchemaModel } from './models/SchemaModel.js';
import { defineBatchModel } from './models/BatchModel.js';
import type { BatchModel } from './models/BatchModel.js';
import { defineAuditEntryModel } from './models/AuditEntryModel.js';
import type { AuditEntryModel } from './models/AuditEntryModel.js';
import { defineQualityIssueModel } from './models/QualityIssueModel.js';
import type { QualityIssueModel } from './models/QualityIssueModel.js';
import * as SchemaMapper from './mappers/SchemaMapper.js';
import * as BatchMapper from './mappers/BatchMapper.js';
import * as AuditEntryMapper from './mappers/AuditEntryMapper.js';
import * as QualityIssueMapper from './mappers/QualityIssueMapper.js';
import type { SequelizeSettings } from './settings.js';
import { DEFAULT_TABLE_PREFIX } from './settings.js';

export interface SequelizeMetadataStoreOptions {
  /** Prepended to every table name. Default: `'tabingest_'`. */
  readonly tablePrefix?: string;
}

const FINISHED_STATUSES = Object.values(BatchStatus).filter(isFinished);

/**
 * Sequelize-based MetadataStore adapter for `@tabingest/core`.
 *
 * Persists schema templates, batches, audit entries and quality issues to a
 * relational database using Sequelize v6. Supports any dialect supported by
 * Sequelize (PostgreSQL, MySQL, MariaDB, SQLite, MS SQL Server).
 *
 * Call `initialize()` after construction to create tables. Connection failures
 * surface as `StoreUnavailableError`.
 */
export class SequelizeMetadataStore implements MetadataStore {
  private readonly sequelize: Sequelize;
  private readonly Schema: SchemaModel;
  private readonly Batch: BatchModel;
  private readonly AuditEntry: AuditEntryModel;
  private readonly QualityIssue: QualityIssueModel;

  constructor(sequelize: Sequelize, options?: SequelizeMetadataStoreOptions) {
    const prefix = options?.tablePrefix ?? DEFAULT_TABLE_PREFIX;
    this.sequelize = sequelize;
    this.Schema = defineSchemaModel(sequelize, prefix);
    this.Batch = defineBatchModel(sequelize, prefix);
    this.AuditEntry = defineAuditEntryModel(sequelize, prefix);
    this.QualityIssue = defineQualityIssueModel(sequelize, prefix);
  }

  /**
   * Open a connection from settings and create the tables.
   * `options` are passed to the Sequelize constructor as they are.
   */
  static async connect(settings: SequelizeSettings, options: Options = {}): Promise<SequelizeMetadataStore> {
    const sequelize = new Sequelize(settings.databaseUrl, { logging: false, ...options });
    const store = new SequelizeMetadataStore(sequelize, { tablePrefix: settings.tablePrefix });
    await store.initialize();
    return store;
  }

  async initialize(): Promise<void> {
    await this.guard(async () => {
      await this.Schema.sync();
      await this.Batch.sync();
      await this.AuditEntry.sync();
      await this.QualityIssue.sync();
    });
  }

  close(): Promise<void> {
    return this.sequelize.close();
  }

  // ── Schemas ─────────────────────────────────────────────────────────

  async saveSchema(schema: SchemaDefinition): Promise<void> {
    await this.guard(() => this.Schema.upsert(SchemaMapper.toRow(schema)));
  }

  getSchema(id: string): Promise<SchemaDefinition | null> {
    return this.guard(async () => {
      const row = await this.Schema.findByPk(id);
      return row ? SchemaMapper.toDomain(row.get({ plain: true })) : null;
    });
  }

  listSchemas(): Promise<readonly SchemaDefinition[]> {
    return this.guard(async () => {
      const rows = await this.Schema.findAll();
      // NULLS LAST has no portable spelling
      return rows
        .map((r) => SchemaMapper.toDomain(r.get({ plain: true })))
        .sort((a, b) => (b.lastUsedAt ?? -1) - (a.lastUsedAt ?? -1) || b.createdAt - a.createdAt);
    });
  }

  deleteSchema(id: string): Promise<boolean> {
    return this.guard(async () => (await this.Schema.destroy({ where: { id } })) > 0);
  }

  // ── Batches ─────────────────────────────────────────────────────────

  async saveBatch(batch: ImportBatch): Promise<void> {
    const row = BatchMapper.toRow(batch);
    await this.guard(async () => {
      const existing = await this.Batch.findOne({ where: { id: batch.id } });
      if (existing) {
        await existing.update(row);
      } else {
        await this.Batch.create(row);
      }
    });
  }

  getBatch(id: string): Promise<ImportBatch | null> {
    return this.guard(async () => {
      const row = await this.Batch.findOne({ where: { id } });
      return row ? BatchMapper.toDomain(row.get({ plain: true })) : null;
    });
  }

  listBatches(limit?: number): Promise<readonly ImportBatch[]> {
    return this.guard(async () => {
      const rows = await this.Batch.findAll({
        order: [
          ['startedAt', 'DESC'],
          ['position', 'DESC'],
        ],
        ...(limit !== undefined ? { limit } : {}),
      });
      return rows.map((r) => BatchMapper.toDomain(r.get({ plain: true })));
    });
  }

  deleteBatchesBefore(cutoff: number): Promise<number> {
    return this.guard(() =>
      this.sequelize.transaction(async (transaction) => {
        const rows = await this.Batch.findAll({
          attributes: ['id'],
          where: { status: { [Op.in]: FINISHED_STATUSES }, startedAt: { [Op.lt]: cutoff } },
          transaction,
        });
        const ids = rows.map((r) => r.getDataValue('id'));
        if (ids.length === 0) return 0;

        await this.AuditEntry.destroy({ where: { batchId: { [Op.in]: ids } }, transaction });
        await this.QualityIssue.destroy({ where: { batchId: { [Op.in]: ids } }, transaction });
        return this.Batch.destroy({ where: { id: { [Op.in]: ids } }, transaction });
      }),
    );
  }

  // ── Audit entries ───────────────────────────────────────────────────

  async appendAuditEntry(entry: AuditLogEntry): Promise<void> {
    await this.guard(() => this.AuditEntry.create(AuditEntryMapper.toRow(entry)));
  }

  listAuditEntries(batchId: string): Promise<readonly AuditLogEntry[]> {
    return this.guard(async () => {
      const rows = await this.AuditEntry.findAll({ where: { batchId }, order: [['sequence', 'ASC']] });
      return rows.map((r) => AuditEntryMapper.toDomain(r.get({ plain: true })));
    });
  }

  // ── Quality issues ──────────────────────────────────────────────────

  async saveQualityIssues(issues: readonly DataQualityIssue[]): Promise<void> {
    if (issues.length === 0) return;
    await this.guard(() => this.QualityIssue.bulkCreate(issues.map(QualityIssueMapper.toRow)));
  }

  listQualityIssues(batchId: string): Promise<readonly DataQualityIssue[]> {
    return this.guard(async () => {
      const rows = await this.QualityIssue.findAll({
        where: { batchId },
        order: [
          ['rowNumber', 'ASC'],
          ['id', 'ASC'],
        ],
      });
      return rows.map((r) => QualityIssueMapper.toDomain(r.get({ plain: true })));
    });
  }

  /** Run a query, reporting a lost connection as `StoreUnavailableError`. */
  private async guard<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof ConnectionError || error instanceof TimeoutError) {
        throw new StoreUnavailableError('The metadata database cannot be reached', { cause: error });
      }
      throw error;
    }
  }
}
