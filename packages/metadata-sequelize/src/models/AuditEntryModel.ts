import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model, Optional } from 'sequelize';

export interface AuditEntryRow {
  id: number;
  batchId: string;
  sequence: number;
  operation: string;
  collection: string;
  documentId: string | null;
  before: unknown;
  after: unknown;
  rowNumber: number | null;
  recordedAt: number | string;
}

export type AuditEntryCreationRow = Optional<AuditEntryRow, 'id'>;

export type AuditEntryModel = ModelStatic<Model<AuditEntryRow, AuditEntryCreationRow>>;

export function defineAuditEntryModel(sequelize: Sequelize, tablePrefix: string): AuditEntryModel {
  return sequelize.define<Model<AuditEntryRow, AuditEntryCreationRow>>(
    `${tablePrefix}AuditEntry`,
    {
      id: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        autoIncrement: true,
      },
      batchId: {
        type: DataTypes.STRING(36),
        allowNull: false,
      },
      sequence: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      operation: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      collection: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      documentId: {
        type: DataTypes.STRING(64),
        allowNull: true,
      },
      before: {
        type: DataTypes.JSON,
        allowNull: true,
      },
      after: {
        type: DataTypes.JSON,
        allowNull: true,
      },
      rowNumber: {
        type: DataTypes.INTEGER,
        allowNull: true,
      },
      recordedAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
    },
    {
      tableName: `${tablePrefix}audit_entries`,
      timestamps: false,
      indexes: [{ unique: true, fields: ['batchId', 'sequence'] }],
    },
  );
}
