import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model, Optional } from 'sequelize';

export interface BatchRow {
  /** Insertion order. Breaks ties between batches started in the same millisecond. */
  position: number;
  id: string;
  schemaId: string;
  sourcePath: string;
  sourceHash: string | null;
  dataStartRow: number;
  status: string;
  counts: unknown;
  startedAt: number | string;
  endedAt: number | string | null;
  errors: unknown;
  rollbackAttempts: unknown;
}

export type BatchCreationRow = Optional<BatchRow, 'position'>;

export type BatchModel = ModelStatic<Model<BatchRow, BatchCreationRow>>;

export function defineBatchModel(sequelize: Sequelize, tablePrefix: string): BatchModel {
  return sequelize.define<Model<BatchRow, BatchCreationRow>>(
    `${tablePrefix}Batch`,
    {
      position: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        autoIncrement: true,
      },
      id: {
        type: DataTypes.STRING(36),
        allowNull: false,
        unique: true,
      },
      schemaId: {
        type: DataTypes.STRING(36),
        allowNull: false,
      },
      sourcePath: {
        type: DataTypes.STRING(1024),
        allowNull: false,
      },
      sourceHash: {
        type: DataTypes.STRING(128),
        allowNull: true,
      },
      dataStartRow: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      status: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      counts: {
        type: DataTypes.JSON,
        allowNull: false,
      },
      startedAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      endedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
      errors: {
        type: DataTypes.JSON,
        allowNull: false,
        defaultValue: [],
      },
      rollbackAttempts: {
        type: DataTypes.JSON,
        allowNull: false,
        defaultValue: [],
      },
    },
    {
      tableName: `${tablePrefix}batches`,
      timestamps: false,
      indexes: [{ fields: ['startedAt'] }, { fields: ['status'] }],
    },
  );
}
