import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface SchemaRow {
  id: string;
  name: string;
  collection: string;
  fields: unknown;
  indexes: unknown;
  duplicateKey: unknown;
  duplicateStrategy: string;
  dataStartRow: number;
  usageCount: number;
  lastUsedAt: number | string | null;
  createdAt: number | string;
  updatedAt: number | string;
}

export type SchemaModel = ModelStatic<Model<SchemaRow>>;

export function defineSchemaModel(sequelize: Sequelize, tablePrefix: string): SchemaModel {
  return sequelize.define<Model<SchemaRow>>(
    `${tablePrefix}Schema`,
    {
      id: {
        type: DataTypes.STRING(36),
        primaryKey: true,
        allowNull: false,
      },
      name: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      collection: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      fields: {
        type: DataTypes.JSON,
        allowNull: false,
      },
      indexes: {
        type: DataTypes.JSON,
        allowNull: false,
        defaultValue: [],
      },
      duplicateKey: {
        type: DataTypes.JSON,
        allowNull: false,
        defaultValue: [],
      },
      duplicateStrategy: {
        type: DataTypes.STRING(10),
        allowNull: false,
      },
      dataStartRow: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      usageCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      lastUsedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
      createdAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      updatedAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
    },
    {
      tableName: `${tablePrefix}schemas`,
      timestamps: false,
    },
  );
}
