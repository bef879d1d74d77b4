import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model, Optional } from 'sequelize';

export interface QualityIssueRow {
  id: number;
  batchId: string;
  rowNumber: number;
  column: string;
  field: string | null;
  kind: string;
  severity: string;
  rawValue: string | null;
  suggestedFix: string | null;
}

export type QualityIssueCreationRow = Optional<QualityIssueRow, 'id'>;

export type QualityIssueModel = ModelStatic<Model<QualityIssueRow, QualityIssueCreationRow>>;

export function defineQualityIssueModel(sequelize: Sequelize, tablePrefix: string): QualityIssueModel {
  return sequelize.define<Model<QualityIssueRow, QualityIssueCreationRow>>(
    `${tablePrefix}QualityIssue`,
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
      rowNumber: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      column: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      field: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      kind: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      severity: {
        type: DataTypes.STRING(10),
        allowNull: false,
      },
      rawValue: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      suggestedFix: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
    },
    {
      tableName: `${tablePrefix}quality_issues`,
      timestamps: false,
      indexes: [{ fields: ['batchId', 'rowNumber'] }],
    },
  );
}
