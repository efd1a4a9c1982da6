import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface LoadRunRow {
  runId: string;
  status: string;
  startedAt: number | string;
  completedAt: number | string;
  elapsedMs: number;
  writes: unknown;
  verifications: unknown;
  efficiency: unknown;
  error: unknown;
}

export type LoadRunModel = ModelStatic<Model<LoadRunRow>>;

export function defineLoadRunModel(sequelize: Sequelize, tablePrefix: string): LoadRunModel {
  return sequelize.define<Model<LoadRunRow>>(
    'LoadRun',
    {
      runId: {
        type: DataTypes.STRING(36),
        primaryKey: true,
        allowNull: false,
      },
      status: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      startedAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      completedAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      elapsedMs: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      writes: {
        type: DataTypes.JSON,
        allowNull: false,
        defaultValue: [],
      },
      verifications: {
        type: DataTypes.JSON,
        allowNull: false,
        defaultValue: [],
      },
      efficiency: {
        type: DataTypes.JSON,
        allowNull: true,
      },
      error: {
        type: DataTypes.JSON,
        allowNull: true,
      },
    },
    {
      tableName: `${tablePrefix}load_runs`,
      timestamps: false,
    },
  );
}
