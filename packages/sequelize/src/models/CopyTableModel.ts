import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model, ModelAttributes } from 'sequelize';
import type { ColumnSchema } from '@loadcheck/core';
import { attributeTypeOf } from '../SqlColumnTypes.js';

/** Hidden primary key holding each row's position in the dataset. */
export const ROW_INDEX = '__row_index';

export type CopyTableModel = ModelStatic<Model>;

/** Model over one copy table. Redefining a table replaces the earlier model. */
export function defineCopyTable(
  sequelize: Sequelize,
  tableName: string,
  columns: readonly ColumnSchema[],
): CopyTableModel {
  const dialect = sequelize.getDialect();
  const attributes: ModelAttributes = {
    [ROW_INDEX]: {
      type: DataTypes.INTEGER,
      primaryKey: true,
      allowNull: false,
    },
  };
  for (const column of columns) {
    attributes[column.name] = {
      type: attributeTypeOf(column.type, dialect),
      allowNull: true,
    };
  }

  return sequelize.define(`LoadCopy_${tableName}`, attributes, {
    tableName,
    timestamps: false,
  });
}
