import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface TableRow {
  AD_Table_ID: number;
  TableName: string;
}

export type TableModel = ModelStatic<Model<TableRow, TableRow>>;

export function defineTableModel(sequelize: Sequelize): TableModel {
  return sequelize.define<Model<TableRow, TableRow>>(
    'AD_Table',
    {
      AD_Table_ID: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        allowNull: false,
      },
      TableName: {
        type: DataTypes.STRING(40),
        allowNull: false,
      },
    },
    {
      tableName: 'AD_Table',
      timestamps: false,
    },
  );
}
