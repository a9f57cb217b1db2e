import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

/**
 * Column of the application dictionary. `AD_Reference_ID` is the display
 * type code, `FieldLength` the maximum text length (`0` or `null` when unbounded).
 */
export interface ColumnRow {
  AD_Column_ID: number;
  AD_Table_ID: number;
  ColumnName: string;
  AD_Reference_ID: number;
  FieldLength: number | null;
}

export type ColumnModel = ModelStatic<Model<ColumnRow, ColumnRow>>;

export function defineColumnModel(sequelize: Sequelize): ColumnModel {
  return sequelize.define<Model<ColumnRow, ColumnRow>>(
    'AD_Column',
    {
      AD_Column_ID: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        allowNull: false,
      },
      AD_Table_ID: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      ColumnName: {
        type: DataTypes.STRING(30),
        allowNull: false,
      },
      AD_Reference_ID: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      FieldLength: {
        type: DataTypes.INTEGER,
        allowNull: true,
      },
    },
    {
      tableName: 'AD_Column',
      timestamps: false,
    },
  );
}
