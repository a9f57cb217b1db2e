import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

/** Window tab. Only the columns needed to reach the tab's table are mapped. */
export interface TabRow {
  AD_Tab_ID: number;
  AD_Table_ID: number;
  Name: string | null;
}

export type TabModel = ModelStatic<Model<TabRow, TabRow>>;

export function defineTabModel(sequelize: Sequelize): TabModel {
  return sequelize.define<Model<TabRow, TabRow>>(
    'AD_Tab',
    {
      AD_Tab_ID: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        allowNull: false,
      },
      AD_Table_ID: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      Name: {
        type: DataTypes.STRING(60),
        allowNull: true,
      },
    },
    {
      tableName: 'AD_Tab',
      timestamps: false,
    },
  );
}
