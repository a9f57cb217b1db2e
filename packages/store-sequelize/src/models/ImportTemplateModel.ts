import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface ImportTemplateRow {
  AIT_ImportTemplate_ID: number;
  Name: string | null;
  AD_Tab_ID: number;
  AIT_HeaderCSV: string | null;
  AD_Client_ID: number | null;
  AD_Org_ID: number | null;
  IsActive: string;
}

export type ImportTemplateModel = ModelStatic<Model<ImportTemplateRow, ImportTemplateRow>>;

export function defineImportTemplateModel(sequelize: Sequelize): ImportTemplateModel {
  return sequelize.define<Model<ImportTemplateRow, ImportTemplateRow>>(
    'AIT_ImportTemplate',
    {
      AIT_ImportTemplate_ID: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        allowNull: false,
      },
      Name: {
        type: DataTypes.STRING(60),
        allowNull: true,
      },
      AD_Tab_ID: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      AIT_HeaderCSV: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      AD_Client_ID: {
        type: DataTypes.INTEGER,
        allowNull: true,
      },
      AD_Org_ID: {
        type: DataTypes.INTEGER,
        allowNull: true,
      },
      IsActive: {
        type: DataTypes.CHAR(1),
        allowNull: false,
        defaultValue: 'Y',
      },
    },
    {
      tableName: 'AIT_ImportTemplate',
      timestamps: false,
    },
  );
}
