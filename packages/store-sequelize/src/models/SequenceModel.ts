import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

/** Document and table-ID sequences. Table-ID sequences are named after their table. */
export interface SequenceRow {
  AD_Sequence_ID: number;
  Name: string;
  IsTableID: string;
  CurrentNext: number | string;
  IncrementNo: number | string;
}

export type SequenceModel = ModelStatic<Model<SequenceRow, SequenceRow>>;

export function defineSequenceModel(sequelize: Sequelize): SequenceModel {
  return sequelize.define<Model<SequenceRow, SequenceRow>>(
    'AD_Sequence',
    {
      AD_Sequence_ID: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        allowNull: false,
      },
      Name: {
        type: DataTypes.STRING(60),
        allowNull: false,
      },
      IsTableID: {
        type: DataTypes.CHAR(1),
        allowNull: false,
        defaultValue: 'N',
      },
      CurrentNext: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      IncrementNo: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 1,
      },
    },
    {
      tableName: 'AD_Sequence',
      timestamps: false,
    },
  );
}
