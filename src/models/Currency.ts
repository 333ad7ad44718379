import { Table, Column, Model, DataType, Default, Unique } from 'sequelize-typescript';

@Table({
  tableName: 'currencies',
  timestamps: true,
  underscored: true
})
export class Currency extends Model {
  @Column({
    type: DataType.UUID,
    defaultValue: DataType.UUIDV4,
    primaryKey: true,
  })
  id!: string;

  // ISO 4217
  @Unique
  @Column({
    type: DataType.STRING(3),
    allowNull: false
  })
  code!: string;

  @Column({
    type: DataType.STRING,
    allowNull: false
  })
  name!: string;

  @Column({
    type: DataType.STRING(8),
    allowNull: false
  })
  symbol!: string;

  @Default(false)
  @Column({
    type: DataType.BOOLEAN,
    allowNull: false
  })
  is_default!: boolean;

  @Default(true)
  @Column({
    type: DataType.BOOLEAN,
    allowNull: false
  })
  is_active!: boolean;

  // Units of the default currency per 1 unit of this currency.
  @Default(1)
  @Column({
    type: DataType.DECIMAL(19, 6),
    allowNull: false
  })
  exchange_rate!: number;
}
