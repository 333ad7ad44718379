import { Table, Column, Model, DataType, ForeignKey, BelongsTo, Default } from 'sequelize-typescript';
import { Influencer } from './Influencer';

export type PaymentMethodType = 'bank' | 'mobile_money';

@Table({
  tableName: 'payment_methods',
  timestamps: true,
  underscored: true
})
export class PaymentMethod extends Model {
  @Column({
    type: DataType.UUID,
    defaultValue: DataType.UUIDV4,
    primaryKey: true,
  })
  id!: string;

  @ForeignKey(() => Influencer)
  @Column({
    type: DataType.UUID,
    allowNull: false
  })
  influencer_id!: string;

  @BelongsTo(() => Influencer)
  influencer?: Influencer;

  @Column({
    type: DataType.ENUM('bank', 'mobile_money'),
    allowNull: false
  })
  method_type!: PaymentMethodType;

  @Column({
    type: DataType.STRING,
    allowNull: false
  })
  account_name!: string;

  @Column({
    type: DataType.STRING,
    allowNull: false
  })
  account_number!: string;

  // Bank name or mobile money provider
  @Column({
    type: DataType.STRING,
    allowNull: false
  })
  provider!: string;

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
}
