import { Table, Column, Model, DataType, ForeignKey, BelongsTo, Default, Unique, Index } from 'sequelize-typescript';
import { Brand } from './Brand';
import { Campaign } from './Campaign';

export type PaymentTransactionType = 'wallet_topup' | 'campaign_payment';
export type PaymentTransactionStatus = 'pending' | 'success' | 'failed' | 'cancelled';
export type PaymentGateway = 'paystack' | 'wallet';

@Table({
  tableName: 'payment_transactions',
  timestamps: true,
  underscored: true
})
export class PaymentTransaction extends Model {
  @Column({
    type: DataType.UUID,
    defaultValue: DataType.UUIDV4,
    primaryKey: true,
  })
  id!: string;

  @ForeignKey(() => Brand)
  @Column({
    type: DataType.UUID,
    allowNull: false
  })
  brand_id!: string;

  @BelongsTo(() => Brand)
  brand?: Brand;

  @Index
  @ForeignKey(() => Campaign)
  @Column({
    type: DataType.UUID,
    allowNull: true
  })
  campaign_id?: string | null;

  @BelongsTo(() => Campaign)
  campaign?: Campaign | null;

  @Column({
    type: DataType.ENUM('wallet_topup', 'campaign_payment'),
    allowNull: false
  })
  type!: PaymentTransactionType;

  @Column({
    type: DataType.DECIMAL(19, 4),
    allowNull: false
  })
  amount!: number;

  @Column({
    type: DataType.STRING(3),
    allowNull: false
  })
  currency!: string;

  @Unique
  @Column({
    type: DataType.STRING,
    allowNull: false
  })
  reference!: string;

  @Default('pending')
  @Column({
    type: DataType.ENUM('pending', 'success', 'failed', 'cancelled'),
    allowNull: false
  })
  status!: PaymentTransactionStatus;

  @Column({
    type: DataType.ENUM('paystack', 'wallet'),
    allowNull: false
  })
  gateway!: PaymentGateway;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  authorization_url?: string | null;

  @Column({
    type: DataType.JSON,
    allowNull: true
  })
  gateway_response?: Record<string, unknown> | null;

  @Column({
    type: DataType.DATE,
    allowNull: true
  })
  paid_at?: Date | null;
}
