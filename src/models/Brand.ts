import { Table, Column, Model, DataType, ForeignKey, BelongsTo, Default, HasMany, Unique } from 'sequelize-typescript';
import { User } from './User';
import { Currency } from './Currency';
import { Campaign } from './Campaign';

export type BrandVerificationStatus = 'pending' | 'verified' | 'rejected' | 'request_info' | 'paused';

@Table({
  tableName: 'brands',
  timestamps: true,
  underscored: true
})
export class Brand extends Model {
  @Column({
    type: DataType.UUID,
    defaultValue: DataType.UUIDV4,
    primaryKey: true,
  })
  id!: string;

  @Unique
  @ForeignKey(() => User)
  @Column({
    type: DataType.UUID,
    allowNull: false
  })
  user_id!: string;

  @BelongsTo(() => User)
  user?: User;

  @Column({
    type: DataType.STRING,
    allowNull: false
  })
  company_name!: string;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  industry?: string | null;

  @Column({
    type: DataType.TEXT,
    allowNull: true
  })
  description?: string | null;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  website?: string | null;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  contact_email?: string | null;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  contact_phone?: string | null;

  // DECIMAL(19,4) for financial precision
  @Default(0)
  @Column({
    type: DataType.DECIMAL(19, 4),
    allowNull: false,
    validate: { min: 0 }
  })
  wallet_balance!: number;

  @ForeignKey(() => Currency)
  @Column({
    type: DataType.UUID,
    allowNull: true
  })
  currency_id?: string | null;

  @BelongsTo(() => Currency)
  currency?: Currency | null;

  @Default('pending')
  @Column({
    type: DataType.ENUM('pending', 'verified', 'rejected', 'request_info', 'paused'),
    allowNull: false
  })
  verification_status!: BrandVerificationStatus;

  @Column({
    type: DataType.FLOAT,
    allowNull: true
  })
  verification_confidence?: number | null;

  @Default([])
  @Column({
    type: DataType.JSON,
    allowNull: false
  })
  verification_flags!: string[];

  @Column({
    type: DataType.TEXT,
    allowNull: true
  })
  verification_notes?: string | null;

  @Column({
    type: DataType.DATE,
    allowNull: true
  })
  verified_at?: Date | null;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  paused_from_status?: BrandVerificationStatus | null;

  @Column({
    type: DataType.TEXT,
    allowNull: true
  })
  pause_reason?: string | null;

  @HasMany(() => Campaign)
  campaigns?: Campaign[];
}
