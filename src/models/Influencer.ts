import { Table, Column, Model, DataType, ForeignKey, BelongsTo, Default, HasMany, Unique } from 'sequelize-typescript';
import { User } from './User';
import { Currency } from './Currency';
import { PlatformConnection } from './PlatformConnection';
import type { SupportedPlatform } from '../types/platform';

export type InfluencerVerificationStatus = 'pending' | 'approved' | 'rejected' | 'request_info' | 'paused';

@Table({
  tableName: 'influencers',
  timestamps: true,
  underscored: true
})
export class Influencer extends Model {
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
  display_name!: string;

  @Column({
    type: DataType.TEXT,
    allowNull: true
  })
  bio?: string | null;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  niche?: string | null;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  primary_platform?: SupportedPlatform | null;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  country?: string | null;

  // Settlement currency for payouts
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
    type: DataType.ENUM('pending', 'approved', 'rejected', 'request_info', 'paused'),
    allowNull: false
  })
  verification_status!: InfluencerVerificationStatus;

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
  paused_from_status?: InfluencerVerificationStatus | null;

  @Column({
    type: DataType.TEXT,
    allowNull: true
  })
  pause_reason?: string | null;

  @HasMany(() => PlatformConnection)
  connections?: PlatformConnection[];
}
