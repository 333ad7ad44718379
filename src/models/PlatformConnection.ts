import { Table, Column, Model, DataType, ForeignKey, BelongsTo, Default } from 'sequelize-typescript';
import { Influencer } from './Influencer';
import type { SupportedPlatform } from '../types/platform';

export type ConnectionVerificationStatus = 'pending' | 'verified' | 'rejected' | 'failed';
export type VerificationMethod = 'auto' | 'manual' | 'api';

@Table({
  tableName: 'platform_connections',
  timestamps: true,
  underscored: true,
  indexes: [
    { unique: true, fields: ['influencer_id', 'platform'] }
  ]
})
export class PlatformConnection extends Model {
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
    type: DataType.ENUM('tiktok', 'instagram', 'youtube', 'facebook'),
    allowNull: false
  })
  platform!: SupportedPlatform;

  @Column({
    type: DataType.STRING,
    allowNull: false
  })
  handle!: string;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  profile_url?: string | null;

  // Declared by the influencer
  @Default(0)
  @Column({
    type: DataType.INTEGER,
    allowNull: false,
    validate: { min: 0 }
  })
  followers_count!: number;

  // Fetched from the platform
  @Column({
    type: DataType.INTEGER,
    allowNull: true
  })
  verified_followers_count?: number | null;

  // Percent, e.g. 3.5 for 3.5 %
  @Column({
    type: DataType.FLOAT,
    allowNull: true
  })
  engagement_rate?: number | null;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  sample_post_url?: string | null;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  platform_user_id?: string | null;

  @Column({
    type: DataType.TEXT,
    allowNull: true
  })
  access_token?: string | null;

  @Column({
    type: DataType.TEXT,
    allowNull: true
  })
  refresh_token?: string | null;

  @Column({
    type: DataType.DATE,
    allowNull: true
  })
  token_expires_at?: Date | null;

  @Default('pending')
  @Column({
    type: DataType.ENUM('pending', 'verified', 'rejected', 'failed'),
    allowNull: false
  })
  verification_status!: ConnectionVerificationStatus;

  @Column({
    type: DataType.FLOAT,
    allowNull: true,
    validate: { min: 0, max: 1 }
  })
  verification_confidence?: number | null;

  @Default([])
  @Column({
    type: DataType.JSON,
    allowNull: false
  })
  verification_flags!: string[];

  @Default('auto')
  @Column({
    type: DataType.ENUM('auto', 'manual', 'api'),
    allowNull: false
  })
  verification_method!: VerificationMethod;

  @Column({
    type: DataType.DATE,
    allowNull: true
  })
  verified_at?: Date | null;

  @Column({
    type: DataType.DATE,
    allowNull: true
  })
  last_verification_attempt?: Date | null;
}
