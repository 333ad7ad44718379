import { Table, Column, Model, DataType, ForeignKey, BelongsTo, Default, HasMany } from 'sequelize-typescript';
import { Brand } from './Brand';
import { Submission } from './Submission';
import type { CampaignPlatform } from '../types/platform';

export type CampaignStatus = 'draft' | 'active' | 'paused' | 'completed' | 'cancelled';

@Table({
  tableName: 'campaigns',
  timestamps: true,
  underscored: true
})
export class Campaign extends Model {
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

  @Column({
    type: DataType.STRING,
    allowNull: false
  })
  title!: string;

  @Column({
    type: DataType.TEXT,
    allowNull: true
  })
  description?: string | null;

  @Column({
    type: DataType.ENUM('tiktok', 'instagram', 'youtube'),
    allowNull: false
  })
  platform!: CampaignPlatform;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  niche?: string | null;

  // In the brand's wallet currency
  @Column({
    type: DataType.DECIMAL(19, 4),
    allowNull: false,
    validate: { min: 0.01 }
  })
  budget!: number;

  @Default(1)
  @Column({
    type: DataType.INTEGER,
    allowNull: false,
    validate: { min: 1 }
  })
  package_videos!: number;

  @Column({
    type: DataType.STRING(3),
    allowNull: true
  })
  currency?: string | null;

  @Column({
    type: DataType.DATEONLY,
    allowNull: true
  })
  start_date?: string | null;

  @Column({
    type: DataType.DATEONLY,
    allowNull: true
  })
  due_date?: string | null;

  @Default('draft')
  @Column({
    type: DataType.ENUM('draft', 'active', 'paused', 'completed', 'cancelled'),
    allowNull: false
  })
  status!: CampaignStatus;

  @HasMany(() => Submission)
  submissions?: Submission[];
}
