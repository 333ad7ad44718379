import { Table, Column, Model, DataType, Default, Unique } from 'sequelize-typescript';
import type { SupportedPlatform } from '../types/platform';

@Table({
  tableName: 'platform_settings',
  timestamps: true,
  underscored: true
})
export class PlatformSetting extends Model {
  @Column({
    type: DataType.UUID,
    defaultValue: DataType.UUIDV4,
    primaryKey: true,
  })
  id!: string;

  @Unique
  @Column({
    type: DataType.ENUM('tiktok', 'instagram', 'youtube', 'facebook'),
    allowNull: false
  })
  platform!: SupportedPlatform;

  @Default(1000)
  @Column({
    type: DataType.INTEGER,
    allowNull: false,
    validate: { min: 0 }
  })
  minimum_followers!: number;

  @Default(true)
  @Column({
    type: DataType.BOOLEAN,
    allowNull: false
  })
  is_active!: boolean;
}
