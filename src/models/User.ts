import { Table, Column, Model, DataType, Default, Unique, HasOne } from 'sequelize-typescript';
import { Brand } from './Brand';
import { Influencer } from './Influencer';

export const USER_ROLES = ['brand', 'influencer', 'admin'] as const;
export type UserRole = typeof USER_ROLES[number];

@Table({
  tableName: 'users',
  timestamps: true,
  underscored: true
})
export class User extends Model {
  @Column({
    type: DataType.UUID,
    defaultValue: DataType.UUIDV4,
    primaryKey: true,
  })
  id!: string;

  @Unique
  @Column({
    type: DataType.STRING,
    allowNull: false,
    validate: { isEmail: true }
  })
  email!: string;

  @Column({
    type: DataType.STRING,
    allowNull: false
  })
  username!: string;

  @Column({
    type: DataType.STRING,
    allowNull: false
  })
  password_hash!: string;

  @Column({
    type: DataType.ENUM('brand', 'influencer', 'admin'),
    allowNull: false
  })
  role!: UserRole;

  @Default(false)
  @Column({
    type: DataType.BOOLEAN,
    allowNull: false
  })
  email_verified!: boolean;

  @Column({
    type: DataType.DATE,
    allowNull: true
  })
  email_verified_at?: Date | null;

  @HasOne(() => Brand)
  brand?: Brand;

  @HasOne(() => Influencer)
  influencer?: Influencer;
}
