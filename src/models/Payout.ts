import { Table, Column, Model, DataType, ForeignKey, BelongsTo, Default, Unique } from 'sequelize-typescript';
import { Submission } from './Submission';
import { Influencer } from './Influencer';

export type PayoutStatus = 'pending' | 'sent' | 'failed';

@Table({
  tableName: 'payouts',
  timestamps: true,
  underscored: true
})
export class Payout extends Model {
  @Column({
    type: DataType.UUID,
    defaultValue: DataType.UUIDV4,
    primaryKey: true,
  })
  id!: string;

  @Unique
  @ForeignKey(() => Submission)
  @Column({
    type: DataType.UUID,
    allowNull: false
  })
  submission_id!: string;

  @BelongsTo(() => Submission)
  submission?: Submission;

  @ForeignKey(() => Influencer)
  @Column({
    type: DataType.UUID,
    allowNull: false
  })
  influencer_id!: string;

  @BelongsTo(() => Influencer)
  influencer?: Influencer;

  // In the influencer's settlement currency
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

  @Column({
    type: DataType.DATEONLY,
    allowNull: false
  })
  due_date!: string;

  @Default('pending')
  @Column({
    type: DataType.ENUM('pending', 'sent', 'failed'),
    allowNull: false
  })
  status!: PayoutStatus;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  reference?: string | null;

  @Column({
    type: DataType.DATE,
    allowNull: true
  })
  sent_at?: Date | null;

  @Column({
    type: DataType.TEXT,
    allowNull: true
  })
  failure_reason?: string | null;
}
