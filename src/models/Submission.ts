import { Table, Column, Model, DataType, ForeignKey, BelongsTo, Default, HasOne } from 'sequelize-typescript';
import { Campaign } from './Campaign';
import { Influencer } from './Influencer';
import { Payout } from './Payout';

export type SubmissionStatus = 'new' | 'in_review' | 'verified' | 'flagged' | 'needs_reupload';

@Table({
  tableName: 'submissions',
  timestamps: true,
  underscored: true,
  indexes: [
    { unique: true, fields: ['campaign_id', 'influencer_id'] }
  ]
})
export class Submission extends Model {
  @Column({
    type: DataType.UUID,
    defaultValue: DataType.UUIDV4,
    primaryKey: true,
  })
  id!: string;

  @ForeignKey(() => Campaign)
  @Column({
    type: DataType.UUID,
    allowNull: false
  })
  campaign_id!: string;

  @BelongsTo(() => Campaign)
  campaign?: Campaign;

  @ForeignKey(() => Influencer)
  @Column({
    type: DataType.UUID,
    allowNull: false
  })
  influencer_id!: string;

  @BelongsTo(() => Influencer)
  influencer?: Influencer;

  @Default('new')
  @Column({
    type: DataType.ENUM('new', 'in_review', 'verified', 'flagged', 'needs_reupload'),
    allowNull: false
  })
  status!: SubmissionStatus;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  proof_url?: string | null;

  @Column({
    type: DataType.TEXT,
    allowNull: true
  })
  notes?: string | null;

  @Column({
    type: DataType.TEXT,
    allowNull: true
  })
  review_notes?: string | null;

  @Column({
    type: DataType.DATE,
    allowNull: true
  })
  submitted_at?: Date | null;

  @Column({
    type: DataType.DATE,
    allowNull: true
  })
  reviewed_at?: Date | null;

  @HasOne(() => Payout)
  payout?: Payout;
}
