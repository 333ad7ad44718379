import { Table, Column, Model, DataType, Default } from 'sequelize-typescript';

export type VerificationSubjectKind = 'brand' | 'influencer';
export type VerificationOutcome = 'verified' | 'approved' | 'pending' | 'rejected' | 'skipped' | 'missing' | 'abandoned';

/**
 * Delayed verification work. One row per subject; re-scheduling reuses it.
 */
@Table({
  tableName: 'verification_queue',
  timestamps: true,
  underscored: true,
  indexes: [
    { unique: true, fields: ['subject_type', 'subject_id'] },
    { fields: ['processed', 'scheduled_at'] }
  ]
})
export class VerificationQueueItem extends Model {
  @Column({
    type: DataType.UUID,
    defaultValue: DataType.UUIDV4,
    primaryKey: true,
  })
  id!: string;

  @Column({
    type: DataType.ENUM('brand', 'influencer'),
    allowNull: false
  })
  subject_type!: VerificationSubjectKind;

  @Column({
    type: DataType.UUID,
    allowNull: false
  })
  subject_id!: string;

  @Column({
    type: DataType.DATE,
    allowNull: false
  })
  scheduled_at!: Date;

  @Default(false)
  @Column({
    type: DataType.BOOLEAN,
    allowNull: false
  })
  processed!: boolean;

  @Column({
    type: DataType.UUID,
    allowNull: true
  })
  claim_token?: string | null;

  @Column({
    type: DataType.DATE,
    allowNull: true
  })
  claimed_at?: Date | null;

  @Column({
    type: DataType.DATE,
    allowNull: true
  })
  processed_at?: Date | null;

  @Column({
    type: DataType.STRING,
    allowNull: true
  })
  outcome?: VerificationOutcome | null;

  @Column({
    type: DataType.FLOAT,
    allowNull: true
  })
  confidence?: number | null;

  @Default(0)
  @Column({
    type: DataType.INTEGER,
    allowNull: false
  })
  attempts!: number;

  @Column({
    type: DataType.TEXT,
    allowNull: true
  })
  last_error?: string | null;
}
