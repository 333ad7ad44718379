import { randomUUID } from 'crypto';
import { Op } from 'sequelize';
import { VerificationQueueItem, VerificationSubjectKind, VerificationOutcome } from '../models/VerificationQueueItem';
import { Brand } from '../models/Brand';
import { Influencer } from '../models/Influencer';
import { settings, QueueSettings } from '../config/settings';
import { logger, errorMessage } from '../utils/logger';
import { BrandVerificationService, brandVerificationService } from './BrandVerificationService';
import { PlatformVerificationService, platformVerificationService } from './PlatformVerificationService';
import { InfluencerVerificationService, influencerVerificationService } from './InfluencerVerificationService';

export interface DrainOptions {
  kind?: VerificationSubjectKind;
  limit?: number;
  now?: Date;
  autoApprove?: boolean;
}

export interface DrainStats {
  due: number;
  claimed: number;
  processed: number;
  approved: number;
  pending: number;
  skipped: number;
  missing: number;
  failed: number;
  /** Failed items that used up their attempts and were closed. */
  abandoned: number;
  /** Items another worker claimed first. */
  lostClaims: number;
}

interface ProcessOutcome {
  outcome: VerificationOutcome;
  confidence: number | null;
}

export interface QueueDependencies {
  brands: BrandVerificationService;
  platforms: PlatformVerificationService;
  influencers: InfluencerVerificationService;
  random: () => number;
  clock: () => Date;
}

const MINUTE = 60 * 1000;

export class VerificationQueueService {
  private readonly deps: QueueDependencies;

  constructor(
    private readonly config: QueueSettings = settings.queue,
    private readonly autoApproveDefault: boolean = settings.verification.autoApprove,
    deps: Partial<QueueDependencies> = {}
  ) {
    this.deps = {
      brands: brandVerificationService,
      platforms: platformVerificationService,
      influencers: influencerVerificationService,
      random: Math.random,
      clock: () => new Date(),
      ...deps,
    };
  }

  /** Whole minutes, uniform over [minDelayMinutes, maxDelayMinutes]. */
  nextDelayMinutes(): number {
    const { minDelayMinutes: min, maxDelayMinutes: max } = this.config;
    return min + Math.floor(this.deps.random() * (max - min + 1));
  }

  /**
   * Queue verification for a subject. Scheduling again before the drain
   * runs moves the same row forward instead of adding another.
   */
  async schedule(kind: VerificationSubjectKind, subjectId: string): Promise<VerificationQueueItem> {
    const scheduledAt = new Date(this.deps.clock().getTime() + this.nextDelayMinutes() * MINUTE);

    const [item, created] = await VerificationQueueItem.findOrCreate({
      where: { subject_type: kind, subject_id: subjectId },
      defaults: { subject_type: kind, subject_id: subjectId, scheduled_at: scheduledAt, processed: false },
    });

    if (!created) {
      item.scheduled_at = scheduledAt;
      item.processed = false;
      item.processed_at = null;
      item.claim_token = null;
      item.claimed_at = null;
      item.outcome = null;
      item.confidence = null;
      await item.save();
    }

    logger.info('Verification scheduled', { kind, subjectId, scheduledAt: scheduledAt.toISOString(), rescheduled: !created });
    return item;
  }

  private claimableWhere(now: Date) {
    const leaseCutoff = new Date(now.getTime() - this.config.leaseSeconds * 1000);
    return {
      processed: false,
      [Op.or]: [{ claim_token: null }, { claimed_at: { [Op.lt]: leaseCutoff } }],
    };
  }

  /** Linear backoff from the time of failure. */
  private retryAt(attempts: number): Date {
    return new Date(this.deps.clock().getTime() + this.config.retryDelayMinutes * attempts * MINUTE);
  }

  /**
   * Process due items. Each item is claimed with a conditional update
   * before any work happens, so concurrent drains never run it twice.
   * Failures release the claim and push the item back; after
   * `maxAttempts` claims it is closed as `abandoned`.
   */
  async drain(options: DrainOptions = {}): Promise<DrainStats> {
    const now = options.now ?? this.deps.clock();
    const limit = options.limit ?? this.config.batchSize;
    const autoApprove = options.autoApprove ?? this.autoApproveDefault;

    const due = await VerificationQueueItem.findAll({
      where: {
        ...this.claimableWhere(now),
        scheduled_at: { [Op.lte]: now },
        ...(options.kind ? { subject_type: options.kind } : {}),
      },
      order: [['scheduled_at', 'ASC']],
      limit,
    });

    const stats: DrainStats = {
      due: due.length,
      claimed: 0,
      processed: 0,
      approved: 0,
      pending: 0,
      skipped: 0,
      missing: 0,
      failed: 0,
      abandoned: 0,
      lostClaims: 0,
    };

    for (const item of due) {
      const token = randomUUID();
      // Stamped per claim: a long batch must not hand out leases that are already stale.
      const claimedAt = this.deps.clock();
      const attempts = item.attempts + 1;
      const [claimedRows] = await VerificationQueueItem.update(
        { claim_token: token, claimed_at: claimedAt, attempts },
        { where: { id: item.id, ...this.claimableWhere(claimedAt) } }
      );
      if (claimedRows !== 1) {
        stats.lostClaims += 1;
        continue;
      }
      stats.claimed += 1;

      try {
        const result = await this.process(item, autoApprove);
        await VerificationQueueItem.update(
          {
            processed: true,
            processed_at: this.deps.clock(),
            outcome: result.outcome,
            confidence: result.confidence,
            claim_token: null,
            last_error: null,
          },
          { where: { id: item.id, claim_token: token } }
        );

        stats.processed += 1;
        switch (result.outcome) {
          case 'verified':
          case 'approved':
            stats.approved += 1;
            break;
          case 'skipped':
            stats.skipped += 1;
            break;
          case 'missing':
            stats.missing += 1;
            break;
          default:
            stats.pending += 1;
        }
      } catch (error) {
        stats.failed += 1;
        const exhausted = attempts >= this.config.maxAttempts;
        logger.error('Verification queue item failed', {
          itemId: item.id,
          kind: item.subject_type,
          subjectId: item.subject_id,
          attempts,
          exhausted,
          error: errorMessage(error),
        });
        await VerificationQueueItem.update(
          exhausted
            ? {
              processed: true,
              processed_at: this.deps.clock(),
              outcome: 'abandoned',
              claim_token: null,
              last_error: errorMessage(error),
            }
            : {
              claim_token: null,
              claimed_at: null,
              scheduled_at: this.retryAt(attempts),
              last_error: errorMessage(error),
            },
          { where: { id: item.id, claim_token: token } }
        );
        if (exhausted) stats.abandoned += 1;
      }
    }

    logger.info('Verification queue drained', { kind: options.kind ?? 'all', ...stats });
    return stats;
  }

  private async process(item: VerificationQueueItem, autoApprove: boolean): Promise<ProcessOutcome> {
    switch (item.subject_type) {
      case 'brand':
        return this.processBrand(item.subject_id, autoApprove);
      case 'influencer':
        return this.processInfluencer(item.subject_id, autoApprove);
    }
  }

  private async processBrand(brandId: string, autoApprove: boolean): Promise<ProcessOutcome> {
    const brand = await Brand.findByPk(brandId);
    if (!brand) return { outcome: 'missing', confidence: null };
    if (brand.verification_status === 'verified' || brand.verification_status === 'paused') {
      return { outcome: 'skipped', confidence: null };
    }

    const result = await this.deps.brands.verifyBrand(brand, autoApprove);
    return {
      outcome: result.passed && autoApprove ? 'verified' : 'pending',
      confidence: result.confidence,
    };
  }

  private async processInfluencer(influencerId: string, autoApprove: boolean): Promise<ProcessOutcome> {
    const influencer = await Influencer.findByPk(influencerId);
    if (!influencer) return { outcome: 'missing', confidence: null };
    if (influencer.verification_status === 'approved' || influencer.verification_status === 'paused') {
      return { outcome: 'skipped', confidence: null };
    }

    await this.deps.platforms.verifyInfluencerPlatforms(influencer, autoApprove);
    if (!autoApprove) return { outcome: 'pending', confidence: null };

    const approval = await this.deps.influencers.tryAutoApprove(influencer);
    return { outcome: approval.approved ? 'approved' : 'pending', confidence: null };
  }

  async pendingCount(kind?: VerificationSubjectKind): Promise<number> {
    return VerificationQueueItem.count({
      where: { processed: false, ...(kind ? { subject_type: kind } : {}) },
    });
  }
}

export const verificationQueueService = new VerificationQueueService();
