import { sequelize } from '../config/database';
import { settings } from '../config/settings';
import { Campaign } from '../models/Campaign';
import { Influencer } from '../models/Influencer';
import { PlatformConnection } from '../models/PlatformConnection';
import { Submission, SubmissionStatus } from '../models/Submission';
import { Payout } from '../models/Payout';
import { AppError } from '../utils/AppError';
import { addDays, roundMoney, toAmount, toDateOnly } from '../utils';
import { logger } from '../utils/logger';
import { CurrencyService, currencyService } from './CurrencyService';
import { PlatformSettingService, platformSettingService } from './PlatformSettingService';

export type ReviewDecision = 'approve' | 'reject' | 'flag';

const REVIEW_OUTCOME: Record<ReviewDecision, SubmissionStatus> = {
  approve: 'verified',
  reject: 'needs_reupload',
  flag: 'flagged',
};

export interface AcceptedJob {
  submission: Submission;
  payout: Payout;
}

export class JobService {
  constructor(
    private readonly currencies: CurrencyService = currencyService,
    private readonly platformSettings: PlatformSettingService = platformSettingService,
    private readonly payoutDueDays: number = settings.currency.payoutDueDays,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /** Per-video share of the budget, in the campaign's currency. */
  perVideoAmount(campaign: Campaign): number {
    const budget = toAmount(campaign.budget);
    return campaign.package_videos > 0 ? budget / campaign.package_videos : budget;
  }

  /**
   * Accept an active campaign. The submission and its pending payout are
   * created together; the payout is priced in the influencer's currency.
   */
  async acceptJob(influencerId: string, campaignId: string): Promise<AcceptedJob> {
    const t = await sequelize.transaction();
    try {
      const influencer = await Influencer.findByPk(influencerId, { transaction: t });
      if (!influencer) throw new AppError('Influencer not found', 404);
      if (influencer.verification_status !== 'approved') {
        throw new AppError('Influencer is not approved for jobs', 403, 'INFLUENCER_NOT_APPROVED');
      }

      const campaign = await Campaign.findByPk(campaignId, { transaction: t, lock: t.LOCK.UPDATE });
      if (!campaign || campaign.status !== 'active') throw new AppError('Campaign not found', 404);

      const existing = await Submission.findOne({
        where: { campaign_id: campaign.id, influencer_id: influencer.id },
        transaction: t,
      });
      if (existing) throw new AppError('Job already accepted', 409, 'ALREADY_ACCEPTED');

      const connection = await PlatformConnection.findOne({
        where: { influencer_id: influencer.id, platform: campaign.platform, verification_status: 'verified' },
        transaction: t,
      });
      if (!connection) {
        throw new AppError(`A verified ${campaign.platform} connection is required`, 403, 'PLATFORM_NOT_VERIFIED');
      }
      const minimum = await this.platformSettings.getMinimumFollowers(campaign.platform);
      const followers = connection.verified_followers_count ?? connection.followers_count;
      if (followers < minimum) {
        throw new AppError(
          `At least ${minimum} followers are required, found ${followers}`,
          403,
          'BELOW_MINIMUM_FOLLOWERS'
        );
      }

      const campaignCurrency = campaign.currency
        ? await this.currencies.findByCode(campaign.currency, t)
        : await this.currencies.getDefault(t);
      const settlementCurrency =
        (await this.currencies.findById(influencer.currency_id, t)) ?? (await this.currencies.getDefault(t));
      const amount = roundMoney(await this.currencies.convert(this.perVideoAmount(campaign), campaignCurrency, settlementCurrency, t));
      const currencyCode = settlementCurrency?.code ?? campaign.currency ?? (await this.currencies.getDefaultCode(t));

      const submission = await Submission.create({
        campaign_id: campaign.id,
        influencer_id: influencer.id,
        status: 'new',
      }, { transaction: t });

      const payout = await Payout.create({
        submission_id: submission.id,
        influencer_id: influencer.id,
        amount,
        currency: currencyCode,
        due_date: campaign.due_date ?? toDateOnly(addDays(this.clock(), this.payoutDueDays)),
        status: 'pending',
      }, { transaction: t });

      await t.commit();
      logger.info('Job accepted', { campaignId: campaign.id, influencerId: influencer.id, amount, currency: currencyCode });
      return { submission, payout };
    } catch (e) {
      await t.rollback();
      throw e;
    }
  }

  async submitProof(submissionId: string, influencerId: string, proofUrl: string, notes?: string | null): Promise<Submission> {
    const submission = await Submission.findByPk(submissionId);
    if (!submission || submission.influencer_id !== influencerId) throw new AppError('Submission not found', 404);
    if (submission.status !== 'new' && submission.status !== 'needs_reupload') {
      throw new AppError(`Cannot submit proof for a ${submission.status} submission`, 409, 'INVALID_STATUS');
    }

    submission.proof_url = proofUrl;
    submission.notes = notes ?? submission.notes ?? null;
    submission.status = 'in_review';
    submission.submitted_at = this.clock();
    return submission.save();
  }

  async reviewSubmission(submissionId: string, decision: ReviewDecision, reviewNotes?: string | null): Promise<Submission> {
    const submission = await Submission.findByPk(submissionId);
    if (!submission) throw new AppError('Submission not found', 404);
    if (submission.status !== 'in_review' && submission.status !== 'flagged') {
      throw new AppError(`Cannot review a ${submission.status} submission`, 409, 'INVALID_STATUS');
    }

    submission.status = REVIEW_OUTCOME[decision];
    submission.review_notes = reviewNotes ?? null;
    submission.reviewed_at = this.clock();
    await submission.save();
    logger.info('Submission reviewed', { submissionId, decision, status: submission.status });
    return submission;
  }

  async listForInfluencer(influencerId: string) {
    return Submission.findAll({
      where: { influencer_id: influencerId },
      include: [Campaign, Payout],
      order: [['created_at', 'DESC']],
    });
  }
}

export const jobService = new JobService();
