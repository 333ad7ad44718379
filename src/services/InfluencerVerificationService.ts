import { Influencer } from '../models/Influencer';
import { PlatformConnection } from '../models/PlatformConnection';
import { logger } from '../utils/logger';
import { PlatformSettingService, platformSettingService } from './PlatformSettingService';

export interface ApprovalEvaluation {
  eligible: boolean;
  missing: string[];
}

export class InfluencerVerificationService {
  constructor(private readonly platformSettings: PlatformSettingService = platformSettingService) {}

  async hasMinimumFollowers(connections: PlatformConnection[]): Promise<boolean> {
    for (const connection of connections) {
      const minimum = await this.platformSettings.getMinimumFollowers(connection.platform);
      const count = connection.verified_followers_count ?? connection.followers_count;
      if (count >= minimum) return true;
    }
    return false;
  }

  /** Needs a verified connection that meets its minimum, a niche and a primary platform. */
  async evaluate(influencer: Influencer): Promise<ApprovalEvaluation> {
    const verified = await PlatformConnection.findAll({
      where: { influencer_id: influencer.id, verification_status: 'verified' },
    });

    const missing: string[] = [];
    if (verified.length === 0) missing.push('verified platforms');
    if (!(await this.hasMinimumFollowers(verified))) missing.push('minimum followers');
    if (!influencer.niche) missing.push('niche');
    if (!influencer.primary_platform) missing.push('primary platform');

    return { eligible: missing.length === 0, missing };
  }

  /**
   * Approve a pending influencer who meets every criterion. Anyone else is
   * left untouched for manual review.
   */
  async tryAutoApprove(influencer: Influencer): Promise<ApprovalEvaluation & { approved: boolean }> {
    if (influencer.verification_status !== 'pending') {
      return { approved: false, eligible: false, missing: [] };
    }

    const evaluation = await this.evaluate(influencer);
    if (!evaluation.eligible) {
      logger.info('Influencer needs manual review', { influencerId: influencer.id, missing: evaluation.missing });
      return { ...evaluation, approved: false };
    }

    influencer.verification_status = 'approved';
    influencer.verified_at = new Date();
    await influencer.save();
    logger.info('Influencer auto-approved', { influencerId: influencer.id });
    return { ...evaluation, approved: true };
  }
}

export const influencerVerificationService = new InfluencerVerificationService();
