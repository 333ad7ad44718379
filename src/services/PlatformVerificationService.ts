import { Op } from 'sequelize';
import { PlatformConnection, ConnectionVerificationStatus } from '../models/PlatformConnection';
import { Influencer } from '../models/Influencer';
import { settings, VerificationSettings } from '../config/settings';
import { logger, errorMessage } from '../utils/logger';
import { aggregate, binaryCheck, CheckResult, ScoredResult } from '../utils/scoring';
import { FollowerCheckResult, FollowerCountService, followerCountService } from './FollowerCountService';
import { PlatformSettingService, platformSettingService } from './PlatformSettingService';
import type { SupportedPlatform } from '../types/platform';

interface PlatformRules {
  label: string;
  handlePattern: RegExp;
  handleFlag: string;
  sampleDomains: readonly string[];
  /** Declared counts at or above this need a human look. */
  reviewAbove?: number;
  /** Plausible engagement rate range, in percent. */
  engagementRange?: readonly [number, number];
}

export const PLATFORM_RULES: Record<SupportedPlatform, PlatformRules> = {
  tiktok: {
    label: 'TikTok',
    handlePattern: /^[a-zA-Z0-9._]+$/,
    handleFlag: 'Invalid handle format',
    sampleDomains: ['tiktok.com'],
    reviewAbove: 1_000_000,
    engagementRange: [0.5, 10],
  },
  instagram: {
    label: 'Instagram',
    handlePattern: /^[a-zA-Z0-9._]+$/,
    handleFlag: 'Invalid handle format',
    sampleDomains: ['instagram.com'],
    engagementRange: [0.5, 8],
  },
  youtube: {
    label: 'YouTube',
    handlePattern: /^[a-zA-Z0-9._-]+$/,
    handleFlag: 'Invalid channel handle format',
    sampleDomains: ['youtube.com', 'youtu.be'],
  },
  facebook: {
    label: 'Facebook',
    handlePattern: /^[a-zA-Z0-9._]+$/,
    handleFlag: 'Invalid handle format',
    sampleDomains: ['facebook.com'],
  },
};

export const UNVERIFIABLE_FLAG = 'Unable to verify follower count via API - requires manual review';
export const MANUAL_REVIEW_FLAG = 'Requires manual review';

export interface ConnectionFacts {
  platform: SupportedPlatform;
  handle: string;
  followersCount: number;
  engagementRate?: number | null;
  samplePostUrl?: string | null;
}

export interface ConnectionVerificationResult extends ScoredResult {
  status: ConnectionVerificationStatus;
  followerCheck: FollowerCheckResult | null;
}

export interface BatchVerificationStats {
  totalProcessed: number;
  autoApproved: number;
  flagged: number;
  rejected: number;
  failed: number;
}

const fmt = (n: number) => n.toLocaleString('en-US');

const followerCheckOutcome = (result: FollowerCheckResult): CheckResult => {
  switch (result.status) {
    case 'verified':
      return binaryCheck('follower_cross_check', true, '');
    case 'mismatch': {
      const actual = result.actualCount ?? 0;
      const discrepancy = result.discrepancy ?? 0;
      const pct = actual > 0 ? ((discrepancy / actual) * 100).toFixed(1) : '0.0';
      return binaryCheck(
        'follower_cross_check',
        false,
        `Follower count mismatch: User provided ${fmt(result.declaredCount)}, API shows ${fmt(actual)} (difference: ${fmt(discrepancy)}, ${pct}%)`
      );
    }
    case 'unverifiable':
      return binaryCheck('follower_cross_check', false, UNVERIFIABLE_FLAG);
  }
};

/**
 * Run the rule battery for one connection. The follower cross-check is
 * computed by the caller; everything else is a pure function of the facts.
 */
export const scoreConnection = (
  facts: ConnectionFacts,
  followerCheck: FollowerCheckResult,
  minimumFollowers: number,
  passThreshold: number
): ScoredResult => {
  const rules = PLATFORM_RULES[facts.platform];
  const handle = facts.handle.trim().replace(/^@/, '');
  const countToCheck = followerCheck.actualCount ?? facts.followersCount;

  const checks: CheckResult[] = [
    followerCheckOutcome(followerCheck),
    binaryCheck(
      'minimum_followers',
      countToCheck >= minimumFollowers,
      `Follower count (${fmt(countToCheck)}) below minimum (${fmt(minimumFollowers)})`,
      true
    ),
    binaryCheck('handle_format', handle.length > 0 && rules.handlePattern.test(handle), rules.handleFlag),
  ];

  if (facts.samplePostUrl) {
    const url = facts.samplePostUrl.toLowerCase();
    checks.push(
      binaryCheck(
        'sample_post_domain',
        rules.sampleDomains.some((domain) => url.includes(domain)),
        `Sample post URL doesn't appear to be from ${rules.label}`
      )
    );
  }

  if (rules.reviewAbove !== undefined) {
    checks.push(
      binaryCheck(
        'follower_reasonableness',
        facts.followersCount < rules.reviewAbove,
        'Very high follower count - manual review recommended'
      )
    );
  }

  if (rules.engagementRange && facts.engagementRate && facts.engagementRate > 0) {
    const [low, high] = rules.engagementRange;
    checks.push(
      binaryCheck(
        'engagement_rate',
        facts.engagementRate >= low && facts.engagementRate <= high,
        `Unusual engagement rate: ${facts.engagementRate}%`
      )
    );
  }

  return aggregate(checks, passThreshold);
};

/** Verified on pass, rejected on hard fail or low confidence, pending otherwise. */
export const decideConnectionStatus = (result: ScoredResult, rejectBelow: number): ConnectionVerificationStatus => {
  if (result.passed) return 'verified';
  if (result.hardFail || result.confidence < rejectBelow) return 'rejected';
  return 'pending';
};

type EngineSettings = Pick<VerificationSettings, 'connectionPassThreshold' | 'rejectBelow'>;

export class PlatformVerificationService {
  constructor(
    private readonly followers: FollowerCountService = followerCountService,
    private readonly platformSettings: PlatformSettingService = platformSettingService,
    private readonly config: EngineSettings = settings.verification
  ) {}

  /**
   * Score a connection and persist the outcome. With `autoApprove` the
   * connection moves to the decided status; without it only the score and
   * flags are stored. Internal errors leave the connection `failed`.
   */
  async verifyConnection(connection: PlatformConnection, autoApprove = true): Promise<ConnectionVerificationResult> {
    const now = new Date();

    if (!(await this.platformSettings.isActive(connection.platform))) {
      connection.verification_flags = [MANUAL_REVIEW_FLAG];
      connection.verification_confidence = 0;
      connection.last_verification_attempt = now;
      await connection.save();
      return {
        passed: false,
        confidence: 0,
        hardFail: false,
        reason: 'No automated verification for this platform',
        flags: [MANUAL_REVIEW_FLAG],
        checks: [],
        status: connection.verification_status,
        followerCheck: null,
      };
    }

    try {
      const followerCheck = await this.followers.check({
        platform: connection.platform,
        handle: connection.handle,
        declaredCount: connection.followers_count,
        credentials: {
          accessToken: connection.access_token,
          platformUserId: connection.platform_user_id,
        },
      });
      const minimum = await this.platformSettings.getMinimumFollowers(connection.platform);
      const scored = scoreConnection(
        {
          platform: connection.platform,
          handle: connection.handle,
          followersCount: connection.followers_count,
          engagementRate: connection.engagement_rate,
          samplePostUrl: connection.sample_post_url,
        },
        followerCheck,
        minimum,
        this.config.connectionPassThreshold
      );

      const status = autoApprove ? decideConnectionStatus(scored, this.config.rejectBelow) : connection.verification_status;

      if (followerCheck.actualCount !== null) {
        connection.verified_followers_count = followerCheck.actualCount;
      }
      connection.verification_confidence = scored.confidence;
      connection.verification_flags = scored.flags;
      connection.verification_method = followerCheck.status === 'verified' ? 'api' : 'auto';
      connection.last_verification_attempt = now;
      connection.verification_status = status;
      if (status === 'verified') connection.verified_at = now;
      await connection.save();

      logger.info('Platform connection verified', {
        connectionId: connection.id,
        platform: connection.platform,
        confidence: scored.confidence,
        status,
        flags: scored.flags,
      });

      return { ...scored, status, followerCheck };
    } catch (error) {
      logger.error('Platform connection verification failed', {
        connectionId: connection.id,
        platform: connection.platform,
        error: errorMessage(error),
      });
      const flags = [`Verification error: ${errorMessage(error)}`];
      connection.verification_status = 'failed';
      connection.verification_flags = flags;
      connection.last_verification_attempt = now;
      await connection.save();
      return {
        passed: false,
        confidence: 0,
        hardFail: false,
        reason: 'Verification could not be completed',
        flags,
        checks: [],
        status: 'failed',
        followerCheck: null,
      };
    }
  }

  async verifyInfluencerPlatforms(influencer: Influencer, autoApprove = true) {
    const pending = await PlatformConnection.findAll({
      where: { influencer_id: influencer.id, verification_status: 'pending' },
    });
    const results: Partial<Record<SupportedPlatform, ConnectionVerificationResult>> = {};
    for (const connection of pending) {
      results[connection.platform] = await this.verifyConnection(connection, autoApprove);
    }
    return results;
  }

  async batchVerifyPending(limit = 100, autoApprove = true): Promise<BatchVerificationStats> {
    const pending = await PlatformConnection.findAll({
      where: { verification_status: 'pending' },
      order: [['created_at', 'ASC']],
      limit,
    });

    const stats: BatchVerificationStats = { totalProcessed: 0, autoApproved: 0, flagged: 0, rejected: 0, failed: 0 };
    for (const connection of pending) {
      stats.totalProcessed += 1;
      const result = await this.verifyConnection(connection, autoApprove);
      if (result.status === 'failed') stats.failed += 1;
      else if (result.status === 'verified') stats.autoApproved += 1;
      else if (result.status === 'rejected') stats.rejected += 1;
      else stats.flagged += 1;
    }

    logger.info('Batch connection verification complete', { ...stats });
    return stats;
  }

  /**
   * Verified connections whose engagement looks inconsistent with their
   * audience: under 0.5 % with a million or more followers, or under 0.1 %.
   */
  async flagSuspiciousConnections(): Promise<PlatformConnection[]> {
    return PlatformConnection.findAll({
      where: {
        verification_status: 'verified',
        engagement_rate: { [Op.gt]: 0 },
        [Op.or]: [
          { followers_count: { [Op.gte]: 1_000_000 }, engagement_rate: { [Op.lt]: 0.5 } },
          { engagement_rate: { [Op.lt]: 0.1 } },
        ],
      },
      order: [['followers_count', 'DESC']],
    });
  }
}

export const platformVerificationService = new PlatformVerificationService();
