import { PlatformConnection } from '../models/PlatformConnection';
import { Influencer } from '../models/Influencer';
import { AppError } from '../utils/AppError';
import { logger } from '../utils/logger';
import { PlatformVerificationService, platformVerificationService, ConnectionVerificationResult } from './PlatformVerificationService';
import { InfluencerVerificationService, influencerVerificationService } from './InfluencerVerificationService';
import type { SupportedPlatform } from '../types/platform';

export interface ConnectionInput {
  platform: SupportedPlatform;
  handle: string;
  followersCount: number;
  engagementRate?: number | null;
  samplePostUrl?: string | null;
  profileUrl?: string | null;
}

export interface OAuthConnectionInput {
  platform: SupportedPlatform;
  handle: string;
  followersCount: number;
  platformUserId: string;
  accessToken: string;
  refreshToken?: string | null;
  tokenExpiresAt?: Date | null;
}

export interface VerifyOutcome {
  connection: PlatformConnection;
  result: ConnectionVerificationResult;
  influencerApproved: boolean;
}

export class ConnectionService {
  constructor(
    private readonly verification: PlatformVerificationService = platformVerificationService,
    private readonly approvals: InfluencerVerificationService = influencerVerificationService
  ) {}

  async list(influencerId: string) {
    return PlatformConnection.findAll({ where: { influencer_id: influencerId }, order: [['platform', 'ASC']] });
  }

  private async find(influencerId: string, connectionId: string): Promise<PlatformConnection> {
    const connection = await PlatformConnection.findByPk(connectionId);
    if (!connection || connection.influencer_id !== influencerId) throw new AppError('Connection not found', 404);
    return connection;
  }

  /** Manually declared account; verification runs from the queue or on request. */
  async add(influencerId: string, input: ConnectionInput): Promise<PlatformConnection> {
    const existing = await PlatformConnection.findOne({ where: { influencer_id: influencerId, platform: input.platform } });
    if (existing) throw new AppError(`A ${input.platform} account is already connected`, 409, 'ALREADY_CONNECTED');
    return PlatformConnection.create({
      influencer_id: influencerId,
      platform: input.platform,
      handle: input.handle.trim(),
      followers_count: input.followersCount,
      engagement_rate: input.engagementRate ?? null,
      sample_post_url: input.samplePostUrl ?? null,
      profile_url: input.profileUrl ?? null,
      verification_status: 'pending',
    });
  }

  /** Changing what was declared sends the connection back for verification. */
  async update(influencerId: string, connectionId: string, input: Partial<Omit<ConnectionInput, 'platform'>>) {
    const connection = await this.find(influencerId, connectionId);
    if (input.handle !== undefined) connection.handle = input.handle.trim();
    if (input.followersCount !== undefined) connection.followers_count = input.followersCount;
    if (input.engagementRate !== undefined) connection.engagement_rate = input.engagementRate;
    if (input.samplePostUrl !== undefined) connection.sample_post_url = input.samplePostUrl;
    if (input.profileUrl !== undefined) connection.profile_url = input.profileUrl;
    if (connection.changed()) {
      connection.verification_status = 'pending';
      connection.verified_at = null;
    }
    return connection.save();
  }

  async remove(influencerId: string, connectionId: string): Promise<void> {
    const connection = await this.find(influencerId, connectionId);
    await connection.destroy();
  }

  /** Upsert from an OAuth callback. The stored tokens feed the follower check. */
  async upsertFromOAuth(influencerId: string, input: OAuthConnectionInput): Promise<PlatformConnection> {
    const values = {
      handle: input.handle,
      followers_count: input.followersCount,
      platform_user_id: input.platformUserId,
      access_token: input.accessToken,
      refresh_token: input.refreshToken ?? null,
      token_expires_at: input.tokenExpiresAt ?? null,
      verification_status: 'pending' as const,
    };
    const existing = await PlatformConnection.findOne({ where: { influencer_id: influencerId, platform: input.platform } });
    if (existing) return existing.update(values);
    return PlatformConnection.create({ influencer_id: influencerId, platform: input.platform, ...values });
  }

  /**
   * Verify now instead of waiting for the queue. A verified connection may
   * complete the influencer's approval.
   */
  async verify(connection: PlatformConnection, autoApprove = true): Promise<VerifyOutcome> {
    const result = await this.verification.verifyConnection(connection, autoApprove);

    let influencerApproved = false;
    if (result.status === 'verified') {
      const influencer = await Influencer.findByPk(connection.influencer_id);
      if (influencer) influencerApproved = (await this.approvals.tryAutoApprove(influencer)).approved;
    }
    logger.info('Connection verification requested', {
      connectionId: connection.id,
      status: result.status,
      influencerApproved,
    });
    return { connection, result, influencerApproved };
  }

  async verifyById(influencerId: string, connectionId: string): Promise<VerifyOutcome> {
    return this.verify(await this.find(influencerId, connectionId));
  }
}

export const connectionService = new ConnectionService();
