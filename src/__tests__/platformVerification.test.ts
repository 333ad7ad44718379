import { describe, expect, it, jest } from '@jest/globals';
import { useTestDatabase, createInfluencer, createConnection } from './helpers/db';
import { PlatformVerificationService, MANUAL_REVIEW_FLAG } from '../services/PlatformVerificationService';
import { ConnectionService } from '../services/ConnectionService';
import { InfluencerVerificationService } from '../services/InfluencerVerificationService';
import { FollowerCountService } from '../services/FollowerCountService';
import { PlatformSettingService } from '../services/PlatformSettingService';
import type { PlatformApiSettings } from '../config/settings';

useTestDatabase();

const api: PlatformApiSettings = {
  tiktok: { clientKey: '', clientSecret: '', redirectUri: '', researchApiKey: '' },
  facebook: { appId: '', appSecret: '', redirectUri: '', graphVersion: 'v18.0' },
  instagram: { accessToken: '', businessAccountId: '' },
  youtube: { apiKey: '' },
  rapidApiKey: '',
};

/** TikTok user-info replies with `followerCount` for every request. */
const build = (followerCount = 10300) => {
  const fetchMock = jest.fn<typeof fetch>().mockImplementation(async () =>
    new Response(JSON.stringify({ data: { user: { follower_count: followerCount } } }))
  );
  const followers = new FollowerCountService(
    api,
    { toleranceFloor: 100, toleranceRatio: 0.05, apiTimeoutMs: 1000, scrapeTimeoutMs: 1000 },
    fetchMock
  );
  const platformSettings = new PlatformSettingService(1000);
  const platforms = new PlatformVerificationService(followers, platformSettings, {
    connectionPassThreshold: 0.8,
    rejectBelow: 0.5,
  });
  const connections = new ConnectionService(platforms, new InfluencerVerificationService(platformSettings));
  return { fetchMock, followers, platformSettings, platforms, connections };
};

describe('PlatformVerificationService.verifyConnection', () => {
  it('stores the score and the fetched count on a passing connection', async () => {
    const { platforms, fetchMock } = build();
    const influencer = await createInfluencer();
    const connection = await createConnection(influencer.id, { access_token: 'test-token' });

    const result = await platforms.verifyConnection(connection);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ passed: true, confidence: 1, status: 'verified', flags: [] });
    await connection.reload();
    expect(connection.verification_status).toBe('verified');
    expect(connection.verification_confidence).toBe(1);
    expect(connection.verification_flags).toEqual([]);
    expect(connection.verified_followers_count).toBe(10300);
    expect(connection.verification_method).toBe('api');
    expect(connection.verified_at).toBeInstanceOf(Date);
  });

  it('leaves a connection in the middle band pending with its flags', async () => {
    const { platforms } = build(20000);
    const influencer = await createInfluencer();
    const connection = await createConnection(influencer.id, { handle: 'creator one!', access_token: 'test-token' });

    const result = await platforms.verifyConnection(connection);

    expect(result.status).toBe('pending');
    expect(result.confidence).toBe(0.5);
    await connection.reload();
    expect(connection.verification_status).toBe('pending');
    expect(connection.verification_flags).toEqual([
      'Follower count mismatch: User provided 10,000, API shows 20,000 (difference: 10,000, 50.0%)',
      'Invalid handle format',
    ]);
    expect(connection.verified_followers_count).toBe(20000);
    expect(connection.verification_method).toBe('auto');
  });

  it('rejects a connection scoring under the floor', async () => {
    const { platforms } = build(20000);
    const influencer = await createInfluencer();
    const connection = await createConnection(influencer.id, {
      handle: 'creator one!',
      access_token: 'test-token',
      engagement_rate: 50,
    });

    const result = await platforms.verifyConnection(connection);

    expect(result.hardFail).toBe(false);
    expect(result.confidence).toBe(0.4);
    expect(result.status).toBe('rejected');
    await connection.reload();
    expect(connection.verification_status).toBe('rejected');
    expect(connection.verification_flags).toEqual([
      'Follower count mismatch: User provided 10,000, API shows 20,000 (difference: 10,000, 50.0%)',
      'Invalid handle format',
      'Unusual engagement rate: 50%',
    ]);
  });

  it('sends connections on an inactive platform to manual review', async () => {
    const { platforms, platformSettings, fetchMock } = build();
    await platformSettings.upsert('tiktok', { isActive: false });
    const influencer = await createInfluencer();
    const connection = await createConnection(influencer.id, { access_token: 'test-token' });

    const result = await platforms.verifyConnection(connection);

    expect(fetchMock).not.toHaveBeenCalled();
    expect(result).toMatchObject({ passed: false, confidence: 0, status: 'pending', flags: [MANUAL_REVIEW_FLAG] });
    await connection.reload();
    expect(connection.verification_status).toBe('pending');
    expect(connection.verification_flags).toEqual(['Requires manual review']);
    expect(connection.verification_confidence).toBe(0);
  });

  it('marks the connection failed when verification throws', async () => {
    const { platforms, followers } = build();
    jest.spyOn(followers, 'check').mockRejectedValue(new Error('lookup crashed'));
    const influencer = await createInfluencer();
    const connection = await createConnection(influencer.id);

    const result = await platforms.verifyConnection(connection);

    expect(result).toMatchObject({ status: 'failed', confidence: 0, flags: ['Verification error: lookup crashed'] });
    await connection.reload();
    expect(connection.verification_status).toBe('failed');
    expect(connection.verification_flags).toEqual(['Verification error: lookup crashed']);
  });

  it('keeps the status when auto-approval is off', async () => {
    const { platforms } = build();
    const influencer = await createInfluencer();
    const connection = await createConnection(influencer.id, { access_token: 'test-token' });

    const result = await platforms.verifyConnection(connection, false);

    expect(result.passed).toBe(true);
    expect(result.status).toBe('pending');
    await connection.reload();
    expect(connection.verification_status).toBe('pending');
    expect(connection.verification_confidence).toBe(1);
    expect(connection.verified_at).toBeNull();
  });
});

describe('PlatformVerificationService.batchVerifyPending', () => {
  const seed = async () => {
    const passing = await createInfluencer();
    const middling = await createInfluencer();
    const tooSmall = await createInfluencer();
    await createConnection(passing.id, { access_token: 'test-token' });
    await createConnection(middling.id, { handle: 'creator one!', access_token: 'test-token' });
    await createConnection(tooSmall.id, { followers_count: 500 });
  };

  it('counts each outcome', async () => {
    const { platforms } = build();
    await seed();

    expect(await platforms.batchVerifyPending()).toEqual({
      totalProcessed: 3,
      autoApproved: 1,
      flagged: 1,
      rejected: 1,
      failed: 0,
    });
  });

  it('counts nothing as approved when auto-approval is off', async () => {
    const { platforms } = build();
    await seed();

    expect(await platforms.batchVerifyPending(100, false)).toEqual({
      totalProcessed: 3,
      autoApproved: 0,
      flagged: 3,
      rejected: 0,
      failed: 0,
    });
  });

  it('counts failures separately', async () => {
    const { platforms, followers } = build();
    jest.spyOn(followers, 'check').mockRejectedValue(new Error('lookup crashed'));
    const influencer = await createInfluencer();
    await createConnection(influencer.id);

    expect(await platforms.batchVerifyPending()).toEqual({
      totalProcessed: 1,
      autoApproved: 0,
      flagged: 0,
      rejected: 0,
      failed: 1,
    });
  });
});

describe('PlatformVerificationService.flagSuspiciousConnections', () => {
  it('lists verified connections with implausible engagement, largest first', async () => {
    const { platforms } = build();
    const connectionFor = async (values: Record<string, unknown>) =>
      createConnection((await createInfluencer()).id, values);

    const small = await connectionFor({ verification_status: 'verified', followers_count: 5000, engagement_rate: 0.05 });
    const large = await connectionFor({ verification_status: 'verified', followers_count: 2_000_000, engagement_rate: 0.3 });
    await connectionFor({ verification_status: 'verified', followers_count: 5000, engagement_rate: 2 });
    await connectionFor({ verification_status: 'verified', followers_count: 5000, engagement_rate: 0.3 });
    await connectionFor({ verification_status: 'verified', followers_count: 5000, engagement_rate: 0 });
    await connectionFor({ verification_status: 'pending', followers_count: 5000, engagement_rate: 0.01 });

    const flagged = await platforms.flagSuspiciousConnections();

    expect(flagged.map((c) => c.id)).toEqual([large.id, small.id]);
  });
});

describe('ConnectionService.update', () => {
  it('sends a changed connection back to pending', async () => {
    const { connections } = build();
    const influencer = await createInfluencer();
    const connection = await createConnection(influencer.id, {
      verification_status: 'verified',
      verified_at: new Date('2026-03-01T10:00:00Z'),
    });

    const updated = await connections.update(influencer.id, connection.id, { followersCount: 12000 });

    expect(updated.verification_status).toBe('pending');
    expect(updated.verified_at).toBeNull();
    await connection.reload();
    expect(connection.followers_count).toBe(12000);
    expect(connection.verification_status).toBe('pending');
  });

  it('leaves a connection verified when nothing changed', async () => {
    const { connections } = build();
    const influencer = await createInfluencer();
    const connection = await createConnection(influencer.id, { verification_status: 'verified' });

    const updated = await connections.update(influencer.id, connection.id, { handle: ' creator.one ' });

    expect(updated.verification_status).toBe('verified');
  });

  it('refuses another influencer connection', async () => {
    const { connections } = build();
    const owner = await createInfluencer();
    const other = await createInfluencer();
    const connection = await createConnection(owner.id);

    await expect(connections.update(other.id, connection.id, { followersCount: 1 })).rejects.toMatchObject({
      statusCode: 404,
    });
  });
});
