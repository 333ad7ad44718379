import { randomUUID } from 'crypto';
import { describe, expect, it, jest } from '@jest/globals';
import { useTestDatabase, createBrand, createInfluencer, createConnection } from './helpers/db';
import { VerificationQueueService } from '../services/VerificationQueueService';
import { BrandVerificationService } from '../services/BrandVerificationService';
import { PlatformVerificationService } from '../services/PlatformVerificationService';
import { InfluencerVerificationService } from '../services/InfluencerVerificationService';
import { FollowerCountService } from '../services/FollowerCountService';
import { PlatformSettingService } from '../services/PlatformSettingService';
import { VerificationQueueItem } from '../models/VerificationQueueItem';
import { Brand } from '../models/Brand';
import { Influencer } from '../models/Influencer';
import { PlatformConnection } from '../models/PlatformConnection';
import type { PlatformApiSettings } from '../config/settings';

useTestDatabase();

const NOW = new Date('2026-03-01T10:00:00Z');
const minutesLater = (minutes: number) => new Date(NOW.getTime() + minutes * 60 * 1000);
const DESCRIPTION = 'We design and sell handmade leather bags for city commuters.';

const api: PlatformApiSettings = {
  tiktok: { clientKey: '', clientSecret: '', redirectUri: '', researchApiKey: '' },
  facebook: { appId: '', appSecret: '', redirectUri: '', graphVersion: 'v18.0' },
  instagram: { accessToken: '', businessAccountId: '' },
  youtube: { apiKey: '' },
  rapidApiKey: '',
};

const QUEUE_SETTINGS = {
  minDelayMinutes: 5,
  maxDelayMinutes: 10,
  batchSize: 50,
  leaseSeconds: 300,
  maxAttempts: 3,
  retryDelayMinutes: 2,
};

const undecided = { passed: false, confidence: 0.5, hardFail: false, reason: 'Passed 2/4 checks', flags: [], checks: [] };

const buildQueue = (random: () => number = () => 0) => {
  const brands = new BrandVerificationService(0.7);
  const fetchMock = jest.fn<typeof fetch>().mockImplementation(async () =>
    new Response(JSON.stringify({ data: { user: { follower_count: 10300 } } }))
  );
  const settings = new PlatformSettingService(1000);
  const platforms = new PlatformVerificationService(
    new FollowerCountService(api, { toleranceFloor: 100, toleranceRatio: 0.05, apiTimeoutMs: 1000, scrapeTimeoutMs: 1000 }, fetchMock),
    settings,
    { connectionPassThreshold: 0.8, rejectBelow: 0.5 }
  );
  const influencers = new InfluencerVerificationService(settings);
  const queue = new VerificationQueueService(
    QUEUE_SETTINGS,
    true,
    { brands, platforms, influencers, random, clock: () => NOW }
  );
  return { queue, brands };
};

const completeBrand = () =>
  createBrand({ industry: 'Fashion', description: DESCRIPTION, contact_email: 'hello@acme.co' });

describe('VerificationQueueService', () => {
  it('picks a whole-minute delay inside the window', () => {
    expect(buildQueue(() => 0).queue.nextDelayMinutes()).toBe(5);
    expect(buildQueue(() => 0.5).queue.nextDelayMinutes()).toBe(8);
    expect(buildQueue(() => 0.999).queue.nextDelayMinutes()).toBe(10);
  });

  it('keeps one row per subject when scheduled twice', async () => {
    let random = 0;
    const { queue } = buildQueue(() => random);
    const brand = await completeBrand();

    await queue.schedule('brand', brand.id);
    random = 0.999;
    await queue.schedule('brand', brand.id);

    const items = await VerificationQueueItem.findAll();
    expect(items).toHaveLength(1);
    expect(items[0].scheduled_at.toISOString()).toBe(minutesLater(10).toISOString());
  });

  it('waits for the delay, then approves a passing brand', async () => {
    const { queue } = buildQueue();
    const brand = await completeBrand();
    await queue.schedule('brand', brand.id);

    const early = await queue.drain({ now: minutesLater(4) });
    expect(early.due).toBe(0);

    const stats = await queue.drain({ now: minutesLater(5) });
    expect(stats).toMatchObject({ due: 1, claimed: 1, processed: 1, approved: 1, failed: 0, lostClaims: 0 });

    await brand.reload();
    expect(brand.verification_status).toBe('verified');
    expect(brand.verification_confidence).toBe(0.875);

    const item = await VerificationQueueItem.findOne({ where: { subject_id: brand.id } });
    expect(item?.outcome).toBe('verified');
    expect(item?.confidence).toBe(0.875);
    expect(item?.claim_token).toBeNull();
    expect(await queue.pendingCount()).toBe(0);
  });

  it('skips verified subjects and records missing ones', async () => {
    const { queue } = buildQueue();
    const brand = await completeBrand();
    await brand.update({ verification_status: 'verified' });
    await queue.schedule('brand', brand.id);
    await queue.schedule('brand', randomUUID());

    const stats = await queue.drain({ now: minutesLater(5) });
    expect(stats).toMatchObject({ processed: 2, skipped: 1, missing: 1 });
  });

  it('does not process an item another worker claimed first', async () => {
    let random = 0;
    const { queue, brands } = buildQueue(() => random);
    const first = await completeBrand();
    const second = await completeBrand();
    await queue.schedule('brand', first.id);
    random = 0.999;
    await queue.schedule('brand', second.id);

    const drainAt = minutesLater(10);
    const verify = jest.spyOn(brands, 'verifyBrand').mockImplementation(async () => {
      await VerificationQueueItem.update(
        { claim_token: randomUUID(), claimed_at: drainAt },
        { where: { subject_id: second.id } }
      );
      return undecided;
    });

    const stats = await queue.drain({ now: drainAt });

    expect(stats).toMatchObject({ due: 2, claimed: 1, processed: 1, pending: 1, lostClaims: 1 });
    expect(verify).toHaveBeenCalledTimes(1);
  });

  it('releases the claim when processing fails so the next pass retries', async () => {
    const { queue, brands } = buildQueue();
    const brand = await completeBrand();
    await queue.schedule('brand', brand.id);
    jest.spyOn(brands, 'verifyBrand').mockRejectedValueOnce(new Error('scoring unavailable'));

    const failed = await queue.drain({ now: minutesLater(5) });
    expect(failed).toMatchObject({ claimed: 1, failed: 1, processed: 0 });

    const item = await VerificationQueueItem.findOne({ where: { subject_id: brand.id } });
    expect(item?.processed).toBeFalsy();
    expect(item?.claim_token).toBeNull();
    expect(item?.attempts).toBe(1);
    expect(item?.last_error).toBe('scoring unavailable');
    expect(item?.scheduled_at.toISOString()).toBe(minutesLater(2).toISOString());

    const retried = await queue.drain({ now: minutesLater(6) });
    expect(retried).toMatchObject({ processed: 1, approved: 1 });
    await item?.reload();
    expect(item?.attempts).toBe(2);
  });

  it('stamps each claim when it is made so a slow batch keeps its later leases', async () => {
    let clock = NOW;
    const brands = new BrandVerificationService(0.7);
    const deps = { brands, random: () => 0, clock: () => clock };
    const workerA = new VerificationQueueService(QUEUE_SETTINGS, true, deps);
    const workerB = new VerificationQueueService(QUEUE_SETTINGS, true, deps);

    const first = await completeBrand();
    const second = await completeBrand();
    await workerA.schedule('brand', first.id);
    clock = minutesLater(1);
    await workerA.schedule('brand', second.id);
    clock = minutesLater(10);

    const calls: string[] = [];
    let secondWorkerStats: unknown;
    jest.spyOn(brands, 'verifyBrand').mockImplementation(async (brand) => {
      calls.push(brand.id === first.id ? 'first' : 'second');
      if (brand.id === first.id) {
        clock = new Date(clock.getTime() + 400 * 1000);
      } else if (secondWorkerStats === undefined) {
        clock = new Date(clock.getTime() + 30 * 1000);
        secondWorkerStats = await workerB.drain();
      }
      return undecided;
    });

    const stats = await workerA.drain();

    expect(calls).toEqual(['first', 'second']);
    expect(stats).toMatchObject({ claimed: 2, processed: 2, lostClaims: 0 });
    expect(secondWorkerStats).toMatchObject({ due: 0, claimed: 0 });
  });

  it('closes an item after its last allowed attempt', async () => {
    const { queue, brands } = buildQueue();
    const brand = await completeBrand();
    await queue.schedule('brand', brand.id);
    jest.spyOn(brands, 'verifyBrand').mockRejectedValue(new Error('scoring unavailable'));

    const results = [];
    for (const minutes of [5, 7, 11, 30]) {
      results.push(await queue.drain({ now: minutesLater(minutes) }));
    }

    expect(results.map((stats) => stats.failed)).toEqual([1, 1, 1, 0]);
    expect(results.map((stats) => stats.abandoned)).toEqual([0, 0, 1, 0]);
    const item = await VerificationQueueItem.findOne({ where: { subject_id: brand.id } });
    expect(item?.processed).toBeTruthy();
    expect(item?.outcome).toBe('abandoned');
    expect(item?.attempts).toBe(3);
    expect(await queue.pendingCount()).toBe(0);
  });

  it('verifies platforms and auto-approves an eligible influencer', async () => {
    const { queue } = buildQueue();
    const influencer = await createInfluencer({ niche: 'fashion', primary_platform: 'tiktok' });
    await createConnection(influencer.id, { access_token: 'test-token' });
    await queue.schedule('influencer', influencer.id);

    const stats = await queue.drain({ now: minutesLater(5), kind: 'influencer' });

    expect(stats).toMatchObject({ processed: 1, approved: 1 });
    const connection = await PlatformConnection.findOne({ where: { influencer_id: influencer.id } });
    expect(connection?.verification_status).toBe('verified');
    expect(connection?.verified_followers_count).toBe(10300);
    expect((await Influencer.findByPk(influencer.id))?.verification_status).toBe('approved');
  });

  it('only scores when auto-approval is off', async () => {
    const { queue } = buildQueue();
    const brand = await completeBrand();
    await queue.schedule('brand', brand.id);

    const stats = await queue.drain({ now: minutesLater(5), autoApprove: false });

    expect(stats).toMatchObject({ processed: 1, pending: 1, approved: 0 });
    const stored = await Brand.findByPk(brand.id);
    expect(stored?.verification_status).toBe('pending');
    expect(stored?.verification_confidence).toBe(0.875);
  });
});
