import { describe, expect, it } from '@jest/globals';
import {
  useTestDatabase,
  createBrand,
  createCampaign,
  createConnection,
  createCurrency,
  createInfluencer,
} from './helpers/db';
import { JobService } from '../services/JobService';
import { CurrencyService } from '../services/CurrencyService';
import { PlatformSettingService } from '../services/PlatformSettingService';
import { Submission } from '../models/Submission';
import { Payout } from '../models/Payout';
import { toAmount } from '../utils';

useTestDatabase();

const setup = async () => {
  await createCurrency('USD', 1, true);
  const ghs = await createCurrency('GHS', 0.08);
  const brand = await createBrand();
  const influencer = await createInfluencer({ verification_status: 'approved', currency_id: ghs.id });
  await createConnection(influencer.id, { verification_status: 'verified', verified_followers_count: 10300 });
  const platformSettings = new PlatformSettingService(1000);
  const jobs = new JobService(new CurrencyService('USD'), platformSettings, 30, () => new Date('2026-03-01T00:00:00Z'));
  return { brand, influencer, platformSettings, jobs };
};

describe('JobService', () => {
  it('creates a submission and a payout priced in the influencer currency', async () => {
    const { brand, influencer, jobs } = await setup();
    const campaign = await createCampaign(brand.id, { due_date: '2026-04-30' });

    const { submission, payout } = await jobs.acceptJob(influencer.id, campaign.id);

    expect(submission.status).toBe('new');
    expect(toAmount(payout.amount)).toBe(1250);
    expect(payout.currency).toBe('GHS');
    expect(payout.due_date).toBe('2026-04-30');
    expect(payout.status).toBe('pending');
  });

  it('falls back to the configured payout window without a campaign due date', async () => {
    const { brand, influencer, jobs } = await setup();
    const campaign = await createCampaign(brand.id);

    const { payout } = await jobs.acceptJob(influencer.id, campaign.id);

    expect(payout.due_date).toBe('2026-03-31');
  });

  it('accepts a campaign only once per influencer', async () => {
    const { brand, influencer, jobs } = await setup();
    const campaign = await createCampaign(brand.id);
    await jobs.acceptJob(influencer.id, campaign.id);

    await expect(jobs.acceptJob(influencer.id, campaign.id)).rejects.toMatchObject({ statusCode: 409, code: 'ALREADY_ACCEPTED' });
    expect(await Payout.count()).toBe(1);
  });

  it('requires an approved influencer', async () => {
    const { brand, influencer, jobs } = await setup();
    await influencer.update({ verification_status: 'pending' });
    const campaign = await createCampaign(brand.id);

    await expect(jobs.acceptJob(influencer.id, campaign.id)).rejects.toMatchObject({ statusCode: 403, code: 'INFLUENCER_NOT_APPROVED' });
  });

  it('requires a verified connection on the campaign platform', async () => {
    const { brand, influencer, jobs } = await setup();
    const campaign = await createCampaign(brand.id, { platform: 'youtube' });

    await expect(jobs.acceptJob(influencer.id, campaign.id)).rejects.toMatchObject({ statusCode: 403, code: 'PLATFORM_NOT_VERIFIED' });
  });

  it('applies the platform minimum to the verified count', async () => {
    const { brand, influencer, platformSettings, jobs } = await setup();
    await platformSettings.upsert('tiktok', { minimumFollowers: 20000 });
    const campaign = await createCampaign(brand.id);

    await expect(jobs.acceptJob(influencer.id, campaign.id)).rejects.toMatchObject({
      code: 'BELOW_MINIMUM_FOLLOWERS',
      message: 'At least 20000 followers are required, found 10300',
    });
    expect(await Submission.count()).toBe(0);
  });

  it('does not offer inactive campaigns', async () => {
    const { brand, influencer, jobs } = await setup();
    const campaign = await createCampaign(brand.id, { status: 'paused' });

    await expect(jobs.acceptJob(influencer.id, campaign.id)).rejects.toMatchObject({ statusCode: 404 });
  });

  it('moves a submission through proof and review', async () => {
    const { brand, influencer, jobs } = await setup();
    const campaign = await createCampaign(brand.id);
    const { submission } = await jobs.acceptJob(influencer.id, campaign.id);

    const submitted = await jobs.submitProof(submission.id, influencer.id, 'https://www.tiktok.com/@creator.one/video/1');
    expect(submitted.status).toBe('in_review');
    await expect(
      jobs.submitProof(submission.id, influencer.id, 'https://www.tiktok.com/@creator.one/video/2')
    ).rejects.toMatchObject({ statusCode: 409, code: 'INVALID_STATUS' });

    expect((await jobs.reviewSubmission(submission.id, 'reject', 'Logo not visible')).status).toBe('needs_reupload');
    await jobs.submitProof(submission.id, influencer.id, 'https://www.tiktok.com/@creator.one/video/3');
    const approved = await jobs.reviewSubmission(submission.id, 'approve');
    expect(approved.status).toBe('verified');
    expect(approved.review_notes).toBeNull();
    await expect(jobs.reviewSubmission(submission.id, 'flag')).rejects.toMatchObject({ code: 'INVALID_STATUS' });
  });

  it("refuses proof for someone else's submission", async () => {
    const { brand, influencer, jobs } = await setup();
    const other = await createInfluencer();
    const campaign = await createCampaign(brand.id);
    const { submission } = await jobs.acceptJob(influencer.id, campaign.id);

    await expect(jobs.submitProof(submission.id, other.id, 'https://www.tiktok.com/v/1')).rejects.toMatchObject({ statusCode: 404 });
  });
});
