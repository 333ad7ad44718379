import { afterAll, beforeEach } from '@jest/globals';
import { sequelize } from '../../config/database';
import { User, UserRole } from '../../models/User';
import { Currency } from '../../models/Currency';
import { Brand } from '../../models/Brand';
import { Influencer } from '../../models/Influencer';
import { PlatformConnection } from '../../models/PlatformConnection';
import { Campaign } from '../../models/Campaign';
import { Submission, SubmissionStatus } from '../../models/Submission';
import { Payout, PayoutStatus } from '../../models/Payout';

/** Fresh in-memory schema for every test. */
export const useTestDatabase = () => {
  beforeEach(async () => {
    await sequelize.sync({ force: true });
  });

  afterAll(async () => {
    await sequelize.close();
  });
};

let sequence = 0;

export const createUser = async (role: UserRole, values: Record<string, unknown> = {}) => {
  sequence += 1;
  return User.create({
    email: `user${sequence}@example.com`,
    username: `user${sequence}`,
    password_hash: 'scrypt$placeholder',
    role,
    email_verified: true,
    ...values,
  });
};

export const createCurrency = async (code: string, exchangeRate: number, isDefault = false) =>
  Currency.create({ code, name: code, symbol: code, exchange_rate: exchangeRate, is_default: isDefault, is_active: true });

export const createBrand = async (values: Record<string, unknown> = {}) => {
  const user = await createUser('brand');
  return Brand.create({ user_id: user.id, company_name: 'Acme Studios', ...values });
};

export const createInfluencer = async (values: Record<string, unknown> = {}) => {
  const user = await createUser('influencer');
  return Influencer.create({ user_id: user.id, display_name: 'Creator One', ...values });
};

export const createConnection = async (influencerId: string, values: Record<string, unknown> = {}) =>
  PlatformConnection.create({
    influencer_id: influencerId,
    platform: 'tiktok',
    handle: 'creator.one',
    followers_count: 10000,
    ...values,
  });

export const createCampaign = async (brandId: string, values: Record<string, unknown> = {}) =>
  Campaign.create({
    brand_id: brandId,
    title: 'Spring launch',
    platform: 'tiktok',
    budget: 500,
    package_videos: 5,
    currency: 'USD',
    status: 'active',
    ...values,
  });

/** A campaign, submission and payout for one influencer. */
export const createJob = async (
  brandId: string,
  influencerId: string,
  job: { submissionStatus: SubmissionStatus; amount: number; dueDate: string; payoutStatus?: PayoutStatus; currency?: string }
) => {
  const campaign = await createCampaign(brandId);
  const submission = await Submission.create({
    campaign_id: campaign.id,
    influencer_id: influencerId,
    status: job.submissionStatus,
  });
  const payout = await Payout.create({
    submission_id: submission.id,
    influencer_id: influencerId,
    amount: job.amount,
    currency: job.currency ?? 'USD',
    due_date: job.dueDate,
    status: job.payoutStatus ?? 'pending',
  });
  return { campaign, submission, payout };
};
