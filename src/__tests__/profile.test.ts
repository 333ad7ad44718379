import { describe, expect, it } from '@jest/globals';
import { useTestDatabase, createBrand, createConnection, createCurrency, createInfluencer } from './helpers/db';
import { ProfileService, isBrandProfileComplete } from '../services/ProfileService';
import { VerificationQueueItem } from '../models/VerificationQueueItem';

useTestDatabase();

describe('ProfileService brands', () => {
  it('queues verification once the profile is complete', async () => {
    const profiles = new ProfileService();
    const brand = await createBrand();

    const partial = await profiles.updateBrand(brand.user_id, { description: 'Outdoor gear' });
    expect(partial.verificationScheduled).toBe(false);

    const complete = await profiles.updateBrand(brand.user_id, { industry: 'Retail' });
    expect(complete.verificationScheduled).toBe(true);

    const items = await VerificationQueueItem.findAll({ where: { subject_type: 'brand', subject_id: brand.id } });
    expect(items).toHaveLength(1);
  });

  it('sends a request_info brand back to pending', async () => {
    const profiles = new ProfileService();
    const brand = await createBrand({ industry: 'Retail', verification_status: 'request_info' });

    const { brand: updated, verificationScheduled } = await profiles.updateBrand(brand.user_id, { website: 'https://acme.example' });

    expect(updated.verification_status).toBe('pending');
    expect(verificationScheduled).toBe(true);
  });

  it('does not queue verified brands', async () => {
    const profiles = new ProfileService();
    const brand = await createBrand({ industry: 'Retail', verification_status: 'verified' });

    const { verificationScheduled } = await profiles.updateBrand(brand.user_id, { description: 'New copy' });

    expect(verificationScheduled).toBe(false);
    expect(await VerificationQueueItem.count()).toBe(0);
  });

  it('rejects currencies that are not set up', async () => {
    const profiles = new ProfileService();
    const brand = await createBrand();
    await createCurrency('USD', 1, true);

    await expect(profiles.updateBrand(brand.user_id, { currencyCode: 'XYZ' })).rejects.toThrow('Unsupported currency: XYZ');
  });

  it('treats blank names and industries as incomplete', () => {
    expect(isBrandProfileComplete({ company_name: 'Acme', industry: '  ' })).toBe(false);
    expect(isBrandProfileComplete({ company_name: 'Acme', industry: 'Retail' })).toBe(true);
  });
});

describe('ProfileService influencers', () => {
  it('requires a connected platform to finish onboarding', async () => {
    const profiles = new ProfileService();
    const influencer = await createInfluencer();

    await expect(
      profiles.completeInfluencerOnboarding(influencer.user_id, { niche: 'fitness', primaryPlatform: 'tiktok' })
    ).rejects.toMatchObject({ statusCode: 400, code: 'NO_PLATFORMS' });
  });

  it('requires niche and primary platform', async () => {
    const profiles = new ProfileService();
    const influencer = await createInfluencer();
    await createConnection(influencer.id);

    await expect(profiles.completeInfluencerOnboarding(influencer.user_id, {})).rejects.toThrow(
      'Niche and primary platform are required'
    );
  });

  it('queues verification after onboarding', async () => {
    const profiles = new ProfileService();
    const influencer = await createInfluencer();
    await createConnection(influencer.id);

    const result = await profiles.completeInfluencerOnboarding(influencer.user_id, { niche: 'fitness', primaryPlatform: 'tiktok' });

    expect(result.verificationScheduled).toBe(true);
    expect(result.influencer.niche).toBe('fitness');
    expect(await VerificationQueueItem.count({ where: { subject_type: 'influencer', subject_id: influencer.id } })).toBe(1);
  });

  it('returns 404 for users without a profile', async () => {
    await expect(new ProfileService().influencerForUser('00000000-0000-4000-8000-000000000000')).rejects.toMatchObject({ statusCode: 404 });
  });
});
