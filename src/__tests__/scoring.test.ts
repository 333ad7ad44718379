import { describe, expect, it } from '@jest/globals';
import { scoreBrand, checkWebsite } from '../services/BrandVerificationService';
import { scoreConnection, decideConnectionStatus, UNVERIFIABLE_FLAG } from '../services/PlatformVerificationService';
import { allowedDiscrepancy, FollowerCheckResult } from '../services/FollowerCountService';

const DESCRIPTION = 'We design and sell handmade leather bags for city commuters.';

const followerCheck = (overrides: Partial<FollowerCheckResult>): FollowerCheckResult => ({
  status: 'verified',
  declaredCount: 10000,
  actualCount: 10300,
  discrepancy: 300,
  allowedDiscrepancy: 500,
  method: 'oauth_api',
  source: 'tiktok_user_info',
  attempts: [],
  ...overrides,
});

describe('brand scoring', () => {
  it('averages the checks and skips the website when none is given', () => {
    const result = scoreBrand(
      { companyName: 'Acme Studios', industry: 'Fashion', description: DESCRIPTION, contactEmail: 'hello@acme.co' },
      0.7
    );

    expect(result.checks.map((c) => c.name)).toEqual(['company_name', 'industry', 'description', 'contact_info']);
    expect(result.confidence).toBe(0.875);
    expect(result.passed).toBe(true);
    expect(result.reason).toBe('All checks passed');
    expect(result.flags).toEqual(['No phone number provided']);
  });

  it('counts a website toward the average when present', () => {
    const result = scoreBrand(
      {
        companyName: 'Acme Studios',
        industry: 'Fashion',
        description: DESCRIPTION,
        website: 'https://shop.acme.com',
        contactEmail: 'hello@acme.co',
        contactPhone: '+233 20 123 4567',
      },
      0.7
    );

    expect(result.checks).toHaveLength(5);
    expect(result.confidence).toBeCloseTo(0.96, 10);
    expect(result.flags).toEqual([]);
  });

  it('fails when a required check fails even above the threshold', () => {
    const result = scoreBrand(
      {
        companyName: 'Acme Studios',
        industry: 'Fashion',
        description: 'Short',
        contactEmail: 'hello@acme.co',
        contactPhone: '+233201234567',
      },
      0.7
    );

    expect(result.confidence).toBeCloseTo(0.825, 10);
    expect(result.passed).toBe(false);
    expect(result.reason).toBe('Passed 3/4 checks');
    expect(result.flags).toEqual(['Description too short (minimum 20 characters)']);
  });

  it('flags placeholder company names', () => {
    const result = scoreBrand({ companyName: 'Test Brand', industry: 'Fashion', description: DESCRIPTION }, 0.7);
    expect(result.checks[0]).toEqual({
      name: 'company_name',
      passed: true,
      score: 0.5,
      flags: ['Suspicious company name pattern'],
      hardFail: false,
    });
  });

  it('scores websites by format and TLD', () => {
    expect(checkWebsite('https://acme.io').score).toBe(0.8);
    expect(checkWebsite('https://acme.store')).toMatchObject({ passed: true, score: 0.6 });
    expect(checkWebsite('not a url')).toMatchObject({ passed: false, score: 0.3, flags: ['Invalid website URL format'] });
  });
});

describe('connection scoring', () => {
  it('verifies a TikTok account whose count is within tolerance', () => {
    const result = scoreConnection(
      { platform: 'tiktok', handle: '@creator.one', followersCount: 10000 },
      followerCheck({}),
      1000,
      0.8
    );

    expect(result.checks.map((c) => c.name)).toEqual([
      'follower_cross_check',
      'minimum_followers',
      'handle_format',
      'follower_reasonableness',
    ]);
    expect(result.confidence).toBe(1);
    expect(result.passed).toBe(true);
    expect(decideConnectionStatus(result, 0.5)).toBe('verified');
  });

  it('rejects an account below the platform minimum', () => {
    const result = scoreConnection(
      { platform: 'youtube', handle: 'smallchannel', followersCount: 500 },
      followerCheck({ status: 'unverifiable', declaredCount: 500, actualCount: null, discrepancy: null, allowedDiscrepancy: 100, method: null, source: null }),
      1000,
      0.8
    );

    expect(result.confidence).toBeCloseTo(1 / 3, 10);
    expect(result.hardFail).toBe(true);
    expect(result.flags).toEqual([UNVERIFIABLE_FLAG, 'Follower count (500) below minimum (1,000)']);
    expect(decideConnectionStatus(result, 0.5)).toBe('rejected');
  });

  it('leaves a mismatched count pending for review', () => {
    const result = scoreConnection(
      { platform: 'tiktok', handle: 'creator.one', followersCount: 10000 },
      followerCheck({ status: 'mismatch', actualCount: 8000, discrepancy: 2000 }),
      1000,
      0.8
    );

    expect(result.confidence).toBe(0.75);
    expect(result.flags).toEqual([
      'Follower count mismatch: User provided 10,000, API shows 8,000 (difference: 2,000, 25.0%)',
    ]);
    expect(decideConnectionStatus(result, 0.5)).toBe('pending');
  });

  it('flags sample posts from another site and odd engagement', () => {
    const result = scoreConnection(
      {
        platform: 'tiktok',
        handle: 'creator.one',
        followersCount: 10000,
        engagementRate: 15,
        samplePostUrl: 'https://www.instagram.com/p/abc',
      },
      followerCheck({}),
      1000,
      0.8
    );

    expect(result.flags).toEqual([
      "Sample post URL doesn't appear to be from TikTok",
      'Unusual engagement rate: 15%',
    ]);
    expect(result.confidence).toBe(4 / 6);
  });
});

describe('allowedDiscrepancy', () => {
  const config = { toleranceFloor: 100, toleranceRatio: 0.05 };

  it('uses the floor for small accounts', () => {
    expect(allowedDiscrepancy(1000, config)).toBe(100);
  });

  it('scales with the declared count', () => {
    expect(allowedDiscrepancy(10000, config)).toBe(500);
  });
});
