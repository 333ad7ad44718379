export const SUPPORTED_PLATFORMS = ['tiktok', 'instagram', 'youtube', 'facebook'] as const;

export type SupportedPlatform = (typeof SUPPORTED_PLATFORMS)[number];

/** Platforms a campaign can be published on. */
export const CAMPAIGN_PLATFORMS = ['tiktok', 'instagram', 'youtube'] as const;

export type CampaignPlatform = (typeof CAMPAIGN_PLATFORMS)[number];

export const isSupportedPlatform = (value: string): value is SupportedPlatform =>
  SUPPORTED_PLATFORMS.some((platform) => platform === value);
