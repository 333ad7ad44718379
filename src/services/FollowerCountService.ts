import { z } from 'zod';
import { settings, PlatformApiSettings, VerificationSettings } from '../config/settings';
import { logger, errorMessage } from '../utils/logger';
import { FetchLike, requestJson, requestText } from '../utils/http';
import { extractFollowerCount } from '../utils/profileScraper';
import type { SupportedPlatform } from '../types/platform';

export type FollowerCheckStatus = 'verified' | 'mismatch' | 'unverifiable';
export type CountSourceMethod = 'oauth_api' | 'api' | 'proxy' | 'scrape';

export interface FollowerCredentials {
  accessToken?: string | null;
  /** Platform-side account id (TikTok open_id, Instagram/Facebook id, YouTube channel id). */
  platformUserId?: string | null;
}

export interface FollowerLookup {
  platform: SupportedPlatform;
  handle: string;
  declaredCount: number;
  credentials?: FollowerCredentials;
}

export interface SourceAttempt {
  source: string;
  method: CountSourceMethod;
  outcome: 'count' | 'empty' | 'error';
  error?: string;
}

export interface FollowerCheckResult {
  status: FollowerCheckStatus;
  declaredCount: number;
  actualCount: number | null;
  discrepancy: number | null;
  allowedDiscrepancy: number;
  method: CountSourceMethod | null;
  source: string | null;
  attempts: SourceAttempt[];
}

interface SourceContext {
  handle: string;
  credentials: FollowerCredentials;
  fetch: FetchLike;
  apiTimeoutMs: number;
  scrapeTimeoutMs: number;
}

interface CountSource {
  name: string;
  method: CountSourceMethod;
  /** Resolves null when the source has nothing to say (not configured, no data). */
  fetchCount(ctx: SourceContext): Promise<number | null>;
}

type CrossCheckSettings = Pick<VerificationSettings, 'toleranceFloor' | 'toleranceRatio' | 'apiTimeoutMs' | 'scrapeTimeoutMs'>;

const BROWSER_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36',
  'Accept': 'text/html,application/xhtml+xml',
  'Accept-Language': 'en-US,en;q=0.9',
};

const normalizeHandle = (handle: string) => handle.trim().replace(/^@/, '');

// ─── Response shapes ────────────────────────────────────────────────

/** Counts arrive as numbers, or numeric strings from YouTube. Anything else reads as absent. */
const count = z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/).transform(Number)]);
const maybeCount = count.optional().catch(undefined);

const tiktokUserInfo = z.object({
  data: z.object({ user: z.object({ follower_count: maybeCount }) }),
});

const tiktokResearch = z.object({
  data: z.object({ follower_count: maybeCount }),
});

const graphAccount = z.object({
  username: z.string().optional(),
  followers_count: maybeCount,
  fan_count: maybeCount,
});

const graphPages = z.object({
  data: z.array(z.object({
    instagram_business_account: z.object({
      username: z.string().optional(),
      followers_count: maybeCount,
    }).optional(),
  })),
});

const rapidInstagram = z.object({
  data: z.object({
    edge_followed_by: z.object({ count: maybeCount }).optional().catch(undefined),
    follower_count: maybeCount,
    followers: maybeCount,
    followers_count: maybeCount,
  }).optional().catch(undefined),
  follower_count: maybeCount,
  followers: maybeCount,
});

const rapidFacebook = z.object({
  followers_count: maybeCount,
  followers: maybeCount,
  follower_count: maybeCount,
  data: z.object({ followers_count: maybeCount }).optional().catch(undefined),
});

const youtubeSearch = z.object({
  items: z.array(z.object({ id: z.object({ channelId: z.string().optional() }) })).default([]),
});

const youtubeChannels = z.object({
  items: z.array(z.object({ statistics: z.object({ subscriberCount: maybeCount }).optional() })).default([]),
});

const firstCount = (...values: Array<number | undefined>): number | null =>
  values.find((value) => value !== undefined) ?? null;

export const allowedDiscrepancy = (declared: number, config: Pick<CrossCheckSettings, 'toleranceFloor' | 'toleranceRatio'>) =>
  Math.max(config.toleranceFloor, declared * config.toleranceRatio);

// ─── Source builders ────────────────────────────────────────────────

const tiktokSources = (api: PlatformApiSettings): CountSource[] => [
  {
    name: 'tiktok_user_info',
    method: 'oauth_api',
    async fetchCount({ credentials, fetch, apiTimeoutMs }) {
      if (!credentials.accessToken) return null;
      const body = tiktokUserInfo.parse(await requestJson(fetch, 'https://open.tiktokapis.com/v2/user/info/', {
        query: { fields: 'open_id,username,display_name,follower_count' },
        headers: { Authorization: `Bearer ${credentials.accessToken}` },
        timeoutMs: apiTimeoutMs,
      }));
      return firstCount(body.data.user.follower_count);
    },
  },
  {
    name: 'tiktok_research',
    method: 'api',
    async fetchCount({ credentials, fetch, apiTimeoutMs }) {
      if (!api.tiktok.researchApiKey || !credentials.platformUserId) return null;
      const body = tiktokResearch.parse(await requestJson(fetch, 'https://open.tiktokapis.com/v2/research/user/info/', {
        query: { fields: 'follower_count', open_id: credentials.platformUserId },
        headers: { Authorization: `Bearer ${api.tiktok.researchApiKey}`, 'Content-Type': 'application/json' },
        timeoutMs: apiTimeoutMs,
      }));
      return firstCount(body.data.follower_count);
    },
  },
];

const instagramSources = (api: PlatformApiSettings): CountSource[] => {
  const graph = `https://graph.facebook.com/${api.facebook.graphVersion}`;
  return [
    {
      name: 'instagram_graph',
      method: 'oauth_api',
      async fetchCount({ handle, credentials, fetch, apiTimeoutMs }) {
        const token = credentials.accessToken || api.instagram.accessToken;
        if (!token) return null;

        const accountId = credentials.platformUserId || api.instagram.businessAccountId;
        if (accountId) {
          const body = graphAccount.parse(await requestJson(fetch, `${graph}/${accountId}`, {
            query: { fields: 'followers_count,username', access_token: token },
            timeoutMs: apiTimeoutMs,
          }));
          if (body.username !== undefined && body.username.toLowerCase() !== handle.toLowerCase()) {
            throw new Error(`Graph account belongs to @${body.username}, not @${handle}`);
          }
          return firstCount(body.followers_count);
        }

        // Discover the business account through the pages the token manages.
        const pages = graphPages.parse(await requestJson(fetch, `${graph}/me/accounts`, {
          query: { fields: 'instagram_business_account{id,username,followers_count}', access_token: token },
          timeoutMs: apiTimeoutMs,
        }));
        const account = pages.data
          .map((page) => page.instagram_business_account)
          .find((candidate) => candidate?.username?.toLowerCase() === handle.toLowerCase());
        return firstCount(account?.followers_count);
      },
    },
    {
      name: 'instagram_rapidapi',
      method: 'proxy',
      async fetchCount({ handle, fetch, scrapeTimeoutMs }) {
        if (!api.rapidApiKey) return null;
        const body = rapidInstagram.parse(await requestJson(fetch, 'https://instagram-scraper-api2.p.rapidapi.com/userinfo', {
          query: { username_or_id_or_url: handle },
          headers: {
            'X-RapidAPI-Key': api.rapidApiKey,
            'X-RapidAPI-Host': 'instagram-scraper-api2.p.rapidapi.com',
          },
          timeoutMs: scrapeTimeoutMs,
        }));
        return firstCount(
          body.data?.edge_followed_by?.count,
          body.data?.follower_count,
          body.data?.followers,
          body.data?.followers_count,
          body.follower_count,
          body.followers
        );
      },
    },
    {
      name: 'instagram_profile_page',
      method: 'scrape',
      async fetchCount({ handle, fetch, scrapeTimeoutMs }) {
        const html = await requestText(fetch, `https://www.instagram.com/${encodeURIComponent(handle)}/`, {
          headers: BROWSER_HEADERS,
          timeoutMs: scrapeTimeoutMs,
        });
        return extractFollowerCount(html);
      },
    },
  ];
};

const youtubeSources = (api: PlatformApiSettings): CountSource[] => [
  {
    name: 'youtube_data_api',
    method: 'api',
    async fetchCount({ handle, credentials, fetch, apiTimeoutMs }) {
      if (!api.youtube.apiKey) return null;

      let channelId = credentials.platformUserId || (/^UC[\w-]{22}$/.test(handle) ? handle : null);
      if (!channelId) {
        const search = youtubeSearch.parse(await requestJson(fetch, 'https://www.googleapis.com/youtube/v3/search', {
          query: { part: 'snippet', q: handle, type: 'channel', maxResults: 1, key: api.youtube.apiKey },
          timeoutMs: apiTimeoutMs,
        }));
        const found = search.items[0]?.id.channelId;
        if (!found) return null;
        channelId = found;
      }

      const channels = youtubeChannels.parse(await requestJson(fetch, 'https://www.googleapis.com/youtube/v3/channels', {
        query: { part: 'statistics', id: channelId, key: api.youtube.apiKey },
        timeoutMs: apiTimeoutMs,
      }));
      return firstCount(channels.items[0]?.statistics?.subscriberCount);
    },
  },
];

const facebookSources = (api: PlatformApiSettings): CountSource[] => [
  {
    name: 'facebook_graph',
    method: 'oauth_api',
    async fetchCount({ handle, credentials, fetch, apiTimeoutMs }) {
      if (!credentials.accessToken) return null;
      const pageId = credentials.platformUserId || handle;
      const body = graphAccount.parse(await requestJson(fetch, `https://graph.facebook.com/${api.facebook.graphVersion}/${encodeURIComponent(pageId)}`, {
        query: { fields: 'followers_count,fan_count,name', access_token: credentials.accessToken },
        timeoutMs: apiTimeoutMs,
      }));
      return firstCount(body.followers_count, body.fan_count);
    },
  },
  {
    name: 'facebook_rapidapi',
    method: 'proxy',
    async fetchCount({ handle, fetch, scrapeTimeoutMs }) {
      if (!api.rapidApiKey) return null;
      const body = rapidFacebook.parse(await requestJson(fetch, 'https://facebook-profile-scraper.p.rapidapi.com/profile', {
        query: { username: handle },
        headers: {
          'X-RapidAPI-Key': api.rapidApiKey,
          'X-RapidAPI-Host': 'facebook-profile-scraper.p.rapidapi.com',
        },
        timeoutMs: scrapeTimeoutMs,
      }));
      return firstCount(body.followers_count, body.followers, body.follower_count, body.data?.followers_count);
    },
  },
  {
    name: 'facebook_profile_page',
    method: 'scrape',
    async fetchCount({ handle, fetch, scrapeTimeoutMs }) {
      const html = await requestText(fetch, `https://www.facebook.com/${encodeURIComponent(handle)}`, {
        headers: BROWSER_HEADERS,
        timeoutMs: scrapeTimeoutMs,
      });
      return extractFollowerCount(html);
    },
  },
];

export const sourcesFor = (platform: SupportedPlatform, api: PlatformApiSettings): CountSource[] => {
  switch (platform) {
    case 'tiktok':
      return tiktokSources(api);
    case 'instagram':
      return instagramSources(api);
    case 'youtube':
      return youtubeSources(api);
    case 'facebook':
      return facebookSources(api);
  }
};

/**
 * Cross-checks a declared follower count against the platform. Stateless:
 * tries official API, scraping proxy, then the public page, and reports
 * `unverifiable` when none of them produced a count.
 */
export class FollowerCountService {
  constructor(
    private readonly api: PlatformApiSettings = settings.platforms,
    private readonly config: CrossCheckSettings = settings.verification,
    private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init)
  ) {}

  async check(lookup: FollowerLookup): Promise<FollowerCheckResult> {
    const handle = normalizeHandle(lookup.handle);
    const ctx: SourceContext = {
      handle,
      credentials: lookup.credentials ?? {},
      fetch: this.fetchImpl,
      apiTimeoutMs: this.config.apiTimeoutMs,
      scrapeTimeoutMs: this.config.scrapeTimeoutMs,
    };
    const allowed = allowedDiscrepancy(lookup.declaredCount, this.config);
    const attempts: SourceAttempt[] = [];

    for (const source of sourcesFor(lookup.platform, this.api)) {
      try {
        const count = await source.fetchCount(ctx);
        if (count === null) {
          attempts.push({ source: source.name, method: source.method, outcome: 'empty' });
          continue;
        }
        attempts.push({ source: source.name, method: source.method, outcome: 'count' });

        const discrepancy = Math.abs(count - lookup.declaredCount);
        const status: FollowerCheckStatus = discrepancy <= allowed ? 'verified' : 'mismatch';
        logger.info('Follower count fetched', {
          platform: lookup.platform,
          handle,
          source: source.name,
          declared: lookup.declaredCount,
          actual: count,
          status,
        });
        return {
          status,
          declaredCount: lookup.declaredCount,
          actualCount: count,
          discrepancy,
          allowedDiscrepancy: allowed,
          method: source.method,
          source: source.name,
          attempts,
        };
      } catch (error) {
        logger.warn('Follower count source failed', {
          platform: lookup.platform,
          handle,
          source: source.name,
          error: errorMessage(error),
        });
        attempts.push({ source: source.name, method: source.method, outcome: 'error', error: errorMessage(error) });
      }
    }

    return {
      status: 'unverifiable',
      declaredCount: lookup.declaredCount,
      actualCount: null,
      discrepancy: null,
      allowedDiscrepancy: allowed,
      method: null,
      source: null,
      attempts,
    };
  }
}

export const followerCountService = new FollowerCountService();
