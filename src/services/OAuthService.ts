import { randomBytes } from 'crypto';
import { z } from 'zod';
import { settings, PlatformApiSettings, SecuritySettings } from '../config/settings';
import { AppError } from '../utils/AppError';
import { FetchLike, requestJson, withQuery } from '../utils/http';
import { logger, errorMessage } from '../utils/logger';
import { signToken, verifyToken } from '../utils/tokens';
import { ConnectionService, connectionService, VerifyOutcome } from './ConnectionService';

export const OAUTH_PLATFORMS = ['tiktok', 'facebook', 'instagram'] as const;
export type OAuthPlatform = typeof OAUTH_PLATFORMS[number];

const TIKTOK_AUTHORIZE_URL = 'https://www.tiktok.com/v2/auth/authorize/';
const TIKTOK_TOKEN_URL = 'https://open.tiktokapis.com/v2/oauth/token/';
const TIKTOK_USER_INFO_URL = 'https://open.tiktokapis.com/v2/user/info/';
const TIKTOK_SCOPES = ['user.info.basic', 'user.info.stats'];
const FACEBOOK_SCOPES = ['public_profile', 'pages_show_list', 'pages_read_engagement'];

const tiktokToken = z.object({
  access_token: z.string(),
  expires_in: z.number().optional(),
  refresh_token: z.string().optional(),
  open_id: z.string().optional(),
});

const tiktokUser = z.object({
  data: z.object({
    user: z.object({
      open_id: z.string().optional(),
      username: z.string().optional(),
      display_name: z.string().optional(),
      follower_count: z.number().optional(),
    }),
  }),
});

const facebookToken = z.object({
  access_token: z.string(),
  expires_in: z.number().optional(),
});

const facebookPages = z.object({
  data: z.array(z.object({
    id: z.string(),
    name: z.string().optional(),
    username: z.string().optional(),
    access_token: z.string().optional(),
    instagram_business_account: z.object({ id: z.string() }).optional(),
  })),
});

const graphAccount = z.object({
  id: z.string(),
  name: z.string().optional(),
  username: z.string().optional(),
  followers_count: z.number().optional(),
});

export interface AuthorizationRequest {
  url: string;
  state: string;
}

export interface CallbackParams {
  code?: string;
  state?: string;
  error?: string;
  errorDescription?: string;
}

interface ConnectedAccount {
  handle: string;
  followersCount: number;
  platformUserId: string;
  accessToken: string;
  refreshToken?: string | null;
  expiresIn?: number;
}

const expiry = (expiresIn?: number) => (expiresIn ? new Date(Date.now() + expiresIn * 1000) : null);

export class OAuthService {
  constructor(
    private readonly api: PlatformApiSettings = settings.platforms,
    private readonly security: SecuritySettings = settings.security,
    private readonly connections: ConnectionService = connectionService,
    private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init),
    private readonly timeoutMs: number = settings.verification.apiTimeoutMs
  ) {}

  private graph(path: string) {
    return `https://graph.facebook.com/${this.api.facebook.graphVersion}/${path}`;
  }

  /** State carries who started the flow and for which platform, signed and short-lived. */
  createState(influencerId: string, platform: OAuthPlatform, now: Date = new Date()): string {
    return signToken(
      { sub: influencerId, platform, nonce: randomBytes(8).toString('hex'), typ: 'oauth' },
      this.security.tokenSecret,
      this.security.oauthStateTtlMinutes * 60,
      now
    );
  }

  /** The influencer who started the flow, if `state` is genuine, unexpired and for this platform. */
  checkState(state: string | undefined, platform: OAuthPlatform, now: Date = new Date()): string {
    const payload = state ? verifyToken(state, this.security.tokenSecret, now) : null;
    const influencerId = payload?.sub;
    if (!payload || payload.typ !== 'oauth' || payload.platform !== platform || typeof influencerId !== 'string') {
      throw new AppError('Invalid OAuth state. Please try again.', 400, 'INVALID_OAUTH_STATE');
    }
    return influencerId;
  }

  authorizationUrl(influencerId: string, platform: OAuthPlatform): AuthorizationRequest {
    const state = this.createState(influencerId, platform);
    if (platform === 'tiktok') {
      const { clientKey, redirectUri } = this.api.tiktok;
      if (!clientKey) throw new AppError('TikTok login is not configured', 503, 'OAUTH_NOT_CONFIGURED');
      return {
        state,
        url: withQuery(TIKTOK_AUTHORIZE_URL, {
          client_key: clientKey,
          redirect_uri: redirectUri,
          scope: TIKTOK_SCOPES.join(','),
          response_type: 'code',
          state,
        }),
      };
    }

    const { appId, redirectUri, graphVersion } = this.api.facebook;
    if (!appId) throw new AppError('Facebook login is not configured', 503, 'OAUTH_NOT_CONFIGURED');
    return {
      state,
      url: withQuery(`https://www.facebook.com/${graphVersion}/dialog/oauth`, {
        client_id: appId,
        redirect_uri: redirectUri,
        scope: FACEBOOK_SCOPES.join(','),
        response_type: 'code',
        state,
      }),
    };
  }

  /**
   * Complete the flow: check state, exchange the code, read the account,
   * store the connection and verify it straight away. The platform redirects
   * here without our session, so the signed state identifies the influencer.
   */
  async handleCallback(platform: OAuthPlatform, params: CallbackParams): Promise<VerifyOutcome> {
    const influencerId = this.checkState(params.state, platform);
    if (!params.code) {
      throw new AppError(`OAuth authorization failed: ${params.errorDescription ?? params.error ?? 'Unknown error'}`, 400, 'OAUTH_DENIED');
    }

    let account: ConnectedAccount;
    try {
      account = platform === 'tiktok'
        ? await this.connectTikTok(params.code)
        : await this.connectMeta(params.code, platform);
    } catch (error) {
      if (error instanceof AppError) throw error;
      logger.error('OAuth exchange failed', { platform, influencerId, error: errorMessage(error) });
      throw new AppError('Failed to connect account', 502, 'OAUTH_EXCHANGE_FAILED');
    }

    const connection = await this.connections.upsertFromOAuth(influencerId, {
      platform,
      handle: account.handle,
      followersCount: account.followersCount,
      platformUserId: account.platformUserId,
      accessToken: account.accessToken,
      refreshToken: account.refreshToken,
      tokenExpiresAt: expiry(account.expiresIn),
    });
    logger.info('Platform connected via OAuth', { platform, influencerId, connectionId: connection.id });
    return this.connections.verify(connection);
  }

  private async connectTikTok(code: string): Promise<ConnectedAccount> {
    const { clientKey, clientSecret, redirectUri } = this.api.tiktok;
    if (!clientKey || !clientSecret) throw new AppError('TikTok login is not configured', 503, 'OAUTH_NOT_CONFIGURED');

    const token = tiktokToken.parse(await requestJson(this.fetchImpl, TIKTOK_TOKEN_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        client_key: clientKey,
        client_secret: clientSecret,
        code,
        grant_type: 'authorization_code',
        redirect_uri: redirectUri,
      }),
      timeoutMs: this.timeoutMs,
    }));

    const { data } = tiktokUser.parse(await requestJson(this.fetchImpl, TIKTOK_USER_INFO_URL, {
      query: { fields: 'open_id,username,display_name,follower_count' },
      headers: { Authorization: `Bearer ${token.access_token}` },
      timeoutMs: this.timeoutMs,
    }));

    const openId = data.user.open_id ?? token.open_id;
    if (!openId) throw new AppError('TikTok did not return an account id', 502, 'OAUTH_EXCHANGE_FAILED');
    const handle = (data.user.username ?? data.user.display_name ?? '').replace(/^@/, '') || `tiktok_${openId.slice(0, 8)}`;

    return {
      handle,
      followersCount: data.user.follower_count ?? 0,
      platformUserId: openId,
      accessToken: token.access_token,
      refreshToken: token.refresh_token ?? null,
      expiresIn: token.expires_in,
    };
  }

  /** Facebook pages, and Instagram business accounts reached through them. */
  private async connectMeta(code: string, platform: 'facebook' | 'instagram'): Promise<ConnectedAccount> {
    const { appId, appSecret, redirectUri } = this.api.facebook;
    if (!appId || !appSecret) throw new AppError('Facebook login is not configured', 503, 'OAUTH_NOT_CONFIGURED');

    let token = facebookToken.parse(await requestJson(this.fetchImpl, this.graph('oauth/access_token'), {
      query: { client_id: appId, client_secret: appSecret, redirect_uri: redirectUri, code },
      timeoutMs: this.timeoutMs,
    }));

    try {
      token = facebookToken.parse(await requestJson(this.fetchImpl, this.graph('oauth/access_token'), {
        query: {
          grant_type: 'fb_exchange_token',
          client_id: appId,
          client_secret: appSecret,
          fb_exchange_token: token.access_token,
        },
        timeoutMs: this.timeoutMs,
      }));
    } catch (error) {
      logger.warn('Long-lived token exchange failed, keeping short-lived token', { error: errorMessage(error) });
    }

    const pages = facebookPages.parse(await requestJson(this.fetchImpl, this.graph('me/accounts'), {
      query: { access_token: token.access_token, fields: 'id,name,username,access_token,instagram_business_account' },
      timeoutMs: this.timeoutMs,
    })).data;
    if (pages.length === 0) {
      throw new AppError('No Facebook Pages found. Create a Facebook Page and try again.', 400, 'NO_PAGES');
    }

    if (platform === 'instagram') {
      const page = pages.find((candidate) => candidate.instagram_business_account);
      const igId = page?.instagram_business_account?.id;
      if (!page || !igId) {
        throw new AppError('No Instagram Business Account is linked to your Facebook Pages.', 400, 'NO_INSTAGRAM_ACCOUNT');
      }
      const pageToken = page.access_token ?? token.access_token;
      const account = graphAccount.parse(await requestJson(this.fetchImpl, this.graph(igId), {
        query: { access_token: pageToken, fields: 'id,username,followers_count' },
        timeoutMs: this.timeoutMs,
      }));
      return {
        handle: account.username ?? igId,
        followersCount: account.followers_count ?? 0,
        platformUserId: account.id,
        accessToken: pageToken,
        expiresIn: token.expires_in,
      };
    }

    const [page] = pages;
    const account = graphAccount.parse(await requestJson(this.fetchImpl, this.graph(page.id), {
      query: { access_token: token.access_token, fields: 'id,name,username,followers_count' },
      timeoutMs: this.timeoutMs,
    }));
    return {
      handle: account.username ?? account.name ?? page.id,
      followersCount: account.followers_count ?? 0,
      platformUserId: account.id,
      accessToken: page.access_token ?? token.access_token,
      expiresIn: token.expires_in,
    };
  }
}

export const oauthService = new OAuthService();
