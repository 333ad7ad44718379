import dotenv from 'dotenv';

dotenv.config();

export type DatabaseDialect = 'mysql' | 'sqlite';

export interface DatabaseSettings {
  dialect: DatabaseDialect;
  host: string;
  port: number;
  username: string;
  password: string;
  name: string;
  storage: string;
  logging: boolean;
}

export interface LoggingSettings {
  level: string;
  dir: string;
  files: boolean;
  silent: boolean;
}

export interface MailSettings {
  host?: string;
  port: number;
  secure: boolean;
  user?: string;
  pass?: string;
  from: string;
}

export interface SecuritySettings {
  tokenSecret: string;
  sessionTtlHours: number;
  emailTokenTtlHours: number;
  oauthStateTtlMinutes: number;
}

export interface PaystackSettings {
  secretKey: string;
  publicKey: string;
  baseUrl: string;
  callbackUrl: string;
  timeoutMs: number;
}

export interface PlatformApiSettings {
  tiktok: {
    clientKey: string;
    clientSecret: string;
    redirectUri: string;
    researchApiKey: string;
  };
  facebook: {
    appId: string;
    appSecret: string;
    redirectUri: string;
    graphVersion: string;
  };
  instagram: {
    accessToken: string;
    businessAccountId: string;
  };
  youtube: {
    apiKey: string;
  };
  rapidApiKey: string;
}

export interface VerificationSettings {
  brandPassThreshold: number;
  connectionPassThreshold: number;
  rejectBelow: number;
  toleranceFloor: number;
  toleranceRatio: number;
  apiTimeoutMs: number;
  scrapeTimeoutMs: number;
  defaultMinimumFollowers: number;
  autoApprove: boolean;
}

export interface QueueSettings {
  minDelayMinutes: number;
  maxDelayMinutes: number;
  batchSize: number;
  leaseSeconds: number;
  /** Failed items are given up on after this many claims. */
  maxAttempts: number;
  /** Multiplied by the attempt count to push a failed item back. */
  retryDelayMinutes: number;
}

export interface CurrencySettings {
  defaultCode: string;
  minimumWithdrawal: number;
  payoutDueDays: number;
}

export interface Settings {
  env: string;
  port: number;
  publicUrl: string;
  swaggerEnabled: boolean;
  database: DatabaseSettings;
  logging: LoggingSettings;
  mail: MailSettings;
  security: SecuritySettings;
  paystack: PaystackSettings;
  platforms: PlatformApiSettings;
  verification: VerificationSettings;
  queue: QueueSettings;
  currency: CurrencySettings;
}

type Env = Record<string, string | undefined>;

const num = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric configuration value: "${value}"`);
  }
  return parsed;
};

const bool = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
};

const dialect = (value: string | undefined): DatabaseDialect => {
  if (value === undefined || value === '' || value === 'mysql') return 'mysql';
  if (value === 'sqlite') return 'sqlite';
  throw new Error(`Unsupported DB_DIALECT "${value}"`);
};

const deepFreeze = <T extends object>(value: T): Readonly<T> => {
  for (const child of Object.values(value)) {
    if (child && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
};

/**
 * Build the process configuration from environment variables.
 * Called once at startup; components receive the slice they need.
 */
export function loadSettings(env: Env = process.env): Readonly<Settings> {
  const publicUrl = (env.PUBLIC_URL || 'http://localhost:3000').replace(/\/+$/, '');

  const settings: Settings = {
    env: env.NODE_ENV || 'development',
    port: num(env.PORT, 3000),
    publicUrl,
    swaggerEnabled: bool(env.SWAGGER_ENABLED, false),
    database: {
      dialect: dialect(env.DB_DIALECT),
      host: env.DB_HOST || 'localhost',
      port: num(env.DB_PORT, 3306),
      username: env.DB_USER || 'root',
      password: env.DB_PASS || '',
      name: env.DB_NAME || 'marketplace',
      storage: env.DB_STORAGE || ':memory:',
      logging: bool(env.DB_LOGGING, false),
    },
    logging: {
      level: env.LOG_LEVEL || 'debug',
      dir: env.LOG_DIR || 'logs',
      files: bool(env.LOG_TO_FILES, env.NODE_ENV !== 'test'),
      silent: env.NODE_ENV === 'test' && !bool(env.LOG_IN_TESTS, false),
    },
    mail: {
      host: env.SMTP_HOST,
      port: num(env.SMTP_PORT, 587),
      secure: bool(env.SMTP_SECURE, false),
      user: env.SMTP_USER,
      pass: env.SMTP_PASS,
      from: env.SMTP_FROM || 'noreply@marketplace.local',
    },
    security: {
      tokenSecret: env.TOKEN_SECRET || 'change-me',
      sessionTtlHours: num(env.SESSION_TTL_HOURS, 24),
      emailTokenTtlHours: num(env.EMAIL_TOKEN_TTL_HOURS, 72),
      oauthStateTtlMinutes: num(env.OAUTH_STATE_TTL_MINUTES, 10),
    },
    paystack: {
      secretKey: env.PAYSTACK_SECRET_KEY || '',
      publicKey: env.PAYSTACK_PUBLIC_KEY || '',
      baseUrl: env.PAYSTACK_BASE_URL || 'https://api.paystack.co',
      callbackUrl: env.PAYSTACK_CALLBACK_URL || `${publicUrl}/api/v1/payments/callback`,
      timeoutMs: num(env.PAYSTACK_TIMEOUT_MS, 30000),
    },
    platforms: {
      tiktok: {
        clientKey: env.TIKTOK_CLIENT_KEY || '',
        clientSecret: env.TIKTOK_CLIENT_SECRET || '',
        redirectUri: env.TIKTOK_REDIRECT_URI || `${publicUrl}/api/v1/oauth/tiktok/callback`,
        researchApiKey: env.TIKTOK_API_KEY || '',
      },
      facebook: {
        appId: env.FACEBOOK_APP_ID || '',
        appSecret: env.FACEBOOK_APP_SECRET || '',
        redirectUri: env.FACEBOOK_REDIRECT_URI || `${publicUrl}/api/v1/oauth/facebook/callback`,
        graphVersion: env.FACEBOOK_GRAPH_VERSION || 'v18.0',
      },
      instagram: {
        accessToken: env.INSTAGRAM_ACCESS_TOKEN || '',
        businessAccountId: env.INSTAGRAM_BUSINESS_ACCOUNT_ID || '',
      },
      youtube: {
        apiKey: env.YOUTUBE_API_KEY || '',
      },
      rapidApiKey: env.RAPIDAPI_KEY || '',
    },
    verification: {
      brandPassThreshold: num(env.BRAND_PASS_THRESHOLD, 0.7),
      connectionPassThreshold: num(env.CONNECTION_PASS_THRESHOLD, 0.8),
      rejectBelow: num(env.CONNECTION_REJECT_BELOW, 0.5),
      toleranceFloor: num(env.FOLLOWER_TOLERANCE_FLOOR, 100),
      toleranceRatio: num(env.FOLLOWER_TOLERANCE_RATIO, 0.05),
      apiTimeoutMs: num(env.PLATFORM_API_TIMEOUT_MS, 10000),
      scrapeTimeoutMs: num(env.PLATFORM_SCRAPE_TIMEOUT_MS, 15000),
      defaultMinimumFollowers: num(env.DEFAULT_MINIMUM_FOLLOWERS, 1000),
      autoApprove: bool(env.VERIFICATION_AUTO_APPROVE, true),
    },
    queue: {
      minDelayMinutes: num(env.VERIFICATION_DELAY_MIN_MINUTES, 5),
      maxDelayMinutes: num(env.VERIFICATION_DELAY_MAX_MINUTES, 10),
      batchSize: num(env.VERIFICATION_BATCH_SIZE, 50),
      leaseSeconds: num(env.VERIFICATION_LEASE_SECONDS, 300),
      maxAttempts: num(env.VERIFICATION_MAX_ATTEMPTS, 5),
      retryDelayMinutes: num(env.VERIFICATION_RETRY_DELAY_MINUTES, 2),
    },
    currency: {
      defaultCode: (env.DEFAULT_CURRENCY || 'USD').toUpperCase(),
      minimumWithdrawal: num(env.MINIMUM_WITHDRAWAL, 50),
      payoutDueDays: num(env.PAYOUT_DUE_DAYS, 30),
    },
  };

  if (settings.queue.minDelayMinutes > settings.queue.maxDelayMinutes) {
    throw new Error('VERIFICATION_DELAY_MIN_MINUTES must not exceed VERIFICATION_DELAY_MAX_MINUTES');
  }

  return deepFreeze(settings);
}

export const settings = loadSettings();
