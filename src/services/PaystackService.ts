import { createHmac, timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { settings, PaystackSettings } from '../config/settings';
import { AppError } from '../utils/AppError';
import { FetchLike, HttpError, requestJson } from '../utils/http';
import { logger } from '../utils/logger';

const envelope = <T extends z.ZodTypeAny>(data: T) =>
  z.object({
    status: z.boolean(),
    message: z.string().default(''),
    data: data.nullable().optional(),
  });

const initializeResponse = envelope(
  z.object({
    authorization_url: z.string(),
    access_code: z.string().optional(),
    reference: z.string(),
  })
);

const verifyResponse = envelope(
  z.object({
    status: z.string(),
    reference: z.string(),
    amount: z.number(),
    currency: z.string().optional(),
    paid_at: z.string().nullable().optional(),
    gateway_response: z.string().nullable().optional(),
  }).passthrough()
);

export const webhookEventSchema = z.object({
  event: z.string(),
  data: z.object({
    reference: z.string(),
    amount: z.number().optional(),
    currency: z.string().optional(),
    status: z.string().optional(),
    gateway_response: z.string().nullable().optional(),
  }).passthrough(),
});

export type PaystackWebhookEvent = z.infer<typeof webhookEventSchema>;
export type PaystackVerification = NonNullable<z.infer<typeof verifyResponse>['data']>;

export interface InitializeParams {
  email: string;
  amount: number;
  currency: string;
  reference: string;
  metadata?: Record<string, unknown>;
}

/** Major units to the smallest unit the gateway takes (kobo, pesewas, cents). */
export const toMinorUnits = (amount: number): number => Math.round(amount * 100);

export class PaystackService {
  constructor(
    private readonly config: PaystackSettings = settings.paystack,
    private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init)
  ) {}

  private headers() {
    const key = this.config.secretKey;
    if (!key) throw new AppError('Payment gateway is not configured', 503, 'GATEWAY_NOT_CONFIGURED');
    if (!key.startsWith('sk_test_') && !key.startsWith('sk_live_')) {
      throw new AppError('Payment gateway secret key has an invalid format', 503, 'GATEWAY_NOT_CONFIGURED');
    }
    return { Authorization: `Bearer ${key}`, 'Content-Type': 'application/json' };
  }

  private gatewayError(error: unknown): AppError {
    if (error instanceof HttpError) {
      logger.error('Paystack request failed', { status: error.status, url: error.url, body: error.body });
      return new AppError(`Payment gateway error (${error.status})`, 502, 'GATEWAY_ERROR');
    }
    if (error instanceof AppError) return error;
    logger.error('Paystack request failed', { error: error instanceof Error ? error.message : String(error) });
    return new AppError('Payment gateway unreachable', 502, 'GATEWAY_ERROR');
  }

  /** Card-only checkout so saved cards are not offered. */
  async initialize(params: InitializeParams) {
    const headers = this.headers();
    try {
      const raw = await requestJson(this.fetchImpl, `${this.config.baseUrl}/transaction/initialize`, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          email: params.email,
          amount: toMinorUnits(params.amount),
          currency: params.currency,
          reference: params.reference,
          callback_url: this.config.callbackUrl,
          metadata: params.metadata ?? {},
          channels: ['card'],
        }),
        timeoutMs: this.config.timeoutMs,
      });
      const parsed = initializeResponse.parse(raw);
      if (!parsed.status || !parsed.data) {
        throw new AppError(`Payment gateway rejected the request: ${parsed.message}`, 502, 'GATEWAY_ERROR');
      }
      return parsed.data;
    } catch (error) {
      throw this.gatewayError(error);
    }
  }

  async verify(reference: string): Promise<PaystackVerification> {
    const headers = this.headers();
    try {
      const raw = await requestJson(
        this.fetchImpl,
        `${this.config.baseUrl}/transaction/verify/${encodeURIComponent(reference)}`,
        { headers, timeoutMs: this.config.timeoutMs }
      );
      const parsed = verifyResponse.parse(raw);
      if (!parsed.status || !parsed.data) {
        throw new AppError(`Could not verify payment: ${parsed.message}`, 502, 'GATEWAY_ERROR');
      }
      return parsed.data;
    } catch (error) {
      throw this.gatewayError(error);
    }
  }

  /** HMAC-SHA512 of the raw body with the secret key, hex encoded. */
  sign(rawBody: Buffer | string): string {
    return createHmac('sha512', this.config.secretKey).update(rawBody).digest('hex');
  }

  verifySignature(rawBody: Buffer | string | undefined, signature: string | undefined): boolean {
    if (!rawBody || !signature || !this.config.secretKey) return false;
    const expected = Buffer.from(this.sign(rawBody), 'utf8');
    const given = Buffer.from(signature, 'utf8');
    return expected.length === given.length && timingSafeEqual(expected, given);
  }
}

export const paystackService = new PaystackService();
