import { sequelize } from '../config/database';
import { Brand } from '../models/Brand';
import { User } from '../models/User';
import { PaymentTransaction } from '../models/PaymentTransaction';
import { AppError } from '../utils/AppError';
import { roundMoney, toAmount } from '../utils';
import { logger } from '../utils/logger';
import { WalletService, walletService } from './WalletService';
import { LedgerService, ledgerService, generateReference } from './LedgerService';
import { PaystackService, paystackService, toMinorUnits, webhookEventSchema } from './PaystackService';
import { EmailService, emailService } from './EmailService';
import { topUpCreditedEmail } from '../utils/notificationEmails';

export interface TopUpSession {
  reference: string;
  authorizationUrl: string;
  amount: number;
  currency: string;
}

export type SettlementResult = 'credited' | 'failed' | 'ignored';

const MAX_TOP_UP = 1_000_000;

export class PaymentService {
  constructor(
    private readonly gateway: PaystackService = paystackService,
    private readonly wallet: WalletService = walletService,
    private readonly ledger: LedgerService = ledgerService,
    private readonly email: EmailService = emailService
  ) {}

  /**
   * Start a wallet top-up. A pending ledger row is written before the
   * customer is redirected; the wallet moves only when the gateway confirms.
   */
  async initializeTopUp(brandId: string, rawAmount: number): Promise<TopUpSession> {
    const amount = roundMoney(rawAmount);
    if (!(amount > 0) || amount > MAX_TOP_UP) {
      throw new AppError(`Top-up amount must be between 0.01 and ${MAX_TOP_UP}`, 400);
    }

    const brand = await Brand.findByPk(brandId, { include: [User] });
    if (!brand) throw new AppError('Brand not found', 404);
    const email = brand.contact_email || brand.user?.email;
    if (!email) throw new AppError('Brand has no billing email', 400);

    const currency = await this.wallet.currencyCode(brand);
    const reference = generateReference('WALLET');
    const session = await this.gateway.initialize({
      email,
      amount,
      currency,
      reference,
      metadata: { brand_id: brand.id, purpose: 'wallet_topup' },
    });

    await this.ledger.record({
      brandId: brand.id,
      type: 'wallet_topup',
      amount,
      currency,
      reference,
      status: 'pending',
      gateway: 'paystack',
      authorizationUrl: session.authorization_url,
    });

    logger.info('Wallet top-up initialized', { brandId: brand.id, reference, amount, currency });
    return { reference, authorizationUrl: session.authorization_url, amount, currency };
  }

  /**
   * Move a pending top-up to its final state. Success credits the wallet
   * in the same transaction; anything already settled is left alone, so
   * repeated notifications credit once.
   */
  async settle(
    reference: string,
    outcome: 'success' | 'failed',
    gatewayResponse: Record<string, unknown>,
    paidAmountMinor?: number
  ): Promise<SettlementResult> {
    const t = await sequelize.transaction();
    let payment: PaymentTransaction | null;
    let result: SettlementResult;
    try {
      payment = await this.ledger.findByReference(reference, t);
      if (!payment) {
        await t.commit();
        logger.warn('Settlement for unknown reference', { reference });
        return 'ignored';
      }
      if (payment.status !== 'pending') {
        await t.commit();
        return 'ignored';
      }

      const expectedMinor = toMinorUnits(toAmount(payment.amount));
      const amountMatches = paidAmountMinor === undefined || paidAmountMinor === expectedMinor;
      if (outcome === 'success' && !amountMatches) {
        logger.error('Top-up amount mismatch', { reference, expectedMinor, paidAmountMinor });
      }

      if (outcome === 'success' && amountMatches) {
        payment.status = 'success';
        payment.paid_at = new Date();
        if (payment.type === 'wallet_topup') {
          await this.wallet.credit(payment.brand_id, toAmount(payment.amount), t);
        }
        result = 'credited';
      } else {
        payment.status = 'failed';
        result = 'failed';
      }
      payment.gateway_response = gatewayResponse;
      await payment.save({ transaction: t });

      await t.commit();
    } catch (e) {
      await t.rollback();
      throw e;
    }

    logger.info('Top-up settled', { reference, result, brandId: payment.brand_id });
    if (result === 'credited' && payment.type === 'wallet_topup') await this.notifyCredited(payment);
    return result;
  }

  /** Signed gateway notification. Unsigned or tampered bodies are refused. */
  async handleWebhook(rawBody: Buffer | undefined, signature: string | undefined): Promise<SettlementResult> {
    if (!this.gateway.verifySignature(rawBody, signature)) {
      throw new AppError('Invalid signature', 400, 'INVALID_SIGNATURE');
    }

    let body: unknown;
    try {
      body = JSON.parse(String(rawBody));
    } catch {
      throw new AppError('Invalid JSON', 400);
    }
    const event = webhookEventSchema.parse(body);

    switch (event.event) {
      case 'charge.success':
        return this.settle(event.data.reference, 'success', event.data, event.data.amount);
      case 'charge.failed':
        return this.settle(event.data.reference, 'failed', event.data);
      default:
        logger.debug('Ignoring webhook event', { event: event.event });
        return 'ignored';
    }
  }

  /** Customer returned from checkout: ask the gateway directly. */
  async verifyTopUp(reference: string, brandId?: string): Promise<PaymentTransaction> {
    const payment = await this.ledger.findByReference(reference);
    if (!payment || (brandId && payment.brand_id !== brandId)) {
      throw new AppError('Transaction not found', 404);
    }
    if (payment.status === 'pending') {
      const verification = await this.gateway.verify(reference);
      if (verification.status === 'success') {
        await this.settle(reference, 'success', verification, verification.amount);
      } else if (verification.status === 'failed' || verification.status === 'abandoned') {
        await this.settle(reference, 'failed', verification);
      }
      await payment.reload();
    }
    return payment;
  }

  private async notifyCredited(payment: PaymentTransaction) {
    const brand = await Brand.findByPk(payment.brand_id, { include: [User] });
    await this.email.send(brand?.contact_email || brand?.user?.email, topUpCreditedEmail({
      reference: payment.reference,
      amount: toAmount(payment.amount).toFixed(2),
      currency: payment.currency,
      date: (payment.paid_at ?? new Date()).toISOString(),
    }));
  }

  async listTransactions(brandId: string) {
    return this.ledger.listForBrand(brandId);
  }
}

export const paymentService = new PaymentService();
