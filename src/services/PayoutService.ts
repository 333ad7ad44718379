import { Op } from 'sequelize';
import { sequelize } from '../config/database';
import { settings } from '../config/settings';
import { Payout } from '../models/Payout';
import { Submission } from '../models/Submission';
import { Influencer } from '../models/Influencer';
import { AppError } from '../utils/AppError';
import { roundMoney, toAmount, toDateOnly } from '../utils';
import { logger } from '../utils/logger';
import { Currency } from '../models/Currency';
import { CurrencyService, currencyService } from './CurrencyService';
import { PaymentMethodService, paymentMethodService, maskAccountNumber } from './PaymentMethodService';
import { EmailService, emailService } from './EmailService';
import { User } from '../models/User';
import { payoutSentEmail } from '../utils/notificationEmails';

export interface WalletSummary {
  currency: string;
  /** Pending payouts whose submission has been verified. */
  available: number;
  /** Pending payouts still waiting on a new or in-review submission. */
  pendingClearance: number;
  totalEarned: number;
  overdue: number;
  overdueCount: number;
}

export interface WithdrawalRequest {
  influencerId: string;
  amount: number;
  currency: string;
  minimum: number;
  payoutIds: string[];
  paymentMethod: {
    id: string;
    methodType: string;
    provider: string;
    accountNumber: string;
  };
}

export class PayoutService {
  constructor(
    private readonly currencies: CurrencyService = currencyService,
    private readonly paymentMethods: PaymentMethodService = paymentMethodService,
    private readonly minimumWithdrawal: number = settings.currency.minimumWithdrawal,
    private readonly clock: () => Date = () => new Date(),
    private readonly email: EmailService = emailService
  ) {}

  private async settlementCurrency(influencer: Influencer): Promise<Currency | null> {
    return (await this.currencies.findById(influencer.currency_id)) ?? (await this.currencies.getDefault());
  }

  /**
   * Payouts keep the currency they were accepted in, so a changed settlement
   * currency converts each one before adding them up.
   */
  private async sum(payouts: Payout[], target: Currency | null): Promise<number> {
    const rates = new Map<string, Currency | null>();
    let total = 0;
    for (const payout of payouts) {
      const amount = toAmount(payout.amount);
      if (!target || payout.currency === target.code) {
        total += amount;
        continue;
      }
      if (!rates.has(payout.currency)) rates.set(payout.currency, await this.currencies.findByCode(payout.currency));
      total += await this.currencies.convert(amount, rates.get(payout.currency), target);
    }
    return roundMoney(total);
  }

  private async findInfluencer(influencerId: string): Promise<Influencer> {
    const influencer = await Influencer.findByPk(influencerId);
    if (!influencer) throw new AppError('Influencer not found', 404);
    return influencer;
  }

  private async pendingWithSubmission(influencerId: string, submissionStatuses: Submission['status'][]) {
    return Payout.findAll({
      where: { influencer_id: influencerId, status: 'pending' },
      include: [{ model: Submission, where: { status: { [Op.in]: submissionStatuses } }, required: true }],
      order: [['due_date', 'ASC']],
    });
  }

  async walletSummary(influencerId: string): Promise<WalletSummary> {
    const influencer = await this.findInfluencer(influencerId);
    const today = toDateOnly(this.clock());

    const [available, clearing, sent, overdue] = await Promise.all([
      this.pendingWithSubmission(influencer.id, ['verified']),
      this.pendingWithSubmission(influencer.id, ['new', 'in_review']),
      Payout.findAll({ where: { influencer_id: influencer.id, status: 'sent' } }),
      Payout.findAll({ where: { influencer_id: influencer.id, status: 'pending', due_date: { [Op.lt]: today } } }),
    ]);

    const target = await this.settlementCurrency(influencer);
    return {
      currency: target?.code ?? (await this.currencies.getDefaultCode()),
      available: await this.sum(available, target),
      pendingClearance: await this.sum(clearing, target),
      totalEarned: await this.sum(sent, target),
      overdue: await this.sum(overdue, target),
      overdueCount: overdue.length,
    };
  }

  async listForInfluencer(influencerId: string) {
    return Payout.findAll({
      where: { influencer_id: influencerId },
      include: [Submission],
      order: [['due_date', 'DESC']],
    });
  }

  /**
   * Ask for the available balance to be paid out. The minimum is defined in
   * the default currency and converted to the influencer's before comparing.
   * Payouts stay pending until an operator marks them sent.
   */
  async requestWithdrawal(influencerId: string): Promise<WithdrawalRequest> {
    const influencer = await this.findInfluencer(influencerId);
    const payouts = await this.pendingWithSubmission(influencer.id, ['verified']);
    if (payouts.length === 0) {
      throw new AppError('No funds available for withdrawal', 400, 'NOTHING_TO_WITHDRAW');
    }

    const target = await this.settlementCurrency(influencer);
    const amount = await this.sum(payouts, target);
    const minimum = await this.currencies.convert(this.minimumWithdrawal, await this.currencies.getDefault(), target);
    const currency = target?.code ?? (await this.currencies.getDefaultCode());
    if (amount < minimum) {
      throw new AppError(
        `Minimum withdrawal amount is ${currency} ${minimum.toFixed(2)}`,
        400,
        'BELOW_MINIMUM_WITHDRAWAL',
        { available: amount, minimum }
      );
    }

    const method = await this.paymentMethods.getDefault(influencer.id);
    if (!method) {
      throw new AppError('Add a default payment method before withdrawing', 400, 'NO_PAYMENT_METHOD');
    }

    const request: WithdrawalRequest = {
      influencerId: influencer.id,
      amount,
      currency,
      minimum,
      payoutIds: payouts.map((p) => p.id),
      paymentMethod: {
        id: method.id,
        methodType: method.method_type,
        provider: method.provider,
        accountNumber: maskAccountNumber(method.account_number),
      },
    };
    logger.info('Withdrawal requested', { ...request, paymentMethod: request.paymentMethod.id });
    return request;
  }

  /** pending → sent. Retrying a failed payout is allowed. */
  async markSent(payoutId: string, reference?: string | null): Promise<Payout> {
    const t = await sequelize.transaction();
    let payout: Payout | null;
    try {
      payout = await Payout.findByPk(payoutId, { transaction: t, lock: t.LOCK.UPDATE });
      if (!payout) throw new AppError('Payout not found', 404);
      if (payout.status === 'sent') throw new AppError('Payout already sent', 409, 'ALREADY_SENT');

      payout.status = 'sent';
      payout.reference = reference ?? payout.reference ?? null;
      payout.sent_at = this.clock();
      payout.failure_reason = null;
      await payout.save({ transaction: t });
      await t.commit();
    } catch (e) {
      await t.rollback();
      throw e;
    }

    logger.info('Payout sent', { payoutId: payout.id, amount: toAmount(payout.amount), currency: payout.currency });
    const influencer = await Influencer.findByPk(payout.influencer_id, { include: [User] });
    await this.email.send(influencer?.user?.email, payoutSentEmail({
      payoutId: payout.id,
      amount: toAmount(payout.amount).toFixed(2),
      currency: payout.currency,
      reference: payout.reference,
      date: toDateOnly(payout.sent_at ?? this.clock()),
    }));
    return payout;
  }

  async markFailed(payoutId: string, reason: string): Promise<Payout> {
    const payout = await Payout.findByPk(payoutId);
    if (!payout) throw new AppError('Payout not found', 404);
    if (payout.status === 'sent') throw new AppError('Payout already sent', 409, 'ALREADY_SENT');

    payout.status = 'failed';
    payout.failure_reason = reason;
    await payout.save();
    logger.warn('Payout failed', { payoutId: payout.id, reason });
    return payout;
  }

  async listOverdue() {
    return Payout.findAll({
      where: { status: 'pending', due_date: { [Op.lt]: toDateOnly(this.clock()) } },
      include: [Submission],
      order: [['due_date', 'ASC']],
    });
  }
}

export const payoutService = new PayoutService();
