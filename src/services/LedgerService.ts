import { randomBytes } from 'crypto';
import { Transaction } from 'sequelize';
import {
  PaymentTransaction,
  PaymentTransactionType,
  PaymentTransactionStatus,
  PaymentGateway,
} from '../models/PaymentTransaction';

/** `PREFIX_` followed by 12 upper-case hex characters. */
export const generateReference = (prefix: string): string =>
  `${prefix}_${randomBytes(6).toString('hex').toUpperCase()}`;

export class LedgerService {
  /**
   * Record a payment transaction. Wallet movements MUST pass their
   * transaction so the record commits or rolls back with them.
   */
  async record({
    brandId,
    campaignId,
    type,
    amount,
    currency,
    reference,
    status = 'success',
    gateway = 'wallet',
    authorizationUrl,
    gatewayResponse,
    paidAt,
    transaction,
  }: {
    brandId: string;
    campaignId?: string | null;
    type: PaymentTransactionType;
    amount: number;
    currency: string;
    reference: string;
    status?: PaymentTransactionStatus;
    gateway?: PaymentGateway;
    authorizationUrl?: string | null;
    gatewayResponse?: Record<string, unknown> | null;
    paidAt?: Date | null;
    transaction?: Transaction;
  }): Promise<PaymentTransaction> {
    return PaymentTransaction.create({
      brand_id: brandId,
      campaign_id: campaignId ?? null,
      type,
      amount,
      currency,
      reference,
      status,
      gateway,
      authorization_url: authorizationUrl ?? null,
      gateway_response: gatewayResponse ?? null,
      paid_at: paidAt ?? (status === 'success' ? new Date() : null),
    }, { transaction });
  }

  async findCampaignPayment(campaignId: string, transaction?: Transaction) {
    return PaymentTransaction.findOne({
      where: { campaign_id: campaignId, type: 'campaign_payment', status: 'success' },
      transaction,
    });
  }

  async findByReference(reference: string, transaction?: Transaction) {
    return PaymentTransaction.findOne({ where: { reference }, transaction, lock: transaction?.LOCK.UPDATE });
  }

  async listForBrand(brandId: string, limit = 50) {
    return PaymentTransaction.findAll({
      where: { brand_id: brandId },
      order: [['created_at', 'DESC']],
      limit,
    });
  }
}

export const ledgerService = new LedgerService();
