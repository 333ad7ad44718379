import { Transaction } from 'sequelize';
import { sequelize } from '../config/database';
import { PaymentMethod, PaymentMethodType } from '../models/PaymentMethod';
import { AppError } from '../utils/AppError';

export interface PaymentMethodInput {
  methodType: PaymentMethodType;
  accountName: string;
  accountNumber: string;
  provider: string;
  isDefault?: boolean;
}

export class PaymentMethodService {
  async list(influencerId: string) {
    return PaymentMethod.findAll({
      where: { influencer_id: influencerId, is_active: true },
      order: [['is_default', 'DESC'], ['created_at', 'ASC']],
    });
  }

  async getDefault(influencerId: string, transaction?: Transaction) {
    return PaymentMethod.findOne({ where: { influencer_id: influencerId, is_default: true, is_active: true }, transaction });
  }

  private async find(influencerId: string, methodId: string, transaction?: Transaction) {
    const method = await PaymentMethod.findByPk(methodId, { transaction });
    if (!method || method.influencer_id !== influencerId) throw new AppError('Payment method not found', 404);
    return method;
  }

  /** Clear the influencer's other defaults inside `t`. */
  private async clearDefault(influencerId: string, exceptId: string | null, t: Transaction) {
    const rows = await PaymentMethod.findAll({
      where: { influencer_id: influencerId, is_default: true },
      transaction: t,
      lock: t.LOCK.UPDATE,
    });
    for (const row of rows) {
      if (row.id === exceptId) continue;
      row.is_default = false;
      await row.save({ transaction: t });
    }
  }

  /** The first method an influencer adds becomes their default. */
  async add(influencerId: string, input: PaymentMethodInput): Promise<PaymentMethod> {
    const t = await sequelize.transaction();
    try {
      const count = await PaymentMethod.count({ where: { influencer_id: influencerId, is_active: true }, transaction: t });
      const isDefault = input.isDefault === true || count === 0;
      if (isDefault) await this.clearDefault(influencerId, null, t);

      const method = await PaymentMethod.create({
        influencer_id: influencerId,
        method_type: input.methodType,
        account_name: input.accountName,
        account_number: input.accountNumber,
        provider: input.provider,
        is_default: isDefault,
      }, { transaction: t });
      await t.commit();
      return method;
    } catch (e) {
      await t.rollback();
      throw e;
    }
  }

  async update(influencerId: string, methodId: string, input: Partial<Omit<PaymentMethodInput, 'isDefault'>>) {
    const method = await this.find(influencerId, methodId);
    if (input.methodType !== undefined) method.method_type = input.methodType;
    if (input.accountName !== undefined) method.account_name = input.accountName;
    if (input.accountNumber !== undefined) method.account_number = input.accountNumber;
    if (input.provider !== undefined) method.provider = input.provider;
    return method.save();
  }

  async remove(influencerId: string, methodId: string): Promise<void> {
    const method = await this.find(influencerId, methodId);
    await method.destroy();
  }

  /** Exactly one default per influencer: the old one is cleared in the same transaction. */
  async setDefault(influencerId: string, methodId: string): Promise<PaymentMethod> {
    const t = await sequelize.transaction();
    try {
      const method = await this.find(influencerId, methodId, t);
      await this.clearDefault(influencerId, method.id, t);
      method.is_default = true;
      await method.save({ transaction: t });
      await t.commit();
      return method;
    } catch (e) {
      await t.rollback();
      throw e;
    }
  }
}

export const paymentMethodService = new PaymentMethodService();

/** Mask all but the last four digits. */
export const maskAccountNumber = (accountNumber: string): string =>
  accountNumber.length <= 4 ? accountNumber : `${'*'.repeat(accountNumber.length - 4)}${accountNumber.slice(-4)}`;
