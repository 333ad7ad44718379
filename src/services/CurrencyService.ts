import { Transaction } from 'sequelize';
import { sequelize } from '../config/database';
import { settings } from '../config/settings';
import { Currency } from '../models/Currency';
import { AppError } from '../utils/AppError';
import { roundMoney } from '../utils';
import { logger } from '../utils/logger';

export interface CurrencyRate {
  code: string;
  exchange_rate: number | string;
}

export interface CurrencyInput {
  code: string;
  name: string;
  symbol: string;
  exchangeRate: number;
  isDefault?: boolean;
  isActive?: boolean;
}

/**
 * Hub-and-spoke conversion: every rate is expressed in units of the default
 * currency, so A → B goes A → default → B. The default's own stored rate is
 * never applied, and without a default the amount is returned unchanged.
 */
export const convertAmount = (
  amount: number,
  from: CurrencyRate | null | undefined,
  to: CurrencyRate | null | undefined,
  base: Pick<CurrencyRate, 'code'> | null | undefined
): number => {
  if (!from || !to || from.code === to.code || !base) return amount;
  const inDefault = from.code === base.code ? amount : amount * Number(from.exchange_rate);
  return roundMoney(to.code === base.code ? inDefault : inDefault / Number(to.exchange_rate));
};

export class CurrencyService {
  constructor(private readonly defaultCode: string = settings.currency.defaultCode) {}

  async getDefault(transaction?: Transaction): Promise<Currency | null> {
    const flagged = await Currency.findOne({ where: { is_default: true }, transaction });
    if (flagged) return flagged;
    return Currency.findOne({ where: { code: this.defaultCode }, transaction });
  }

  async getDefaultCode(transaction?: Transaction): Promise<string> {
    const currency = await this.getDefault(transaction);
    return currency ? currency.code : this.defaultCode;
  }

  async findById(id: string | null | undefined, transaction?: Transaction): Promise<Currency | null> {
    if (!id) return null;
    return Currency.findByPk(id, { transaction });
  }

  async findByCode(code: string, transaction?: Transaction): Promise<Currency | null> {
    return Currency.findOne({ where: { code: code.toUpperCase() }, transaction });
  }

  async list(activeOnly = true) {
    return Currency.findAll({
      where: activeOnly ? { is_active: true } : {},
      order: [['is_default', 'DESC'], ['code', 'ASC']],
    });
  }

  /** Clear every other default inside `t`. */
  private async clearDefault(exceptId: string | null, t: Transaction) {
    const rows = await Currency.findAll({ where: { is_default: true }, transaction: t, lock: t.LOCK.UPDATE });
    for (const row of rows) {
      if (row.id === exceptId) continue;
      row.is_default = false;
      await row.save({ transaction: t });
    }
  }

  async create(input: CurrencyInput): Promise<Currency> {
    if (input.exchangeRate <= 0) throw new AppError('Exchange rate must be positive', 400);

    const t = await sequelize.transaction();
    try {
      if (input.isDefault) await this.clearDefault(null, t);
      const currency = await Currency.create({
        code: input.code.toUpperCase(),
        name: input.name,
        symbol: input.symbol,
        exchange_rate: input.exchangeRate,
        is_default: input.isDefault ?? false,
        is_active: input.isActive ?? true,
      }, { transaction: t });
      await t.commit();
      return currency;
    } catch (e) {
      await t.rollback();
      throw e;
    }
  }

  async updateRate(id: string, exchangeRate: number): Promise<Currency> {
    if (exchangeRate <= 0) throw new AppError('Exchange rate must be positive', 400);
    const currency = await Currency.findByPk(id);
    if (!currency) throw new AppError('Currency not found', 404);
    currency.exchange_rate = exchangeRate;
    return currency.save();
  }

  /**
   * Make `id` the only default. The previous default is cleared in the same
   * transaction, so readers never see zero or two defaults.
   */
  async setDefault(id: string): Promise<Currency> {
    const t = await sequelize.transaction();
    try {
      const currency = await Currency.findByPk(id, { transaction: t, lock: t.LOCK.UPDATE });
      if (!currency) throw new AppError('Currency not found', 404);
      if (!currency.is_active) throw new AppError('Inactive currency cannot be the default', 400);

      await this.clearDefault(currency.id, t);
      currency.is_default = true;
      await currency.save({ transaction: t });

      await t.commit();
      logger.info('Default currency changed', { code: currency.code });
      return currency;
    } catch (e) {
      await t.rollback();
      throw e;
    }
  }

  /** Seed the configured default currency at rate 1 when none is flagged. */
  async ensureDefault(): Promise<Currency> {
    const existing = await this.getDefault();
    if (existing) return existing;
    const currency = await this.create({
      code: this.defaultCode,
      name: this.defaultCode,
      symbol: this.defaultCode,
      exchangeRate: 1,
      isDefault: true,
    });
    logger.info('Default currency seeded', { code: currency.code });
    return currency;
  }

  async convert(
    amount: number,
    from: CurrencyRate | null | undefined,
    to: CurrencyRate | null | undefined,
    transaction?: Transaction
  ): Promise<number> {
    if (!from || !to || from.code === to.code) return amount;
    return convertAmount(amount, from, to, await this.getDefault(transaction));
  }
}

export const currencyService = new CurrencyService();
