import { Transaction } from 'sequelize';
import { Brand } from '../models/Brand';
import { AppError } from '../utils/AppError';
import { roundMoney, toAmount } from '../utils';
import { CurrencyService, currencyService } from './CurrencyService';

export interface WalletBalance {
  brandId: string;
  balance: number;
  currency: string;
}

export class WalletService {
  constructor(private readonly currencies: CurrencyService = currencyService) {}

  /** Load the brand row, locked for the rest of `transaction`. */
  async lockBrand(brandId: string, transaction: Transaction): Promise<Brand> {
    const brand = await Brand.findByPk(brandId, { transaction, lock: transaction.LOCK.UPDATE });
    if (!brand) throw new AppError('Brand not found', 404);
    return brand;
  }

  async currencyCode(brand: Brand, transaction?: Transaction): Promise<string> {
    const currency = await this.currencies.findById(brand.currency_id, transaction);
    return currency ? currency.code : this.currencies.getDefaultCode(transaction);
  }

  async getBalance(brandId: string): Promise<WalletBalance> {
    const brand = await Brand.findByPk(brandId);
    if (!brand) throw new AppError('Brand not found', 404);
    return {
      brandId: brand.id,
      balance: roundMoney(toAmount(brand.wallet_balance)),
      currency: await this.currencyCode(brand),
    };
  }

  async credit(brandId: string, amount: number, transaction: Transaction): Promise<Brand> {
    if (!(amount > 0)) throw new AppError('Amount must be positive', 400);
    const brand = await this.lockBrand(brandId, transaction);
    await brand.increment('wallet_balance', { by: amount, transaction });
    return brand.reload({ transaction });
  }

  /**
   * Take `amount` from the wallet. Rejects before touching the row when the
   * balance would go negative.
   */
  async debit(brandId: string, amount: number, transaction: Transaction): Promise<Brand> {
    if (!(amount > 0)) throw new AppError('Amount must be positive', 400);
    const brand = await this.lockBrand(brandId, transaction);
    const balance = toAmount(brand.wallet_balance);
    if (balance < amount) {
      throw new AppError(
        `Insufficient wallet balance: available ${balance.toFixed(2)}, required ${amount.toFixed(2)}`,
        400,
        'INSUFFICIENT_BALANCE'
      );
    }
    await brand.decrement('wallet_balance', { by: amount, transaction });
    return brand.reload({ transaction });
  }
}

export const walletService = new WalletService();
