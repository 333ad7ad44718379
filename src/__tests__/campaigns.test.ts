import { describe, expect, it, jest } from '@jest/globals';
import { useTestDatabase, createBrand, createCampaign, createCurrency } from './helpers/db';
import { CampaignService } from '../services/CampaignService';
import { WalletService } from '../services/WalletService';
import { LedgerService } from '../services/LedgerService';
import { CurrencyService } from '../services/CurrencyService';
import { Brand } from '../models/Brand';
import { Campaign } from '../models/Campaign';
import { PaymentTransaction } from '../models/PaymentTransaction';
import { toAmount } from '../utils';

useTestDatabase();

const setup = async (balance = 1000) => {
  const usd = await createCurrency('USD', 1, true);
  const brand = await createBrand({ wallet_balance: balance, currency_id: usd.id });
  const ledger = new LedgerService();
  const wallet = new WalletService(new CurrencyService('USD'));
  return { brand, ledger, wallet, campaigns: new CampaignService(wallet, ledger) };
};

const balanceOf = async (brandId: string) => toAmount((await Brand.findByPk(brandId))?.wallet_balance);

const input = (brandId: string, budget: number) => ({
  brandId,
  title: 'Spring launch',
  platform: 'tiktok' as const,
  budget,
  packageVideos: 5,
});

describe('CampaignService', () => {
  it('debits the budget and records the payment', async () => {
    const { brand, campaigns } = await setup();

    const campaign = await campaigns.createCampaign(input(brand.id, 400));

    expect(campaign.status).toBe('draft');
    expect(campaign.currency).toBe('USD');
    expect(await balanceOf(brand.id)).toBe(600);
    const payments = await PaymentTransaction.findAll({ where: { campaign_id: campaign.id } });
    expect(payments).toHaveLength(1);
    expect(payments[0].type).toBe('campaign_payment');
    expect(payments[0].status).toBe('success');
    expect(payments[0].gateway).toBe('wallet');
    expect(toAmount(payments[0].amount)).toBe(400);
    expect(payments[0].reference).toMatch(/^CAMPAIGN_[0-9A-F]{12}$/);
  });

  it('refuses a budget above the balance without side effects', async () => {
    const { brand, campaigns } = await setup();

    await expect(campaigns.createCampaign(input(brand.id, 1500))).rejects.toMatchObject({
      statusCode: 400,
      code: 'INSUFFICIENT_BALANCE',
      message: 'Insufficient wallet balance: available 1000.00, required 1500.00',
    });
    expect(await Campaign.count()).toBe(0);
    expect(await balanceOf(brand.id)).toBe(1000);
  });

  it('rolls back the debit when the ledger write fails', async () => {
    const { brand, ledger, campaigns } = await setup();
    jest.spyOn(ledger, 'record').mockRejectedValueOnce(new Error('ledger unavailable'));

    await expect(campaigns.createCampaign(input(brand.id, 400))).rejects.toThrow('ledger unavailable');

    expect(await balanceOf(brand.id)).toBe(1000);
    expect(await Campaign.count()).toBe(0);
    expect(await PaymentTransaction.count()).toBe(0);
  });

  it('refuses paused brands', async () => {
    const { brand, campaigns } = await setup();
    await brand.update({ verification_status: 'paused' });

    await expect(campaigns.createCampaign(input(brand.id, 100))).rejects.toMatchObject({ statusCode: 403, code: 'BRAND_PAUSED' });
  });

  it('activates a paid campaign without charging again', async () => {
    const { brand, campaigns } = await setup();
    const campaign = await campaigns.createCampaign(input(brand.id, 400));

    const active = await campaigns.activateCampaign(campaign.id, brand.id);

    expect(active.status).toBe('active');
    expect(await balanceOf(brand.id)).toBe(600);
    expect(await PaymentTransaction.count({ where: { campaign_id: campaign.id } })).toBe(1);
  });

  it('charges an unpaid draft at activation, once', async () => {
    const { brand, campaigns } = await setup();
    const draft = await createCampaign(brand.id, { budget: 200, status: 'draft' });

    await campaigns.activateCampaign(draft.id, brand.id);
    await expect(campaigns.activateCampaign(draft.id, brand.id)).rejects.toMatchObject({ statusCode: 409, code: 'INVALID_STATUS' });

    expect(await balanceOf(brand.id)).toBe(800);
    expect(await PaymentTransaction.count({ where: { campaign_id: draft.id, type: 'campaign_payment' } })).toBe(1);
  });

  it("hides other brands' campaigns", async () => {
    const { brand, campaigns } = await setup();
    const other = await createBrand();
    const campaign = await campaigns.createCampaign(input(brand.id, 100));

    await expect(campaigns.getCampaign(campaign.id, other.id)).rejects.toMatchObject({ statusCode: 404 });
  });

  it('locks the budget once created', async () => {
    const { brand, campaigns } = await setup();
    const campaign = await campaigns.createCampaign(input(brand.id, 400));

    await expect(campaigns.updateCampaign(campaign.id, { budget: 500 }, brand.id)).rejects.toMatchObject({ code: 'BUDGET_LOCKED' });

    const updated = await campaigns.updateCampaign(campaign.id, { title: 'Summer launch', budget: 400 }, brand.id);
    expect(updated.title).toBe('Summer launch');
  });

  it('rejects a due date before the start date', async () => {
    const { brand, campaigns } = await setup();

    await expect(
      campaigns.createCampaign({ ...input(brand.id, 100), startDate: '2026-05-10', dueDate: '2026-05-01' })
    ).rejects.toMatchObject({ statusCode: 400, message: 'Due date cannot be before the start date' });
  });

  it('moves through pause, resume and completion', async () => {
    const { brand, campaigns } = await setup();
    const campaign = await campaigns.createCampaign(input(brand.id, 100));
    await campaigns.activateCampaign(campaign.id, brand.id);

    expect((await campaigns.setStatus(campaign.id, 'paused', brand.id)).status).toBe('paused');
    expect((await campaigns.setStatus(campaign.id, 'active', brand.id)).status).toBe('active');
    expect((await campaigns.setStatus(campaign.id, 'completed', brand.id)).status).toBe('completed');
    await expect(campaigns.setStatus(campaign.id, 'active', brand.id)).rejects.toMatchObject({ code: 'INVALID_STATUS' });
  });
});
