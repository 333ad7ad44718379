import { sequelize } from '../config/database';
import { Campaign, CampaignStatus } from '../models/Campaign';
import { AppError } from '../utils/AppError';
import { roundMoney, toAmount } from '../utils';
import { logger } from '../utils/logger';
import { WalletService, walletService } from './WalletService';
import { LedgerService, ledgerService, generateReference } from './LedgerService';
import type { CampaignPlatform } from '../types/platform';

export interface CreateCampaignInput {
  brandId: string;
  title: string;
  description?: string | null;
  platform: CampaignPlatform;
  niche?: string | null;
  budget: number;
  packageVideos: number;
  startDate?: string | null;
  dueDate?: string | null;
}

export interface UpdateCampaignInput {
  title?: string;
  description?: string | null;
  niche?: string | null;
  packageVideos?: number;
  startDate?: string | null;
  dueDate?: string | null;
  budget?: number;
}

const EDITABLE_STATUSES: readonly CampaignStatus[] = ['draft', 'paused'];

const assertDates = (startDate?: string | null, dueDate?: string | null) => {
  if (startDate && dueDate && dueDate < startDate) {
    throw new AppError('Due date cannot be before the start date', 400);
  }
};

export class CampaignService {
  constructor(
    private readonly wallet: WalletService = walletService,
    private readonly ledger: LedgerService = ledgerService
  ) {}

  async getCampaign(campaignId: string, brandId?: string): Promise<Campaign> {
    const campaign = await Campaign.findByPk(campaignId);
    if (!campaign || (brandId && campaign.brand_id !== brandId)) {
      throw new AppError('Campaign not found', 404);
    }
    return campaign;
  }

  async listForBrand(brandId: string) {
    return Campaign.findAll({ where: { brand_id: brandId }, order: [['created_at', 'DESC']] });
  }

  async listActive(platform?: CampaignPlatform) {
    return Campaign.findAll({
      where: { status: 'active', ...(platform ? { platform } : {}) },
      order: [['created_at', 'DESC']],
    });
  }

  /**
   * Create a draft campaign and pay for it from the brand wallet. The
   * balance check, campaign row, debit and ledger record share one
   * transaction: any failure leaves the wallet as it was.
   */
  async createCampaign(input: CreateCampaignInput): Promise<Campaign> {
    const budget = roundMoney(input.budget);
    if (!(budget > 0)) throw new AppError('Budget must be positive', 400);
    if (!Number.isInteger(input.packageVideos) || input.packageVideos < 1) {
      throw new AppError('package_videos must be a positive integer', 400);
    }
    assertDates(input.startDate, input.dueDate);

    const t = await sequelize.transaction();
    try {
      const brand = await this.wallet.lockBrand(input.brandId, t);
      if (brand.verification_status === 'paused') {
        throw new AppError('Brand account is paused', 403, 'BRAND_PAUSED');
      }
      const currency = await this.wallet.currencyCode(brand, t);

      const campaign = await Campaign.create({
        brand_id: brand.id,
        title: input.title,
        description: input.description ?? null,
        platform: input.platform,
        niche: input.niche ?? null,
        budget,
        package_videos: input.packageVideos,
        currency,
        start_date: input.startDate ?? null,
        due_date: input.dueDate ?? null,
        status: 'draft',
      }, { transaction: t });

      await this.wallet.debit(brand.id, budget, t);

      await this.ledger.record({
        brandId: brand.id,
        campaignId: campaign.id,
        type: 'campaign_payment',
        amount: budget,
        currency,
        reference: generateReference('CAMPAIGN'),
        transaction: t,
      });

      await t.commit();
      logger.info('Campaign created', { campaignId: campaign.id, brandId: brand.id, budget, currency });
      return campaign;
    } catch (e) {
      await t.rollback();
      throw e;
    }
  }

  /**
   * Draft → active. Campaigns paid at creation just switch status; one
   * without a payment record is charged now, in the same transaction.
   */
  async activateCampaign(campaignId: string, brandId?: string): Promise<Campaign> {
    const t = await sequelize.transaction();
    try {
      const campaign = await Campaign.findByPk(campaignId, { transaction: t, lock: t.LOCK.UPDATE });
      if (!campaign || (brandId && campaign.brand_id !== brandId)) {
        throw new AppError('Campaign not found', 404);
      }
      if (campaign.status !== 'draft') {
        throw new AppError('Only draft campaigns can be activated', 409, 'INVALID_STATUS');
      }

      const existing = await this.ledger.findCampaignPayment(campaign.id, t);
      if (!existing) {
        const budget = roundMoney(toAmount(campaign.budget));
        const brand = await this.wallet.debit(campaign.brand_id, budget, t);
        await this.ledger.record({
          brandId: campaign.brand_id,
          campaignId: campaign.id,
          type: 'campaign_payment',
          amount: budget,
          currency: campaign.currency ?? await this.wallet.currencyCode(brand, t),
          reference: generateReference('CAMPAIGN'),
          transaction: t,
        });
        logger.warn('Campaign charged at activation', { campaignId: campaign.id, budget });
      }

      campaign.status = 'active';
      await campaign.save({ transaction: t });

      await t.commit();
      logger.info('Campaign activated', { campaignId: campaign.id });
      return campaign;
    } catch (e) {
      await t.rollback();
      throw e;
    }
  }

  /** Only draft or paused campaigns can change, and never their budget. */
  async updateCampaign(campaignId: string, input: UpdateCampaignInput, brandId?: string): Promise<Campaign> {
    const campaign = await this.getCampaign(campaignId, brandId);
    if (!EDITABLE_STATUSES.includes(campaign.status)) {
      throw new AppError('Cannot edit active or completed campaigns', 409, 'INVALID_STATUS');
    }
    if (input.budget !== undefined && roundMoney(input.budget) !== roundMoney(toAmount(campaign.budget))) {
      throw new AppError('Budget cannot be changed after campaign creation', 400, 'BUDGET_LOCKED');
    }
    if (input.packageVideos !== undefined && (!Number.isInteger(input.packageVideos) || input.packageVideos < 1)) {
      throw new AppError('package_videos must be a positive integer', 400);
    }

    const startDate = input.startDate !== undefined ? input.startDate : campaign.start_date;
    const dueDate = input.dueDate !== undefined ? input.dueDate : campaign.due_date;
    assertDates(startDate, dueDate);

    if (input.title !== undefined) campaign.title = input.title;
    if (input.description !== undefined) campaign.description = input.description;
    if (input.niche !== undefined) campaign.niche = input.niche;
    if (input.packageVideos !== undefined) campaign.package_videos = input.packageVideos;
    campaign.start_date = startDate;
    campaign.due_date = dueDate;
    return campaign.save();
  }

  /** Pause, resume or complete a campaign that has already been activated. */
  async setStatus(campaignId: string, status: Extract<CampaignStatus, 'active' | 'paused' | 'completed'>, brandId?: string): Promise<Campaign> {
    const campaign = await this.getCampaign(campaignId, brandId);
    const allowedFrom: Record<typeof status, readonly CampaignStatus[]> = {
      active: ['paused'],
      paused: ['active'],
      completed: ['active', 'paused'],
    };
    if (!allowedFrom[status].includes(campaign.status)) {
      throw new AppError(`Cannot move a ${campaign.status} campaign to ${status}`, 409, 'INVALID_STATUS');
    }
    campaign.status = status;
    return campaign.save();
  }
}

export const campaignService = new CampaignService();
