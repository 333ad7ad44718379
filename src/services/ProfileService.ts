import { Brand } from '../models/Brand';
import { Influencer } from '../models/Influencer';
import { PlatformConnection } from '../models/PlatformConnection';
import { AppError } from '../utils/AppError';
import { logger, errorMessage } from '../utils/logger';
import { CurrencyService, currencyService } from './CurrencyService';
import { VerificationQueueService, verificationQueueService } from './VerificationQueueService';
import type { SupportedPlatform } from '../types/platform';

export interface BrandProfileInput {
  companyName?: string;
  industry?: string | null;
  description?: string | null;
  website?: string | null;
  contactEmail?: string | null;
  contactPhone?: string | null;
  currencyCode?: string;
}

export interface InfluencerProfileInput {
  displayName?: string;
  bio?: string | null;
  niche?: string | null;
  primaryPlatform?: SupportedPlatform | null;
  country?: string | null;
  currencyCode?: string;
}

export const isBrandProfileComplete = (brand: Pick<Brand, 'company_name' | 'industry'>): boolean =>
  Boolean(brand.company_name?.trim() && brand.industry?.trim());

export class ProfileService {
  constructor(
    private readonly queue: VerificationQueueService = verificationQueueService,
    private readonly currencies: CurrencyService = currencyService
  ) {}

  async brandForUser(userId: string): Promise<Brand> {
    const brand = await Brand.findOne({ where: { user_id: userId } });
    if (!brand) throw new AppError('Brand profile not found', 404);
    return brand;
  }

  async influencerForUser(userId: string): Promise<Influencer> {
    const influencer = await Influencer.findOne({ where: { user_id: userId } });
    if (!influencer) throw new AppError('Influencer profile not found', 404);
    return influencer;
  }

  private async currencyId(code: string): Promise<string> {
    const currency = await this.currencies.findByCode(code);
    if (!currency || !currency.is_active) throw new AppError(`Unsupported currency: ${code}`, 400);
    return currency.id;
  }

  /** A failed schedule never fails the profile save; the admin batch catches stragglers. */
  private async scheduleQuietly(kind: 'brand' | 'influencer', subjectId: string) {
    try {
      await this.queue.schedule(kind, subjectId);
      return true;
    } catch (error) {
      logger.error('Failed to schedule verification', { kind, subjectId, error: errorMessage(error) });
      return false;
    }
  }

  /**
   * Save brand details. Completing the profile (name and industry) queues
   * an automated review while the brand is still unverified.
   */
  async updateBrand(userId: string, input: BrandProfileInput) {
    const brand = await this.brandForUser(userId);
    if (input.companyName !== undefined) brand.company_name = input.companyName;
    if (input.industry !== undefined) brand.industry = input.industry;
    if (input.description !== undefined) brand.description = input.description;
    if (input.website !== undefined) brand.website = input.website;
    if (input.contactEmail !== undefined) brand.contact_email = input.contactEmail;
    if (input.contactPhone !== undefined) brand.contact_phone = input.contactPhone;
    if (input.currencyCode !== undefined) brand.currency_id = await this.currencyId(input.currencyCode);
    if (brand.verification_status === 'request_info') brand.verification_status = 'pending';
    await brand.save();

    const scheduled = brand.verification_status === 'pending' && isBrandProfileComplete(brand)
      ? await this.scheduleQuietly('brand', brand.id)
      : false;
    return { brand, verificationScheduled: scheduled };
  }

  async updateInfluencer(userId: string, input: InfluencerProfileInput) {
    const influencer = await this.influencerForUser(userId);
    if (input.displayName !== undefined) influencer.display_name = input.displayName;
    if (input.bio !== undefined) influencer.bio = input.bio;
    if (input.niche !== undefined) influencer.niche = input.niche;
    if (input.primaryPlatform !== undefined) influencer.primary_platform = input.primaryPlatform;
    if (input.country !== undefined) influencer.country = input.country;
    if (input.currencyCode !== undefined) influencer.currency_id = await this.currencyId(input.currencyCode);
    return influencer.save();
  }

  /** Finish onboarding: at least one platform must be connected. */
  async completeInfluencerOnboarding(userId: string, input: InfluencerProfileInput) {
    const influencer = await this.updateInfluencer(userId, input);
    const connections = await PlatformConnection.count({ where: { influencer_id: influencer.id } });
    if (connections === 0) {
      throw new AppError('Connect at least one platform before continuing', 400, 'NO_PLATFORMS');
    }
    if (!influencer.niche || !influencer.primary_platform) {
      throw new AppError('Niche and primary platform are required', 400);
    }
    if (influencer.verification_status === 'request_info') {
      influencer.verification_status = 'pending';
      await influencer.save();
    }

    const scheduled = influencer.verification_status === 'pending'
      ? await this.scheduleQuietly('influencer', influencer.id)
      : false;
    return { influencer, verificationScheduled: scheduled };
  }
}

export const profileService = new ProfileService();
