import { Brand, BrandVerificationStatus } from '../models/Brand';
import { Influencer, InfluencerVerificationStatus } from '../models/Influencer';
import { User } from '../models/User';
import { AppError } from '../utils/AppError';
import { logger } from '../utils/logger';
import { reviewDecisionEmail } from '../utils/notificationEmails';
import { EmailService, emailService } from './EmailService';

export type ReviewAction = 'approve' | 'reject' | 'request_info' | 'pause' | 'unpause';

export interface ReviewInput {
  action: ReviewAction;
  notes?: string | null;
}

type Reviewable = 'brand' | 'influencer';

/**
 * Status a review action moves to. `unpause` restores whatever was held
 * before the pause, defaulting to pending.
 */
const targetStatus = <S extends string>(
  action: ReviewAction,
  approved: S,
  pausedFrom: S | null | undefined,
  pending: S,
  rejected: S,
  requestInfo: S,
  paused: S
): S => {
  switch (action) {
    case 'approve':
      return approved;
    case 'reject':
      return rejected;
    case 'request_info':
      return requestInfo;
    case 'pause':
      return paused;
    case 'unpause':
      return pausedFrom ?? pending;
  }
};

export class AdminService {
  constructor(private readonly email: EmailService = emailService) {}

  async listBrands(status?: BrandVerificationStatus) {
    return Brand.findAll({ where: status ? { verification_status: status } : {}, order: [['created_at', 'ASC']] });
  }

  async listInfluencers(status?: InfluencerVerificationStatus) {
    return Influencer.findAll({ where: status ? { verification_status: status } : {}, order: [['created_at', 'ASC']] });
  }

  async reviewBrand(brandId: string, input: ReviewInput): Promise<Brand> {
    const brand = await Brand.findByPk(brandId, { include: [User] });
    if (!brand) throw new AppError('Brand not found', 404);
    this.assertTransition(brand.verification_status, input.action);

    const previous = brand.verification_status;
    const next = targetStatus<BrandVerificationStatus>(
      input.action, 'verified', brand.paused_from_status, 'pending', 'rejected', 'request_info', 'paused'
    );

    brand.verification_status = next;
    brand.verification_notes = input.notes ?? brand.verification_notes ?? null;
    if (input.action === 'pause') {
      brand.paused_from_status = previous;
      brand.pause_reason = input.notes ?? null;
    } else if (input.action === 'unpause') {
      brand.paused_from_status = null;
      brand.pause_reason = null;
    }
    if (next === 'verified' && !brand.verified_at) brand.verified_at = new Date();
    await brand.save();

    logger.info('Brand reviewed', { brandId, action: input.action, from: previous, to: next });
    await this.notify(brand.user?.email, brand.company_name, 'brand', next, input.notes);
    return brand;
  }

  async reviewInfluencer(influencerId: string, input: ReviewInput): Promise<Influencer> {
    const influencer = await Influencer.findByPk(influencerId, { include: [User] });
    if (!influencer) throw new AppError('Influencer not found', 404);
    this.assertTransition(influencer.verification_status, input.action);

    const previous = influencer.verification_status;
    const next = targetStatus<InfluencerVerificationStatus>(
      input.action, 'approved', influencer.paused_from_status, 'pending', 'rejected', 'request_info', 'paused'
    );

    influencer.verification_status = next;
    influencer.verification_notes = input.notes ?? influencer.verification_notes ?? null;
    if (input.action === 'pause') {
      influencer.paused_from_status = previous;
      influencer.pause_reason = input.notes ?? null;
    } else if (input.action === 'unpause') {
      influencer.paused_from_status = null;
      influencer.pause_reason = null;
    }
    if (next === 'approved' && !influencer.verified_at) influencer.verified_at = new Date();
    await influencer.save();

    logger.info('Influencer reviewed', { influencerId, action: input.action, from: previous, to: next });
    await this.notify(influencer.user?.email, influencer.display_name, 'influencer', next, input.notes);
    return influencer;
  }

  /** Pausing twice would lose the status to restore; unpausing needs a pause. */
  private assertTransition(current: string, action: ReviewAction) {
    if (action === 'pause' && current === 'paused') {
      throw new AppError('Account is already paused', 409, 'INVALID_STATUS');
    }
    if (action === 'unpause' && current !== 'paused') {
      throw new AppError('Account is not paused', 409, 'INVALID_STATUS');
    }
  }

  private async notify(to: string | undefined, name: string, subject: Reviewable, decision: string, notes?: string | null) {
    await this.email.send(to, reviewDecisionEmail({ name, subject, decision, notes }));
  }
}

export const adminService = new AdminService();
