import { Request, Response } from 'express';
import { z } from 'zod';
import { serviceHandler } from '../utils';
import { currentAuth } from '../middlewares/auth';
import { profileService } from '../services/ProfileService';
import { walletService } from '../services/WalletService';
import { paymentService } from '../services/PaymentService';
import { VerificationQueueItem } from '../models/VerificationQueueItem';

const optionalText = (max: number) => z.string().trim().max(max).nullable().optional();

const profileSchema = z.object({
  company_name: z.string().trim().min(1).max(200).optional(),
  industry: optionalText(100),
  description: optionalText(5000),
  website: z.string().trim().url().max(255).nullable().optional(),
  contact_email: z.string().trim().email().nullable().optional(),
  contact_phone: optionalText(30),
  currency: z.string().length(3).optional(),
});

const topUpSchema = z.object({
  amount: z.coerce.number().positive(),
});

export class BrandController {

    static getProfile = serviceHandler(async (req: Request, res: Response) => {
        const brand = await profileService.brandForUser(currentAuth(req).userId);
        const queued = await VerificationQueueItem.findOne({
            where: { subject_type: 'brand', subject_id: brand.id, processed: false },
        });
        res.json({
            success: true,
            brand,
            verification: {
                status: brand.verification_status,
                confidence: brand.verification_confidence ?? null,
                flags: brand.verification_flags,
                scheduled_at: queued?.scheduled_at ?? null,
            },
        });
    });

    static updateProfile = serviceHandler(async (req: Request, res: Response) => {
        const body = profileSchema.parse(req.body);
        const { brand, verificationScheduled } = await profileService.updateBrand(currentAuth(req).userId, {
            companyName: body.company_name,
            industry: body.industry,
            description: body.description,
            website: body.website,
            contactEmail: body.contact_email,
            contactPhone: body.contact_phone,
            currencyCode: body.currency,
        });
        res.json({ success: true, brand, verification_scheduled: verificationScheduled });
    });

    static getWallet = serviceHandler(async (req: Request, res: Response) => {
        const brand = await profileService.brandForUser(currentAuth(req).userId);
        const [wallet, transactions] = await Promise.all([
            walletService.getBalance(brand.id),
            paymentService.listTransactions(brand.id),
        ]);
        res.json({ success: true, wallet, transactions });
    });

    /**
     * Start a top-up; the client redirects to `authorization_url`.
     */
    static topUp = serviceHandler(async (req: Request, res: Response) => {
        const { amount } = topUpSchema.parse(req.body);
        const brand = await profileService.brandForUser(currentAuth(req).userId);
        const session = await paymentService.initializeTopUp(brand.id, amount);
        res.status(201).json({
            success: true,
            reference: session.reference,
            authorization_url: session.authorizationUrl,
            amount: session.amount,
            currency: session.currency,
        });
    });
}
