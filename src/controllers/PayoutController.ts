import { Request, Response } from 'express';
import { z } from 'zod';
import { serviceHandler } from '../utils';
import { currentAuth } from '../middlewares/auth';
import { payoutService } from '../services/PayoutService';
import { profileService } from '../services/ProfileService';

const influencerIdOf = async (req: Request) => (await profileService.influencerForUser(currentAuth(req).userId)).id;

export class PayoutController {

    static wallet = serviceHandler(async (req: Request, res: Response) => {
        const influencerId = await influencerIdOf(req);
        const [summary, payouts] = await Promise.all([
            payoutService.walletSummary(influencerId),
            payoutService.listForInfluencer(influencerId),
        ]);
        res.json({ success: true, summary, payouts });
    });

    static requestWithdrawal = serviceHandler(async (req: Request, res: Response) => {
        const withdrawal = await payoutService.requestWithdrawal(await influencerIdOf(req));
        res.json({ success: true, withdrawal, message: 'Withdrawal request submitted' });
    });

    // --- Admin ---

    static markSent = serviceHandler(async (req: Request, res: Response) => {
        const { reference } = z.object({ reference: z.string().trim().max(100).nullable().optional() }).parse(req.body);
        const payout = await payoutService.markSent(req.params.id, reference);
        res.json({ success: true, payout });
    });

    static markFailed = serviceHandler(async (req: Request, res: Response) => {
        const { reason } = z.object({ reason: z.string().trim().min(1).max(1000) }).parse(req.body);
        const payout = await payoutService.markFailed(req.params.id, reason);
        res.json({ success: true, payout });
    });

    static overdue = serviceHandler(async (_req: Request, res: Response) => {
        const payouts = await payoutService.listOverdue();
        res.json({ success: true, count: payouts.length, payouts });
    });
}
