import { Request, Response } from 'express';
import { z } from 'zod';
import { serviceHandler } from '../utils';
import { currentAuth } from '../middlewares/auth';
import { jobService } from '../services/JobService';
import { campaignService } from '../services/CampaignService';
import { profileService } from '../services/ProfileService';
import { CAMPAIGN_PLATFORMS } from '../types/platform';

const proofSchema = z.object({
  proof_url: z.string().trim().url(),
  notes: z.string().trim().max(2000).nullable().optional(),
});

const reviewSchema = z.object({
  decision: z.enum(['approve', 'reject', 'flag']),
  review_notes: z.string().trim().max(2000).nullable().optional(),
});

const influencerIdOf = async (req: Request) => (await profileService.influencerForUser(currentAuth(req).userId)).id;

export class JobController {

    static listOpen = serviceHandler(async (req: Request, res: Response) => {
        const platform = z.enum(CAMPAIGN_PLATFORMS).optional().parse(req.query.platform);
        const campaigns = await campaignService.listActive(platform);
        res.json({
            success: true,
            jobs: campaigns.map((campaign) => ({
                campaign,
                per_video_amount: Number(jobService.perVideoAmount(campaign).toFixed(2)),
            })),
        });
    });

    /**
     * Accept a job; the payout is created pending and due on the campaign due date.
     */
    static accept = serviceHandler(async (req: Request, res: Response) => {
        const { submission, payout } = await jobService.acceptJob(await influencerIdOf(req), req.params.campaignId);
        res.status(201).json({ success: true, submission, payout });
    });

    static mySubmissions = serviceHandler(async (req: Request, res: Response) => {
        const submissions = await jobService.listForInfluencer(await influencerIdOf(req));
        res.json({ success: true, submissions });
    });

    static submitProof = serviceHandler(async (req: Request, res: Response) => {
        const body = proofSchema.parse(req.body);
        const submission = await jobService.submitProof(req.params.id, await influencerIdOf(req), body.proof_url, body.notes);
        res.json({ success: true, submission });
    });

    static review = serviceHandler(async (req: Request, res: Response) => {
        const body = reviewSchema.parse(req.body);
        const submission = await jobService.reviewSubmission(req.params.id, body.decision, body.review_notes);
        res.json({ success: true, submission });
    });
}
