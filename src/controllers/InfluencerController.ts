import { Request, Response } from 'express';
import { z } from 'zod';
import { serviceHandler } from '../utils';
import { currentAuth } from '../middlewares/auth';
import { profileService } from '../services/ProfileService';
import { connectionService } from '../services/ConnectionService';
import { influencerVerificationService } from '../services/InfluencerVerificationService';
import { SUPPORTED_PLATFORMS } from '../types/platform';

const profileSchema = z.object({
  display_name: z.string().trim().min(1).max(100).optional(),
  bio: z.string().trim().max(2000).nullable().optional(),
  niche: z.string().trim().max(100).nullable().optional(),
  primary_platform: z.enum(SUPPORTED_PLATFORMS).nullable().optional(),
  country: z.string().trim().max(100).nullable().optional(),
  currency: z.string().length(3).optional(),
});

const connectionSchema = z.object({
  platform: z.enum(SUPPORTED_PLATFORMS),
  handle: z.string().trim().min(1).max(100),
  followers_count: z.coerce.number().int().min(0),
  engagement_rate: z.coerce.number().min(0).max(100).nullable().optional(),
  sample_post_url: z.string().trim().url().nullable().optional(),
  profile_url: z.string().trim().url().nullable().optional(),
});

const connectionUpdateSchema = connectionSchema.omit({ platform: true }).partial();

type ProfileBody = z.infer<typeof profileSchema>;

const toProfileInput = (body: ProfileBody) => ({
    displayName: body.display_name,
    bio: body.bio,
    niche: body.niche,
    primaryPlatform: body.primary_platform,
    country: body.country,
    currencyCode: body.currency,
});

const influencerIdOf = async (req: Request) => (await profileService.influencerForUser(currentAuth(req).userId)).id;

export class InfluencerController {

    static getProfile = serviceHandler(async (req: Request, res: Response) => {
        const influencer = await profileService.influencerForUser(currentAuth(req).userId);
        const [connections, approval] = await Promise.all([
            connectionService.list(influencer.id),
            influencerVerificationService.evaluate(influencer),
        ]);
        res.json({ success: true, influencer, connections, approval });
    });

    static updateProfile = serviceHandler(async (req: Request, res: Response) => {
        const body = profileSchema.parse(req.body);
        const influencer = await profileService.updateInfluencer(currentAuth(req).userId, toProfileInput(body));
        res.json({ success: true, influencer });
    });

    /**
     * Finish onboarding and queue the automated review.
     */
    static completeOnboarding = serviceHandler(async (req: Request, res: Response) => {
        const body = profileSchema.parse(req.body);
        const { influencer, verificationScheduled } = await profileService.completeInfluencerOnboarding(
            currentAuth(req).userId,
            toProfileInput(body)
        );
        res.json({ success: true, influencer, verification_scheduled: verificationScheduled });
    });

    static listConnections = serviceHandler(async (req: Request, res: Response) => {
        const connections = await connectionService.list(await influencerIdOf(req));
        res.json({ success: true, connections });
    });

    static addConnection = serviceHandler(async (req: Request, res: Response) => {
        const body = connectionSchema.parse(req.body);
        const connection = await connectionService.add(await influencerIdOf(req), {
            platform: body.platform,
            handle: body.handle,
            followersCount: body.followers_count,
            engagementRate: body.engagement_rate,
            samplePostUrl: body.sample_post_url,
            profileUrl: body.profile_url,
        });
        res.status(201).json({ success: true, connection });
    });

    static updateConnection = serviceHandler(async (req: Request, res: Response) => {
        const body = connectionUpdateSchema.parse(req.body);
        const connection = await connectionService.update(await influencerIdOf(req), req.params.id, {
            handle: body.handle,
            followersCount: body.followers_count,
            engagementRate: body.engagement_rate,
            samplePostUrl: body.sample_post_url,
            profileUrl: body.profile_url,
        });
        res.json({ success: true, connection });
    });

    static removeConnection = serviceHandler(async (req: Request, res: Response) => {
        await connectionService.remove(await influencerIdOf(req), req.params.id);
        res.json({ success: true });
    });

    static verifyConnection = serviceHandler(async (req: Request, res: Response) => {
        const { connection, result, influencerApproved } = await connectionService.verifyById(
            await influencerIdOf(req),
            req.params.id
        );
        res.json({
            success: true,
            connection,
            verification: {
                status: result.status,
                passed: result.passed,
                confidence: result.confidence,
                reason: result.reason,
                flags: result.flags,
            },
            influencer_approved: influencerApproved,
        });
    });
}
