import { Request, Response } from 'express';
import { z } from 'zod';
import { serviceHandler } from '../utils';
import { currentAuth } from '../middlewares/auth';
import { oauthService, OAUTH_PLATFORMS } from '../services/OAuthService';
import { profileService } from '../services/ProfileService';

const platformParam = z.enum(OAUTH_PLATFORMS);

const callbackQuery = z.object({
  code: z.string().optional(),
  state: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
  error_reason: z.string().optional(),
});

export class OAuthController {

    static start = serviceHandler(async (req: Request, res: Response) => {
        const platform = platformParam.parse(req.params.platform);
        const influencer = await profileService.influencerForUser(currentAuth(req).userId);
        const { url } = oauthService.authorizationUrl(influencer.id, platform);
        res.json({ success: true, authorization_url: url });
    });

    static callback = serviceHandler(async (req: Request, res: Response) => {
        const platform = platformParam.parse(req.params.platform);
        const query = callbackQuery.parse(req.query);
        const { connection, result, influencerApproved } = await oauthService.handleCallback(platform, {
            code: query.code,
            state: query.state,
            error: query.error,
            errorDescription: query.error_description ?? query.error_reason,
        });
        res.json({
            success: true,
            connection: {
                id: connection.id,
                platform: connection.platform,
                handle: connection.handle,
                followers_count: connection.followers_count,
                verification_status: connection.verification_status,
            },
            verification: { passed: result.passed, confidence: result.confidence, flags: result.flags },
            influencer_approved: influencerApproved,
        });
    });
}
