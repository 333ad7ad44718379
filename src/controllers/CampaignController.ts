import { Request, Response } from 'express';
import { z } from 'zod';
import { serviceHandler } from '../utils';
import { currentAuth } from '../middlewares/auth';
import { campaignService } from '../services/CampaignService';
import { profileService } from '../services/ProfileService';
import { CAMPAIGN_PLATFORMS } from '../types/platform';

const dateOnly = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

const createSchema = z.object({
  title: z.string().trim().min(1).max(200),
  description: z.string().trim().max(5000).nullable().optional(),
  platform: z.enum(CAMPAIGN_PLATFORMS),
  niche: z.string().trim().max(100).nullable().optional(),
  budget: z.coerce.number().positive(),
  package_videos: z.coerce.number().int().min(1),
  start_date: dateOnly.nullable().optional(),
  due_date: dateOnly.nullable().optional(),
});

const updateSchema = createSchema.omit({ platform: true }).partial();

const statusSchema = z.object({
  status: z.enum(['active', 'paused', 'completed']),
});

const brandIdOf = async (req: Request) => (await profileService.brandForUser(currentAuth(req).userId)).id;

export class CampaignController {

    static list = serviceHandler(async (req: Request, res: Response) => {
        const campaigns = await campaignService.listForBrand(await brandIdOf(req));
        res.json({ success: true, campaigns });
    });

    /**
     * Create and pay for a campaign. The budget leaves the wallet now.
     */
    static create = serviceHandler(async (req: Request, res: Response) => {
        const body = createSchema.parse(req.body);
        const campaign = await campaignService.createCampaign({
            brandId: await brandIdOf(req),
            title: body.title,
            description: body.description,
            platform: body.platform,
            niche: body.niche,
            budget: body.budget,
            packageVideos: body.package_videos,
            startDate: body.start_date,
            dueDate: body.due_date,
        });
        res.status(201).json({ success: true, campaign });
    });

    static get = serviceHandler(async (req: Request, res: Response) => {
        const campaign = await campaignService.getCampaign(req.params.id, await brandIdOf(req));
        res.json({ success: true, campaign });
    });

    static update = serviceHandler(async (req: Request, res: Response) => {
        const body = updateSchema.parse(req.body);
        const campaign = await campaignService.updateCampaign(req.params.id, {
            title: body.title,
            description: body.description,
            niche: body.niche,
            budget: body.budget,
            packageVideos: body.package_videos,
            startDate: body.start_date,
            dueDate: body.due_date,
        }, await brandIdOf(req));
        res.json({ success: true, campaign });
    });

    static activate = serviceHandler(async (req: Request, res: Response) => {
        const campaign = await campaignService.activateCampaign(req.params.id, await brandIdOf(req));
        res.json({ success: true, campaign });
    });

    static setStatus = serviceHandler(async (req: Request, res: Response) => {
        const { status } = statusSchema.parse(req.body);
        const campaign = await campaignService.setStatus(req.params.id, status, await brandIdOf(req));
        res.json({ success: true, campaign });
    });
}
