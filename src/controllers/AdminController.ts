import { Request, Response } from 'express';
import { z } from 'zod';
import { serviceHandler } from '../utils';
import { adminService } from '../services/AdminService';
import { platformSettingService } from '../services/PlatformSettingService';
import { platformVerificationService } from '../services/PlatformVerificationService';
import { verificationQueueService } from '../services/VerificationQueueService';
import { SUPPORTED_PLATFORMS } from '../types/platform';

const reviewSchema = z.object({
  action: z.enum(['approve', 'reject', 'request_info', 'pause', 'unpause']),
  notes: z.string().trim().max(2000).nullable().optional(),
});

const platformSettingSchema = z.object({
  minimum_followers: z.coerce.number().int().min(0).optional(),
  is_active: z.boolean().optional(),
});

const drainSchema = z.object({
  kind: z.enum(['brand', 'influencer']).optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
  auto_approve: z.boolean().optional(),
});

export class AdminController {

    static listBrands = serviceHandler(async (req: Request, res: Response) => {
        const status = z.enum(['pending', 'verified', 'rejected', 'request_info', 'paused']).optional().parse(req.query.status);
        res.json({ success: true, brands: await adminService.listBrands(status) });
    });

    static listInfluencers = serviceHandler(async (req: Request, res: Response) => {
        const status = z.enum(['pending', 'approved', 'rejected', 'request_info', 'paused']).optional().parse(req.query.status);
        res.json({ success: true, influencers: await adminService.listInfluencers(status) });
    });

    static reviewBrand = serviceHandler(async (req: Request, res: Response) => {
        const body = reviewSchema.parse(req.body);
        const brand = await adminService.reviewBrand(req.params.id, body);
        res.json({ success: true, brand });
    });

    static reviewInfluencer = serviceHandler(async (req: Request, res: Response) => {
        const body = reviewSchema.parse(req.body);
        const influencer = await adminService.reviewInfluencer(req.params.id, body);
        res.json({ success: true, influencer });
    });

    static listPlatformSettings = serviceHandler(async (_req: Request, res: Response) => {
        res.json({ success: true, settings: await platformSettingService.list() });
    });

    static updatePlatformSetting = serviceHandler(async (req: Request, res: Response) => {
        const platform = z.enum(SUPPORTED_PLATFORMS).parse(req.params.platform);
        const body = platformSettingSchema.parse(req.body);
        const setting = await platformSettingService.upsert(platform, {
            minimumFollowers: body.minimum_followers,
            isActive: body.is_active,
        });
        res.json({ success: true, setting });
    });

    /**
     * Run the verification queue now instead of waiting for the scheduler.
     */
    static drainQueue = serviceHandler(async (req: Request, res: Response) => {
        const body = drainSchema.parse(req.body ?? {});
        const stats = await verificationQueueService.drain({
            kind: body.kind,
            limit: body.limit,
            autoApprove: body.auto_approve,
        });
        res.json({ success: true, stats });
    });

    static queueStatus = serviceHandler(async (_req: Request, res: Response) => {
        const [brands, influencers] = await Promise.all([
            verificationQueueService.pendingCount('brand'),
            verificationQueueService.pendingCount('influencer'),
        ]);
        res.json({ success: true, pending: { brands, influencers } });
    });

    static batchVerifyConnections = serviceHandler(async (req: Request, res: Response) => {
        const { limit, auto_approve } = drainSchema.pick({ limit: true, auto_approve: true }).parse(req.body ?? {});
        const stats = await platformVerificationService.batchVerifyPending(limit, auto_approve);
        res.json({ success: true, stats });
    });

    static suspiciousConnections = serviceHandler(async (_req: Request, res: Response) => {
        const connections = await platformVerificationService.flagSuspiciousConnections();
        res.json({ success: true, count: connections.length, connections });
    });
}
