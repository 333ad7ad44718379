import { Request, Response } from 'express';
import { z } from 'zod';
import { serviceHandler } from '../utils';
import { currentAuth } from '../middlewares/auth';
import { paymentMethodService, maskAccountNumber } from '../services/PaymentMethodService';
import { profileService } from '../services/ProfileService';
import { PaymentMethod } from '../models/PaymentMethod';

const methodSchema = z.object({
  method_type: z.enum(['bank', 'mobile_money']),
  account_name: z.string().trim().min(1).max(200),
  account_number: z.string().trim().min(4).max(50),
  provider: z.string().trim().min(1).max(100),
  is_default: z.boolean().optional(),
});

const influencerIdOf = async (req: Request) => (await profileService.influencerForUser(currentAuth(req).userId)).id;

const present = (method: PaymentMethod) => ({
    id: method.id,
    method_type: method.method_type,
    account_name: method.account_name,
    account_number: maskAccountNumber(method.account_number),
    provider: method.provider,
    is_default: method.is_default,
});

export class PaymentMethodController {

    static list = serviceHandler(async (req: Request, res: Response) => {
        const methods = await paymentMethodService.list(await influencerIdOf(req));
        res.json({ success: true, payment_methods: methods.map(present) });
    });

    static add = serviceHandler(async (req: Request, res: Response) => {
        const body = methodSchema.parse(req.body);
        const method = await paymentMethodService.add(await influencerIdOf(req), {
            methodType: body.method_type,
            accountName: body.account_name,
            accountNumber: body.account_number,
            provider: body.provider,
            isDefault: body.is_default,
        });
        res.status(201).json({ success: true, payment_method: present(method) });
    });

    static update = serviceHandler(async (req: Request, res: Response) => {
        const body = methodSchema.omit({ is_default: true }).partial().parse(req.body);
        const method = await paymentMethodService.update(await influencerIdOf(req), req.params.id, {
            methodType: body.method_type,
            accountName: body.account_name,
            accountNumber: body.account_number,
            provider: body.provider,
        });
        res.json({ success: true, payment_method: present(method) });
    });

    static remove = serviceHandler(async (req: Request, res: Response) => {
        await paymentMethodService.remove(await influencerIdOf(req), req.params.id);
        res.json({ success: true });
    });

    static setDefault = serviceHandler(async (req: Request, res: Response) => {
        const method = await paymentMethodService.setDefault(await influencerIdOf(req), req.params.id);
        res.json({ success: true, payment_method: present(method) });
    });
}
