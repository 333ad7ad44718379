import { Request, Response } from 'express';
import { z } from 'zod';
import '../types/express';
import { serviceHandler } from '../utils';
import { currentAuth } from '../middlewares/auth';
import { paymentService } from '../services/PaymentService';
import { profileService } from '../services/ProfileService';

export class PaymentController {

    /**
     * Gateway notification. The signature covers the raw body, so this
     * route relies on the JSON parser keeping `req.rawBody`.
     */
    static webhook = serviceHandler(async (req: Request, res: Response) => {
        const result = await paymentService.handleWebhook(req.rawBody, req.get('x-paystack-signature'));
        res.json({ status: 'success', result });
    });

    /**
     * Customer returned from checkout with `?reference=`.
     */
    static verify = serviceHandler(async (req: Request, res: Response) => {
        const reference = z.string().trim().min(1).parse(req.query.reference);
        const brand = await profileService.brandForUser(currentAuth(req).userId);
        const transaction = await paymentService.verifyTopUp(reference, brand.id);
        res.json({ success: transaction.status === 'success', transaction });
    });
}
