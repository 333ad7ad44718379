import { Request, Response } from 'express';
import { z } from 'zod';
import { serviceHandler } from '../utils';
import { currencyService } from '../services/CurrencyService';

const currencySchema = z.object({
  code: z.string().trim().length(3),
  name: z.string().trim().min(1).max(100),
  symbol: z.string().trim().min(1).max(10),
  exchange_rate: z.coerce.number().positive(),
  is_default: z.boolean().optional(),
  is_active: z.boolean().optional(),
});

export class CurrencyController {

    static list = serviceHandler(async (_req: Request, res: Response) => {
        res.json({ success: true, currencies: await currencyService.list() });
    });

    static create = serviceHandler(async (req: Request, res: Response) => {
        const body = currencySchema.parse(req.body);
        const currency = await currencyService.create({
            code: body.code,
            name: body.name,
            symbol: body.symbol,
            exchangeRate: body.exchange_rate,
            isDefault: body.is_default,
            isActive: body.is_active,
        });
        res.status(201).json({ success: true, currency });
    });

    static updateRate = serviceHandler(async (req: Request, res: Response) => {
        const { exchange_rate } = z.object({ exchange_rate: z.coerce.number().positive() }).parse(req.body);
        const currency = await currencyService.updateRate(req.params.id, exchange_rate);
        res.json({ success: true, currency });
    });

    static setDefault = serviceHandler(async (req: Request, res: Response) => {
        const currency = await currencyService.setDefault(req.params.id);
        res.json({ success: true, currency });
    });

    static convert = serviceHandler(async (req: Request, res: Response) => {
        const query = z.object({
            amount: z.coerce.number().nonnegative(),
            from: z.string().length(3),
            to: z.string().length(3),
        }).parse(req.query);
        const [from, to] = await Promise.all([
            currencyService.findByCode(query.from),
            currencyService.findByCode(query.to),
        ]);
        res.json({
            success: true,
            amount: query.amount,
            from: query.from.toUpperCase(),
            to: query.to.toUpperCase(),
            converted: await currencyService.convert(query.amount, from, to),
        });
    });
}
