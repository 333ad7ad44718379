import { Request, Response } from 'express';
import { z } from 'zod';
import { serviceHandler } from '../utils';
import { accountService } from '../services/AccountService';
import { currentAuth } from '../middlewares/auth';
import { User } from '../models/User';
import { AppError } from '../utils/AppError';

const signupSchema = z.object({
  email: z.string().email(),
  username: z.string().trim().min(3).max(50),
  password: z.string().min(8).max(128),
  role: z.enum(['brand', 'influencer']),
  company_name: z.string().trim().min(1).max(200).optional(),
  display_name: z.string().trim().min(1).max(100).optional(),
});

const loginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

export class AccountController {

    static signup = serviceHandler(async (req: Request, res: Response) => {
        const body = signupSchema.parse(req.body);
        const user = await accountService.signup({
            email: body.email,
            username: body.username,
            password: body.password,
            role: body.role,
            companyName: body.company_name,
            displayName: body.display_name,
        });
        res.status(201).json({
            success: true,
            user: { id: user.id, email: user.email, username: user.username, role: user.role },
            message: 'Account created. Check your inbox to verify your email address.',
        });
    });

    static verifyEmail = serviceHandler(async (req: Request, res: Response) => {
        const token = z.string().min(1).parse(req.query.token);
        const user = await accountService.verifyEmail(token);
        res.json({ success: true, email: user.email, email_verified: user.email_verified });
    });

    static resendVerification = serviceHandler(async (req: Request, res: Response) => {
        const { email } = z.object({ email: z.string().email() }).parse(req.body);
        await accountService.resendVerification(email);
        // Same answer whether or not the address exists
        res.json({ success: true, message: 'If the account exists and is unverified, a new link has been sent.' });
    });

    static login = serviceHandler(async (req: Request, res: Response) => {
        const { email, password } = loginSchema.parse(req.body);
        const session = await accountService.login(email, password);
        res.json({ success: true, ...session });
    });

    static me = serviceHandler(async (req: Request, res: Response) => {
        const user = await User.findByPk(currentAuth(req).userId, {
            attributes: { exclude: ['password_hash'] },
        });
        if (!user) throw new AppError('User not found', 404);
        res.json({ success: true, user });
    });
}
