import { sequelize } from '../config/database';
import { settings, SecuritySettings } from '../config/settings';
import { User, UserRole } from '../models/User';
import { Brand } from '../models/Brand';
import { Influencer } from '../models/Influencer';
import { AppError } from '../utils/AppError';
import { logger } from '../utils/logger';
import { hashPassword, peekToken, signToken, verifyPassword, verifyToken } from '../utils/tokens';
import { verifyEmailEmail } from '../utils/notificationEmails';
import { EmailService, emailService } from './EmailService';

export interface SignupInput {
  email: string;
  username: string;
  password: string;
  role: Exclude<UserRole, 'admin'>;
  /** Brand signups. */
  companyName?: string;
  /** Influencer signups; defaults to the username. */
  displayName?: string;
}

export interface Session {
  token: string;
  expiresIn: number;
  user: { id: string; email: string; username: string; role: UserRole };
}

const HOUR = 3600;

/** The token is only valid while the address and its verified flag are unchanged. */
const emailBinding = (user: User) => `${user.email}|${user.email_verified ? 1 : 0}`;

export class AccountService {
  constructor(
    private readonly security: SecuritySettings = settings.security,
    private readonly email: EmailService = emailService,
    private readonly publicUrl: string = settings.publicUrl
  ) {}

  emailVerificationToken(user: User, now: Date = new Date()): string {
    return signToken(
      { sub: user.id, typ: 'email' },
      this.security.tokenSecret,
      this.security.emailTokenTtlHours * HOUR,
      now,
      emailBinding(user)
    );
  }

  async sendVerificationEmail(user: User): Promise<boolean> {
    const token = this.emailVerificationToken(user);
    return this.email.send(user.email, verifyEmailEmail({
      username: user.username,
      verifyUrl: `${this.publicUrl}/api/v1/accounts/verify-email?token=${encodeURIComponent(token)}`,
      expiresInHours: this.security.emailTokenTtlHours,
    }));
  }

  /** User and its brand or influencer profile are created together. */
  async signup(input: SignupInput): Promise<User> {
    if (input.role === 'brand' && !input.companyName?.trim()) {
      throw new AppError('Company name is required for brand accounts', 400);
    }
    const email = input.email.trim().toLowerCase();
    const passwordHash = await hashPassword(input.password);

    const t = await sequelize.transaction();
    let user: User;
    try {
      const existing = await User.findOne({ where: { email }, transaction: t });
      if (existing) throw new AppError('An account with this email already exists', 409, 'EMAIL_TAKEN');

      user = await User.create({
        email,
        username: input.username.trim(),
        password_hash: passwordHash,
        role: input.role,
        email_verified: false,
      }, { transaction: t });

      if (input.role === 'brand') {
        await Brand.create({ user_id: user.id, company_name: input.companyName?.trim() }, { transaction: t });
      } else {
        await Influencer.create({
          user_id: user.id,
          display_name: input.displayName?.trim() || user.username,
        }, { transaction: t });
      }
      await t.commit();
    } catch (e) {
      await t.rollback();
      throw e;
    }

    logger.info('Account created', { userId: user.id, role: user.role });
    await this.sendVerificationEmail(user);
    return user;
  }

  async verifyEmail(token: string, now: Date = new Date()): Promise<User> {
    const claims = peekToken(token);
    const userId = claims?.sub;
    const user = typeof userId === 'string' ? await User.findByPk(userId) : null;
    const payload = user ? verifyToken(token, this.security.tokenSecret, now, emailBinding(user)) : null;
    if (!user || !payload || payload.typ !== 'email') {
      throw new AppError('Verification link is invalid or has expired', 400, 'INVALID_TOKEN');
    }

    user.email_verified = true;
    user.email_verified_at = now;
    await user.save();
    logger.info('Email verified', { userId: user.id });
    return user;
  }

  async resendVerification(emailAddress: string): Promise<void> {
    const user = await User.findOne({ where: { email: emailAddress.trim().toLowerCase() } });
    if (!user || user.email_verified) return;
    await this.sendVerificationEmail(user);
  }

  issueSession(user: User, now: Date = new Date()): Session {
    const expiresIn = this.security.sessionTtlHours * HOUR;
    return {
      token: signToken({ sub: user.id, role: user.role, typ: 'session' }, this.security.tokenSecret, expiresIn, now),
      expiresIn,
      user: { id: user.id, email: user.email, username: user.username, role: user.role },
    };
  }

  async login(emailAddress: string, password: string): Promise<Session> {
    const user = await User.findOne({ where: { email: emailAddress.trim().toLowerCase() } });
    if (!user || !(await verifyPassword(password, user.password_hash))) {
      throw new AppError('Invalid email or password', 401, 'INVALID_CREDENTIALS');
    }
    if (!user.email_verified && user.role !== 'admin') {
      throw new AppError('Verify your email address before signing in', 403, 'EMAIL_NOT_VERIFIED');
    }
    return this.issueSession(user);
  }

  async createAdmin(emailAddress: string, username: string, password: string): Promise<User> {
    const email = emailAddress.trim().toLowerCase();
    const existing = await User.findOne({ where: { email } });
    if (existing) throw new AppError('An account with this email already exists', 409, 'EMAIL_TAKEN');
    return User.create({
      email,
      username,
      password_hash: await hashPassword(password),
      role: 'admin',
      email_verified: true,
      email_verified_at: new Date(),
    });
  }
}

export const accountService = new AccountService();
