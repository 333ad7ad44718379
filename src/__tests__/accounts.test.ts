import { describe, expect, it, jest } from '@jest/globals';
import { useTestDatabase } from './helpers/db';
import { AccountService } from '../services/AccountService';
import { EmailService } from '../services/EmailService';
import { readSession } from '../middlewares/auth';
import { Brand } from '../models/Brand';
import { Influencer } from '../models/Influencer';
import { User } from '../models/User';

useTestDatabase();

const security = { tokenSecret: 'test-secret', sessionTtlHours: 24, emailTokenTtlHours: 72, oauthStateTtlMinutes: 10 };

const setup = () => {
  const email = new EmailService({ port: 587, secure: false, from: 'noreply@example.com' });
  const send = jest.spyOn(email, 'send').mockResolvedValue(true);
  return { send, accounts: new AccountService(security, email, 'http://localhost:3000') };
};

const brandSignup = {
  email: 'Studio@Example.com',
  username: 'studio',
  password: 'placeholder-password',
  role: 'brand' as const,
  companyName: 'Acme Studios',
};

describe('AccountService', () => {
  it('creates the user with its brand profile and sends a verification link', async () => {
    const { send, accounts } = setup();

    const user = await accounts.signup(brandSignup);

    expect(user.email).toBe('studio@example.com');
    expect(user.email_verified).toBe(false);
    const brand = await Brand.findOne({ where: { user_id: user.id } });
    expect(brand?.company_name).toBe('Acme Studios');
    expect(send).toHaveBeenCalledTimes(1);
    const [to, message] = send.mock.calls[0];
    expect(to).toBe('studio@example.com');
    expect(message.subject).toBe('Confirm your email address');
    expect(message.text).toContain('http://localhost:3000/api/v1/accounts/verify-email?token=');
  });

  it('names influencer profiles after the username by default', async () => {
    const { accounts } = setup();

    const user = await accounts.signup({ email: 'creator@example.com', username: 'creator', password: 'placeholder-password', role: 'influencer' });

    expect((await Influencer.findOne({ where: { user_id: user.id } }))?.display_name).toBe('creator');
  });

  it('requires a company name for brands and a free email', async () => {
    const { accounts } = setup();

    await expect(accounts.signup({ ...brandSignup, companyName: '  ' })).rejects.toMatchObject({ statusCode: 400 });
    await accounts.signup(brandSignup);
    await expect(accounts.signup({ ...brandSignup, email: 'studio@example.com' })).rejects.toMatchObject({
      statusCode: 409,
      code: 'EMAIL_TAKEN',
    });
    expect(await User.count()).toBe(1);
  });

  it('accepts a verification link once', async () => {
    const { accounts } = setup();
    const user = await accounts.signup(brandSignup);
    const token = accounts.emailVerificationToken(user);

    const verified = await accounts.verifyEmail(token);
    expect(verified.email_verified).toBe(true);

    await expect(accounts.verifyEmail(token)).rejects.toMatchObject({ statusCode: 400, code: 'INVALID_TOKEN' });
  });

  it('rejects expired verification links', async () => {
    const { accounts } = setup();
    const user = await accounts.signup(brandSignup);
    const issuedAt = new Date('2026-01-01T00:00:00Z');
    const token = accounts.emailVerificationToken(user, issuedAt);

    await expect(
      accounts.verifyEmail(token, new Date(issuedAt.getTime() + 72 * 3600 * 1000))
    ).rejects.toMatchObject({ code: 'INVALID_TOKEN' });
  });

  it('signs in verified users only', async () => {
    const { accounts } = setup();
    const user = await accounts.signup(brandSignup);

    await expect(accounts.login('studio@example.com', 'placeholder-password')).rejects.toMatchObject({
      statusCode: 403,
      code: 'EMAIL_NOT_VERIFIED',
    });

    await accounts.verifyEmail(accounts.emailVerificationToken(user));
    await expect(accounts.login('studio@example.com', 'wrong-password')).rejects.toMatchObject({
      statusCode: 401,
      code: 'INVALID_CREDENTIALS',
    });

    const session = await accounts.login('STUDIO@example.com', 'placeholder-password');
    expect(session.expiresIn).toBe(86400);
    expect(session.user).toEqual({ id: user.id, email: 'studio@example.com', username: 'studio', role: 'brand' });
    expect(readSession(session.token, 'test-secret')).toEqual({ userId: user.id, role: 'brand' });
  });

  it('does not resend to verified addresses', async () => {
    const { send, accounts } = setup();
    const user = await accounts.signup(brandSignup);
    await accounts.resendVerification('studio@example.com');
    expect(send).toHaveBeenCalledTimes(2);

    await accounts.verifyEmail(accounts.emailVerificationToken(user));
    await accounts.resendVerification('studio@example.com');
    await accounts.resendVerification('nobody@example.com');
    expect(send).toHaveBeenCalledTimes(2);
  });

  it('creates admins that can sign in without email verification', async () => {
    const { accounts } = setup();
    await accounts.createAdmin('Admin@Example.com', 'admin', 'placeholder-password');

    const session = await accounts.login('admin@example.com', 'placeholder-password');
    expect(session.user.role).toBe('admin');
  });
});
