import { describe, expect, it, jest } from '@jest/globals';
import { useTestDatabase, createBrand, createInfluencer } from './helpers/db';
import { AdminService } from '../services/AdminService';
import { EmailService } from '../services/EmailService';

useTestDatabase();

const setup = () => {
  const email = new EmailService({ port: 587, secure: false, from: 'noreply@example.com' });
  const send = jest.spyOn(email, 'send').mockResolvedValue(true);
  return { send, admin: new AdminService(email) };
};

describe('AdminService', () => {
  it('pauses a verified brand and restores it on unpause', async () => {
    const { admin } = setup();
    const brand = await createBrand({ verification_status: 'verified' });

    const paused = await admin.reviewBrand(brand.id, { action: 'pause', notes: 'Chargeback under investigation' });
    expect(paused.verification_status).toBe('paused');
    expect(paused.paused_from_status).toBe('verified');
    expect(paused.pause_reason).toBe('Chargeback under investigation');

    await expect(admin.reviewBrand(brand.id, { action: 'pause' })).rejects.toMatchObject({ statusCode: 409 });

    const restored = await admin.reviewBrand(brand.id, { action: 'unpause' });
    expect(restored.verification_status).toBe('verified');
    expect(restored.paused_from_status).toBeNull();
    expect(restored.pause_reason).toBeNull();
  });

  it('refuses to unpause an account that is not paused', async () => {
    const { admin } = setup();
    const influencer = await createInfluencer();

    await expect(admin.reviewInfluencer(influencer.id, { action: 'unpause' })).rejects.toMatchObject({
      statusCode: 409,
      code: 'INVALID_STATUS',
    });
  });

  it('approves an influencer and emails the decision', async () => {
    const { send, admin } = setup();
    const influencer = await createInfluencer();

    const approved = await admin.reviewInfluencer(influencer.id, { action: 'approve', notes: 'Welcome aboard' });

    expect(approved.verification_status).toBe('approved');
    expect(approved.verified_at).toBeInstanceOf(Date);
    expect(send).toHaveBeenCalledTimes(1);
    const message = send.mock.calls[0][1];
    expect(message.subject).toBe('Account update: approved');
    expect(message.text).toBe(
      'Hi Creator One,\n\nYour creator profile has been approved. You can now accept jobs.\n\nNotes: Welcome aboard'
    );
  });

  it('asks for more information', async () => {
    const { send, admin } = setup();
    const brand = await createBrand();

    const updated = await admin.reviewBrand(brand.id, { action: 'request_info', notes: 'Add a company website' });

    expect(updated.verification_status).toBe('request_info');
    expect(updated.verification_notes).toBe('Add a company website');
    expect(send.mock.calls[0][1].subject).toBe('Account update: request info');
  });

  it('filters brands by status', async () => {
    const { admin } = setup();
    await createBrand({ verification_status: 'verified' });
    const pending = await createBrand();

    const rows = await admin.listBrands('pending');
    expect(rows.map((b) => b.id)).toEqual([pending.id]);
  });
});
