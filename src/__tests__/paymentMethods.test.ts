import { describe, expect, it } from '@jest/globals';
import { useTestDatabase, createInfluencer } from './helpers/db';
import { PaymentMethodService, maskAccountNumber } from '../services/PaymentMethodService';
import { PaymentMethod } from '../models/PaymentMethod';

useTestDatabase();

const bank = { methodType: 'bank' as const, accountName: 'Creator One', accountNumber: '1234567890', provider: 'Ecobank' };
const momo = { methodType: 'mobile_money' as const, accountName: 'Creator One', accountNumber: '0241234567', provider: 'MTN' };

describe('PaymentMethodService', () => {
  it('makes the first method the default', async () => {
    const methods = new PaymentMethodService();
    const influencer = await createInfluencer();

    const first = await methods.add(influencer.id, bank);
    await methods.add(influencer.id, momo);

    expect((await methods.getDefault(influencer.id))?.id).toBe(first.id);
    expect(await PaymentMethod.count({ where: { influencer_id: influencer.id, is_default: true } })).toBe(1);
  });

  it('moves the default without leaving two', async () => {
    const methods = new PaymentMethodService();
    const influencer = await createInfluencer();
    await methods.add(influencer.id, bank);
    const second = await methods.add(influencer.id, momo);

    await methods.setDefault(influencer.id, second.id);

    expect((await methods.getDefault(influencer.id))?.id).toBe(second.id);
    expect(await PaymentMethod.count({ where: { influencer_id: influencer.id, is_default: true } })).toBe(1);

    const third = await methods.add(influencer.id, { ...bank, accountNumber: '5555000011', isDefault: true });
    expect((await methods.getDefault(influencer.id))?.id).toBe(third.id);
    expect(await PaymentMethod.count({ where: { influencer_id: influencer.id, is_default: true } })).toBe(1);
  });

  it("does not touch another influencer's methods", async () => {
    const methods = new PaymentMethodService();
    const owner = await createInfluencer();
    const other = await createInfluencer();
    const method = await methods.add(owner.id, bank);

    await expect(methods.setDefault(other.id, method.id)).rejects.toMatchObject({ statusCode: 404 });
    await expect(methods.remove(other.id, method.id)).rejects.toMatchObject({ statusCode: 404 });
    expect(await methods.list(owner.id)).toHaveLength(1);
  });

  it('updates and removes methods', async () => {
    const methods = new PaymentMethodService();
    const influencer = await createInfluencer();
    const method = await methods.add(influencer.id, bank);

    const updated = await methods.update(influencer.id, method.id, { provider: 'GCB' });
    expect(updated.provider).toBe('GCB');

    await methods.remove(influencer.id, method.id);
    expect(await methods.list(influencer.id)).toEqual([]);
  });
});

describe('maskAccountNumber', () => {
  it('keeps only the last four digits', () => {
    expect(maskAccountNumber('1234567890')).toBe('******7890');
    expect(maskAccountNumber('1234')).toBe('1234');
  });
});
