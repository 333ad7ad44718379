import { describe, expect, it } from '@jest/globals';
import { hashPassword, peekToken, signToken, verifyPassword, verifyToken } from '../utils/tokens';
import { readSession } from '../middlewares/auth';

const NOW = new Date('2026-01-01T00:00:00Z');
const FAST_SCRYPT = { N: 1024, r: 8, p: 1, keyLength: 32 };

const later = (seconds: number) => new Date(NOW.getTime() + seconds * 1000);

describe('signed tokens', () => {
  it('round-trips the payload with its expiry', () => {
    const token = signToken({ sub: 'user-1', typ: 'session' }, 'test-secret', 60, NOW);
    expect(verifyToken(token, 'test-secret', later(59))).toEqual({ sub: 'user-1', typ: 'session', exp: 1767225660 });
  });

  it('expires at exp', () => {
    const token = signToken({ sub: 'user-1' }, 'test-secret', 60, NOW);
    expect(verifyToken(token, 'test-secret', later(60))).toBeNull();
  });

  it('rejects another secret or a changed body', () => {
    const token = signToken({ sub: 'user-1' }, 'test-secret', 60, NOW);
    expect(verifyToken(token, 'other-secret', NOW)).toBeNull();

    const [, signature] = token.split('.');
    const forged = `${Buffer.from(JSON.stringify({ sub: 'user-2', exp: 1767225660 })).toString('base64url')}.${signature}`;
    expect(verifyToken(forged, 'test-secret', NOW)).toBeNull();
    expect(peekToken(forged)).toEqual({ sub: 'user-2', exp: 1767225660 });
  });

  it('is tied to the bound state', () => {
    const token = signToken({ sub: 'user-1' }, 'test-secret', 60, NOW, 'a@example.com|0');
    expect(verifyToken(token, 'test-secret', NOW, 'a@example.com|0')).not.toBeNull();
    expect(verifyToken(token, 'test-secret', NOW, 'a@example.com|1')).toBeNull();
  });
});

describe('passwords', () => {
  it('verifies the original password only', async () => {
    const stored = await hashPassword('correct horse', FAST_SCRYPT);
    expect(stored.startsWith('scrypt$1024$8$1$32$')).toBe(true);
    await expect(verifyPassword('correct horse', stored)).resolves.toBe(true);
    await expect(verifyPassword('wrong horse', stored)).resolves.toBe(false);
  });

  it('refuses malformed hashes', async () => {
    await expect(verifyPassword('anything', 'plain-text')).resolves.toBe(false);
  });
});

describe('readSession', () => {
  it('accepts session tokens with a known role', () => {
    const token = signToken({ sub: 'user-1', role: 'brand', typ: 'session' }, 'test-secret', 3600);
    expect(readSession(token, 'test-secret')).toEqual({ userId: 'user-1', role: 'brand' });
  });

  it('rejects other token types and unknown roles', () => {
    expect(readSession(signToken({ sub: 'user-1', role: 'brand', typ: 'email' }, 'test-secret', 3600), 'test-secret')).toBeNull();
    expect(readSession(signToken({ sub: 'user-1', role: 'owner', typ: 'session' }, 'test-secret', 3600), 'test-secret')).toBeNull();
  });
});
