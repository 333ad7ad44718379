import { createHmac, randomBytes, scrypt, timingSafeEqual } from 'crypto';

export interface ScryptParams {
  N: number;
  r: number;
  p: number;
  keyLength: number;
}

export const DEFAULT_SCRYPT: ScryptParams = { N: 16384, r: 8, p: 1, keyLength: 64 };

const derive = (password: string, salt: Buffer, params: ScryptParams): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    scrypt(password, salt, params.keyLength, { N: params.N, r: params.r, p: params.p }, (err, key) => {
      if (err) reject(err);
      else resolve(key);
    });
  });

/** `scrypt$N$r$p$keyLength$<salt hex>$<hash hex>` */
export const hashPassword = async (password: string, params: ScryptParams = DEFAULT_SCRYPT): Promise<string> => {
  const salt = randomBytes(16);
  const hash = await derive(password, salt, params);
  return ['scrypt', params.N, params.r, params.p, params.keyLength, salt.toString('hex'), hash.toString('hex')].join('$');
};

export const verifyPassword = async (password: string, stored: string): Promise<boolean> => {
  const [algorithm, N, r, p, keyLength, saltHex, hashHex] = stored.split('$');
  if (algorithm !== 'scrypt' || !N || !r || !p || !keyLength || !saltHex || !hashHex) return false;
  const expected = Buffer.from(hashHex, 'hex');
  const actual = await derive(password, Buffer.from(saltHex, 'hex'), {
    N: Number(N),
    r: Number(r),
    p: Number(p),
    keyLength: Number(keyLength),
  });
  return actual.length === expected.length && timingSafeEqual(actual, expected);
};

export const hmac = (secret: string, data: string): string =>
  createHmac('sha256', secret).update(data).digest('base64url');

export const safeEqual = (a: string, b: string): boolean => {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
};

/**
 * `<base64url json>.<signature>` where the JSON carries `exp` in epoch
 * seconds. `bindTo` mixes extra state into the signature without putting
 * it in the payload, so the token dies when that state changes.
 */
export const signToken = (
  payload: Record<string, string | number>,
  secret: string,
  ttlSeconds: number,
  now: Date = new Date(),
  bindTo = ''
): string => {
  const body = Buffer.from(
    JSON.stringify({ ...payload, exp: Math.floor(now.getTime() / 1000) + ttlSeconds }),
    'utf8'
  ).toString('base64url');
  return `${body}.${hmac(secret, `${body}|${bindTo}`)}`;
};

export type TokenPayload = Record<string, unknown> & { exp: number };

export const verifyToken = (token: string, secret: string, now: Date = new Date(), bindTo = ''): TokenPayload | null => {
  const [body, signature, extra] = token.split('.');
  if (!body || !signature || extra !== undefined) return null;
  if (!safeEqual(signature, hmac(secret, `${body}|${bindTo}`))) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(body, 'base64url').toString('utf8'));
  } catch {
    return null;
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) return null;
  const exp: unknown = Reflect.get(parsed, 'exp');
  if (typeof exp !== 'number' || exp * 1000 <= now.getTime()) return null;
  return { ...Object.fromEntries(Object.entries(parsed)), exp };
};

/** Read the payload without checking the signature. Only for picking the key to verify with. */
export const peekToken = (token: string): Record<string, unknown> | null => {
  const [body] = token.split('.');
  if (!body) return null;
  try {
    const parsed: unknown = JSON.parse(Buffer.from(body, 'base64url').toString('utf8'));
    return parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : null;
  } catch {
    return null;
  }
};
