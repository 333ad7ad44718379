const SUFFIX_MULTIPLIERS: Record<string, number> = { k: 1e3, m: 1e6, b: 1e9 };

/**
 * Parse a displayed count such as "12,345", "1.2M" or "980K".
 */
export const parseCountToken = (token: string): number | null => {
  const match = /^(\d+(?:[.,]\d+)*)\s*([kmb])?$/i.exec(token.trim());
  if (!match) return null;

  const [, digits, suffix] = match;
  if (suffix) {
    const value = Number(digits.replace(/,/g, ''));
    if (!Number.isFinite(value)) return null;
    return Math.round(value * SUFFIX_MULTIPLIERS[suffix.toLowerCase()]);
  }
  const value = Number(digits.replace(/[.,]/g, ''));
  return Number.isFinite(value) ? value : null;
};

const decodeEntities = (text: string) =>
  text
    .replace(/&amp;/g, '&')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&nbsp;/g, ' ');

const COUNT_WITH_FOLLOWERS = /(\d+(?:[.,]\d+)*\s*[kmb]?)\s+(?:followers?|subscribers?)\b/gi;

const EMBEDDED_JSON_PATTERNS = [
  /"edge_followed_by":\s*\{\s*"count":\s*(\d+)/,
  /"follower_count":\s*(\d+)/,
  /"followers_count":\s*(\d+)/,
];

const META_TAG = /<meta\s+[^>]*>/gi;
const META_CONTENT = /content\s*=\s*"([^"]*)"/i;

/**
 * Pull a follower count out of a public profile page. Tries embedded JSON,
 * then meta tags, then the largest "N followers" in the visible text.
 */
export const extractFollowerCount = (html: string): number | null => {
  for (const pattern of EMBEDDED_JSON_PATTERNS) {
    const match = pattern.exec(html);
    if (match) return Number(match[1]);
  }

  for (const tag of html.match(META_TAG) ?? []) {
    if (!/followers/i.test(tag)) continue;
    const content = META_CONTENT.exec(tag);
    if (!content) continue;
    const found = /(\d+(?:[.,]\d+)*\s*[kmb]?)\s+followers?/i.exec(decodeEntities(content[1]));
    const count = found ? parseCountToken(found[1]) : null;
    if (count !== null && count > 0) return count;
  }

  const text = decodeEntities(
    html
      .replace(/<script[\s\S]*?<\/script>/gi, ' ')
      .replace(/<style[\s\S]*?<\/style>/gi, ' ')
      .replace(/<[^>]+>/g, ' ')
  );
  const counts = Array.from(text.matchAll(COUNT_WITH_FOLLOWERS))
    .map((m) => parseCountToken(m[1]))
    .filter((n): n is number => n !== null);

  return counts.length > 0 ? Math.max(...counts) : null;
};
