import { Brand } from '../models/Brand';
import { settings } from '../config/settings';
import { logger } from '../utils/logger';
import { aggregate, check, CheckResult, ScoredResult } from '../utils/scoring';

export interface BrandFacts {
  companyName?: string | null;
  industry?: string | null;
  description?: string | null;
  website?: string | null;
  contactEmail?: string | null;
  contactPhone?: string | null;
}

const COMMON_INDUSTRIES = [
  'fashion', 'tech', 'food', 'beauty', 'fitness', 'travel', 'finance', 'health',
  'education', 'entertainment', 'sports', 'automotive', 'real estate', 'retail', 'e-commerce',
];

const SUSPICIOUS_NAME_PATTERNS = [/^test/i, /^demo/i, /^example/i, /\d{10,}/];
const SUSPICIOUS_KEYWORDS = ['test', 'demo', 'example', 'lorem ipsum'];
const COMMON_TLDS = ['.com', '.net', '.org', '.io', '.co', '.app', '.dev', '.tech', '.ai'];
const DOMAIN_PATTERN = /^[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;
const PHONE_PATTERN = /^\+?\d{7,15}$/;

/** Checks that must pass for a brand to be approved. */
export const REQUIRED_BRAND_CHECKS = ['company_name', 'industry', 'description', 'contact_info'] as const;

export const checkCompanyName = (raw?: string | null): CheckResult => {
  const name = raw?.trim() ?? '';
  if (!name) return check('company_name', false, 0, ['Company name is required']);
  if (name.length < 2) return check('company_name', false, 0.2, ['Company name too short']);
  if (SUSPICIOUS_NAME_PATTERNS.some((pattern) => pattern.test(name))) {
    return check('company_name', true, 0.5, ['Suspicious company name pattern']);
  }
  if (name.length >= 3 && name.length <= 100) return check('company_name', true, 1);
  return check('company_name', true, 0.8, ['Company name length unusual']);
};

export const checkIndustry = (raw?: string | null): CheckResult => {
  const industry = raw?.trim() ?? '';
  if (!industry) return check('industry', false, 0, ['Industry is required']);
  if (industry.length < 2) return check('industry', false, 0.3, ['Industry too short']);
  const lower = industry.toLowerCase();
  if (COMMON_INDUSTRIES.some((known) => lower.includes(known))) return check('industry', true, 1);
  return check('industry', true, 0.7, ['Uncommon industry - may need review']);
};

export const checkDescription = (raw?: string | null): CheckResult => {
  const description = raw?.trim() ?? '';
  if (!description) return check('description', false, 0, ['Description is required']);
  if (description.length < 20) {
    return check('description', false, 0.3, ['Description too short (minimum 20 characters)']);
  }
  const lower = description.toLowerCase();
  const flags = SUSPICIOUS_KEYWORDS.filter((keyword) => lower.includes(keyword)).map(
    (keyword) => `Suspicious keyword found: ${keyword}`
  );
  const score = description.length >= 50 ? 1 : description.length >= 30 ? 0.8 : 0.6;
  return check('description', true, score, flags);
};

export const checkWebsite = (raw: string): CheckResult => {
  let host: string;
  try {
    const parsed = new URL(raw.trim());
    host = parsed.host;
  } catch {
    return check('website', false, 0.3, ['Invalid website URL format']);
  }
  if (!host || !DOMAIN_PATTERN.test(host)) {
    return check('website', false, 0.3, ['Invalid domain format']);
  }
  if (COMMON_TLDS.some((tld) => host.endsWith(tld))) return check('website', true, 0.8);
  return check('website', true, 0.6, ['Uncommon TLD - may need manual review']);
};

export const checkContactInfo = (email?: string | null, phone?: string | null): CheckResult => {
  const flags: string[] = [];
  let score = 0;

  if (email) {
    const [, domain] = email.split('@');
    if (email.includes('@') && domain !== undefined && domain.includes('.')) score += 0.5;
    else flags.push('Invalid contact email format');
  } else {
    flags.push('No contact email provided');
  }

  if (phone) {
    if (PHONE_PATTERN.test(phone.replace(/[\s\-()]/g, ''))) score += 0.5;
    else flags.push('Invalid phone number format');
  } else {
    flags.push('No phone number provided');
  }

  return check('contact_info', score > 0, score, flags);
};

/** Website only counts toward the denominator when one is given. */
export const scoreBrand = (facts: BrandFacts, passThreshold: number): ScoredResult => {
  const checks = [
    checkCompanyName(facts.companyName),
    checkIndustry(facts.industry),
    checkDescription(facts.description),
  ];
  if (facts.website?.trim()) checks.push(checkWebsite(facts.website));
  checks.push(checkContactInfo(facts.contactEmail, facts.contactPhone));

  return aggregate(checks, passThreshold, REQUIRED_BRAND_CHECKS);
};

export const brandFacts = (brand: Brand): BrandFacts => ({
  companyName: brand.company_name,
  industry: brand.industry,
  description: brand.description,
  website: brand.website,
  contactEmail: brand.contact_email,
  contactPhone: brand.contact_phone,
});

export class BrandVerificationService {
  constructor(private readonly passThreshold: number = settings.verification.brandPassThreshold) {}

  /**
   * Score a brand and store the result. Passing brands are approved when
   * `autoApprove` is set; others stay as they are for manual review.
   */
  async verifyBrand(brand: Brand, autoApprove = true): Promise<ScoredResult> {
    const result = scoreBrand(brandFacts(brand), this.passThreshold);

    brand.verification_confidence = result.confidence;
    brand.verification_flags = result.flags;
    if (result.passed && autoApprove) {
      brand.verification_status = 'verified';
      brand.verified_at = new Date();
    }
    await brand.save();

    logger.info('Brand verification scored', {
      brandId: brand.id,
      confidence: result.confidence,
      passed: result.passed,
      status: brand.verification_status,
    });
    return result;
  }
}

export const brandVerificationService = new BrandVerificationService();
