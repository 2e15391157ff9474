/**
 * Output tiers, from the loosest to the most detailed schema.
 */

import { ErrorCode } from '../errors/codes.js';
import { didYouMean } from '../errors/suggestions.js';
import { ConfigError } from './errors.js';

export const TIERS = ['basic', 'standard', 'comprehensive', 'expert'] as const;

export type Tier = (typeof TIERS)[number];

export const DEFAULT_TIER: Tier = 'standard';

export function isTier(value: unknown): value is Tier {
  return typeof value === 'string' && (TIERS as readonly string[]).includes(value);
}

/**
 * Negative when `a` is looser than `b`, zero when equal, positive otherwise.
 */
export function compareTiers(a: Tier, b: Tier): number {
  return TIERS.indexOf(a) - TIERS.indexOf(b);
}

/**
 * Map a user-facing tier name (case-insensitive) to a Tier.
 * @throws ConfigError with close matches attached as suggestions
 */
export function parseTier(raw: string): Tier {
  const normalized = raw.trim().toLowerCase();
  if (isTier(normalized)) {
    return normalized;
  }
  const candidates = didYouMean(normalized, TIERS);
  const hint =
    candidates.length > 0 ? ` Did you mean "${candidates[0]}"?` : '';
  const error = new ConfigError({
    message: `Invalid tier "${raw}". Expected one of: ${TIERS.join(', ')}.${hint}`,
    errorCode: ErrorCode.INVALID_TIER,
    context: { setting: 'tier', value: raw },
  });
  error.suggestions = candidates.map((tier) => `Use --tier ${tier}`);
  throw error;
}
