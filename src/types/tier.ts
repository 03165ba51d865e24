import { z } from 'zod';

export const Tier = z.enum(['operational', 'management', 'executive']);
export type Tier = z.infer<typeof Tier>;

export const TIERS: readonly Tier[] = Tier.options;

export function tierRank(tier: Tier): number {
  return TIERS.indexOf(tier);
}

/** The next tier up, or null at the top of the hierarchy. */
export function nextTier(tier: Tier): Tier | null {
  const rank = tierRank(tier);
  return rank < TIERS.length - 1 ? TIERS[rank + 1] : null;
}

export function isAbove(a: Tier, b: Tier): boolean {
  return tierRank(a) > tierRank(b);
}
