// backend/src/constants/TierPolicies.ts
import { SubscriptionTier } from "../models/MerchantProfile";
import { UnknownTierError } from "../errors/AppError";

/** 月間上限の「無制限」を表す値 */
export const UNLIMITED_QUOTA = -1;

export interface TierPolicy {
  monthlyQuota: number;
  variantCount: number;
}

/**
 * プランごとの月間生成上限と返信案の数
 */
export const TierPolicies: Readonly<Record<SubscriptionTier, Readonly<TierPolicy>>> =
  Object.freeze({
    [SubscriptionTier.FREE]: Object.freeze({ monthlyQuota: 10, variantCount: 3 }),
    [SubscriptionTier.PRO]: Object.freeze({ monthlyQuota: 500, variantCount: 3 }),
    [SubscriptionTier.ENTERPRISE]: Object.freeze({
      monthlyQuota: UNLIMITED_QUOTA,
      variantCount: 5,
    }),
  });

const TIER_VALUES: ReadonlySet<string> = new Set(Object.values(SubscriptionTier));

export function isSubscriptionTier(value: string): value is SubscriptionTier {
  return TIER_VALUES.has(value);
}

export function policyFor(tier: string): Readonly<TierPolicy> {
  if (!isSubscriptionTier(tier)) {
    throw new UnknownTierError(tier);
  }
  return TierPolicies[tier];
}

export function isUnlimited(policy: TierPolicy): boolean {
  return policy.monthlyQuota === UNLIMITED_QUOTA;
}
