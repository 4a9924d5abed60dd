// backend/src/services/UsageTrackerService.ts
import { MerchantProfile, SubscriptionTier } from "../models/MerchantProfile";
import {
  policyFor,
  isUnlimited,
  isSubscriptionTier,
} from "../constants/TierPolicies";
import { QuotaExceededError } from "../errors/AppError";
import { RemainingQuota } from "../interfaces/ReviewReply";

/** 利用回数のリセット周期 */
export const BILLING_PERIOD_DAYS = 30;
const BILLING_PERIOD_MS = BILLING_PERIOD_DAYS * 24 * 60 * 60 * 1000;

export interface UsageSummary {
  tier: string;
  usage_count: number;
  monthly_limit: number | "unlimited";
  reset_date: string | null;
}

const UPGRADE_HINTS: Record<SubscriptionTier, string> = {
  [SubscriptionTier.FREE]: "Upgrade to Pro for 500 responses/month",
  [SubscriptionTier.PRO]: "Upgrade to Enterprise for unlimited responses",
  [SubscriptionTier.ENTERPRISE]: "",
};

export class UsageTrackerService {
  /**
   * 利用可能かをチェックし、残り回数を返す
   *
   * 初回利用時のリセット日設定と期限切れ時のリセットはチェックの副作用として
   * profile に反映される（上限超過で例外になった場合も同様）。
   * 利用回数の加算は reserveGeneration で行う。
   */
  checkAndReserve(profile: MerchantProfile, now: Date): RemainingQuota {
    if (!profile.usage_reset_date) {
      profile.usage_reset_date = nextResetDate(now);
    } else if (now.getTime() > profile.usage_reset_date.getTime()) {
      profile.usage_count = 0;
      profile.usage_reset_date = nextResetDate(now);
    }

    const policy = policyFor(profile.subscription_tier);
    if (isUnlimited(policy)) {
      return "unlimited";
    }

    if (profile.usage_count >= policy.monthlyQuota) {
      const tier = profile.subscription_tier;
      const hint = isSubscriptionTier(tier) ? UPGRADE_HINTS[tier] : "";
      throw new QuotaExceededError(
        hint ? `Monthly limit reached. ${hint}` : "Monthly limit reached"
      );
    }

    return policy.monthlyQuota - profile.usage_count;
  }

  /**
   * 生成1回分を先に予約する（フォールバックを含め、成功すればそのまま確定）
   */
  reserveGeneration(profile: MerchantProfile): void {
    profile.usage_count += 1;
  }

  /**
   * 生成に失敗した予約を取り消す（0未満にはしない）
   */
  releaseGeneration(profile: MerchantProfile): void {
    profile.usage_count = Math.max(0, profile.usage_count - 1);
  }

  summarize(profile: MerchantProfile): UsageSummary {
    const policy = policyFor(profile.subscription_tier);
    return {
      tier: profile.subscription_tier,
      usage_count: profile.usage_count,
      monthly_limit: isUnlimited(policy) ? "unlimited" : policy.monthlyQuota,
      reset_date: profile.usage_reset_date
        ? profile.usage_reset_date.toISOString()
        : null,
    };
  }
}

function nextResetDate(now: Date): Date {
  return new Date(now.getTime() + BILLING_PERIOD_MS);
}
