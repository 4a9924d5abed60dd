// backend/src/services/AccountService.ts
import { randomBytes } from "crypto";
import { MerchantProfile, SubscriptionTier } from "../models/MerchantProfile";
import { AccountStore } from "../repositories/AccountStore";
import { policyFor, TierPolicy } from "../constants/TierPolicies";
import { UsageTrackerService, UsageSummary } from "./UsageTrackerService";
import { KeyedLock } from "../utils/KeyedLock";
import {
  AccountAlreadyExistsError,
  InvalidApiKeyError,
  UserNotFoundError,
} from "../errors/AppError";

export interface RegisterInput {
  user_id: string;
  business_name: string;
  business_type: string;
  tone?: string;
  brand_voice?: string | null;
  signature?: string | null;
  subscription_tier?: string;
}

/** 利用者が変更できる項目のみ */
export interface ProfileUpdate {
  business_name?: string;
  business_type?: string;
  tone?: string;
  brand_voice?: string | null;
  signature?: string | null;
}

const UPDATABLE_FIELDS = [
  "business_name",
  "business_type",
  "tone",
  "brand_voice",
  "signature",
] as const;

export function generateApiKey(userId: string): string {
  return `rr_${userId}_${randomBytes(16).toString("hex")}`;
}

export class AccountService {
  constructor(
    private store: AccountStore,
    private usageTracker: UsageTrackerService,
    private profileLock: KeyedLock
  ) {}

  /**
   * 新規登録してAPIキーを発行
   */
  async register(
    input: RegisterInput
  ): Promise<{ apiKey: string; profile: MerchantProfile }> {
    const tier = input.subscription_tier ?? SubscriptionTier.FREE;
    policyFor(tier);

    return this.profileLock.run(input.user_id, async () => {
      const existing = await this.store.lookupProfile(input.user_id);
      if (existing) {
        throw new AccountAlreadyExistsError(input.user_id);
      }

      const profile = new MerchantProfile();
      profile.user_id = input.user_id;
      profile.business_name = input.business_name;
      profile.business_type = input.business_type;
      profile.tone = input.tone || "professional";
      profile.brand_voice = input.brand_voice || null;
      profile.signature = input.signature || null;
      profile.subscription_tier = tier;
      profile.usage_count = 0;
      profile.usage_reset_date = null;

      const apiKey = generateApiKey(profile.user_id);
      await this.store.createAccount(profile, apiKey);
      console.log(`ユーザー登録: userId=${profile.user_id}, tier=${tier}`);

      return { apiKey, profile };
    });
  }

  /**
   * APIキーからユーザーIDを取得
   */
  async authenticate(apiKey: string): Promise<string> {
    const userId = await this.store.resolveApiKey(apiKey);
    if (!userId) {
      throw new InvalidApiKeyError();
    }
    return userId;
  }

  async getProfile(userId: string): Promise<MerchantProfile> {
    const profile = await this.store.lookupProfile(userId);
    if (!profile) {
      throw new UserNotFoundError(userId);
    }
    return profile;
  }

  /**
   * プロフィール設定を更新（利用状況とプランは変更しない）
   */
  async updateProfile(
    userId: string,
    updates: ProfileUpdate
  ): Promise<MerchantProfile> {
    return this.profileLock.run(userId, async () => {
      const profile = await this.getProfile(userId);

      for (const field of UPDATABLE_FIELDS) {
        const value = updates[field];
        if (value === undefined) continue;

        if (field === "brand_voice" || field === "signature") {
          profile[field] = value || null;
        } else if (value) {
          profile[field] = value;
        }
      }

      await this.store.saveProfile(profile);
      return profile;
    });
  }

  /**
   * プランを変更
   * 不明なプランの場合はプロフィールに触れずに UnknownTierError
   */
  async upgradeTier(
    userId: string,
    tier: string
  ): Promise<{ profile: MerchantProfile; policy: Readonly<TierPolicy> }> {
    const policy = policyFor(tier);

    return this.profileLock.run(userId, async () => {
      const profile = await this.getProfile(userId);
      profile.subscription_tier = tier;
      await this.store.saveProfile(profile);
      console.log(`プラン変更: userId=${userId}, tier=${tier}`);
      return { profile, policy };
    });
  }

  async getUsage(userId: string): Promise<UsageSummary> {
    const profile = await this.getProfile(userId);
    return this.usageTracker.summarize(profile);
  }
}
