// backend/src/repositories/InMemoryAccountStore.ts
import { MerchantProfile } from "../models/MerchantProfile";
import { AccountStore } from "./AccountStore";

/**
 * プロセス内メモリに保持する AccountStore
 * 呼び出し側の変更が保存前に反映されないよう、出し入れのたびにコピーする
 */
export class InMemoryAccountStore implements AccountStore {
  private profiles = new Map<string, MerchantProfile>();
  private apiKeys = new Map<string, string>();

  async lookupProfile(userId: string): Promise<MerchantProfile | null> {
    const profile = this.profiles.get(userId);
    return profile ? copyProfile(profile) : null;
  }

  async saveProfile(profile: MerchantProfile): Promise<void> {
    const copy = copyProfile(profile);
    copy.updated_at = new Date();
    this.profiles.set(profile.user_id, copy);
  }

  async createAccount(profile: MerchantProfile, apiKey: string): Promise<void> {
    const now = new Date();
    const copy = copyProfile(profile);
    copy.created_at = now;
    copy.updated_at = now;
    this.profiles.set(profile.user_id, copy);
    this.apiKeys.set(apiKey, profile.user_id);
  }

  async resolveApiKey(apiKey: string): Promise<string | null> {
    return this.apiKeys.get(apiKey) ?? null;
  }
}

function copyProfile(profile: MerchantProfile): MerchantProfile {
  const copy = Object.assign(new MerchantProfile(), profile);
  copy.usage_reset_date = profile.usage_reset_date
    ? new Date(profile.usage_reset_date.getTime())
    : null;
  return copy;
}
