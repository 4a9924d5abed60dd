// backend/src/repositories/AccountStore.ts
import { MerchantProfile } from "../models/MerchantProfile";

/**
 * 店舗プロフィールとAPIキーの保存先
 * 生成処理はこのインターフェースだけに依存する
 */
export interface AccountStore {
  lookupProfile(userId: string): Promise<MerchantProfile | null>;
  saveProfile(profile: MerchantProfile): Promise<void>;
  /** プロフィールとAPIキーをまとめて登録 */
  createAccount(profile: MerchantProfile, apiKey: string): Promise<void>;
  /** APIキーからユーザーIDを引く（未登録なら null） */
  resolveApiKey(apiKey: string): Promise<string | null>;
}
