// backend/src/controllers/AccountController.ts
import { Request, Response } from "express";
import { z } from "zod";
import { AccountService } from "../services/AccountService";
import { MerchantProfile } from "../models/MerchantProfile";
import { isUnlimited } from "../constants/TierPolicies";
import { sendErrorResponse } from "../utils/errorResponse";

const registerSchema = z.object({
  user_id: z.string().min(1).max(100),
  business_name: z.string().min(1).max(255),
  business_type: z.string().min(1).max(100),
  tone: z.string().max(100).optional(),
  brand_voice: z.string().nullish(),
  signature: z.string().max(255).nullish(),
  subscription_tier: z.string().optional(),
});

const profileUpdateSchema = z.object({
  business_name: z.string().min(1).max(255).optional(),
  business_type: z.string().min(1).max(100).optional(),
  tone: z.string().max(100).optional(),
  brand_voice: z.string().nullish(),
  signature: z.string().max(255).nullish(),
});

const upgradeSchema = z.object({
  tier: z.string().min(1, "tier is required"),
});

/**
 * クライアントへ返すプロフィール形式
 */
export function toProfileResponse(profile: MerchantProfile) {
  return {
    user_id: profile.user_id,
    business_name: profile.business_name,
    business_type: profile.business_type,
    tone: profile.tone,
    brand_voice: profile.brand_voice,
    signature: profile.signature,
    subscription_tier: profile.subscription_tier,
    usage_count: profile.usage_count,
    usage_reset_date: profile.usage_reset_date
      ? profile.usage_reset_date.toISOString()
      : null,
  };
}

export class AccountController {
  constructor(private accountService: AccountService) {}

  /**
   * 新規登録とAPIキーの発行
   */
  register = async (req: Request, res: Response): Promise<void> => {
    try {
      const validatedData = registerSchema.parse(req.body);
      const { apiKey, profile } = await this.accountService.register(
        validatedData
      );

      res.status(201).json({
        api_key: apiKey,
        message: "Registration successful",
        tier: profile.subscription_tier,
      });
    } catch (error) {
      sendErrorResponse(res, error, "Registration error");
    }
  };

  getProfile = async (req: Request, res: Response): Promise<void> => {
    try {
      const userId = requireUserId(req, res);
      if (!userId) return;

      const profile = await this.accountService.getProfile(userId);
      res.status(200).json(toProfileResponse(profile));
    } catch (error) {
      sendErrorResponse(res, error, "Profile fetch error");
    }
  };

  /**
   * プロフィール設定の更新（許可された項目のみ）
   */
  updateProfile = async (req: Request, res: Response): Promise<void> => {
    try {
      const userId = requireUserId(req, res);
      if (!userId) return;

      const updates = profileUpdateSchema.parse(req.body ?? {});
      const profile = await this.accountService.updateProfile(userId, updates);

      res.status(200).json({
        message: "Profile updated",
        profile: toProfileResponse(profile),
      });
    } catch (error) {
      sendErrorResponse(res, error, "Profile update error");
    }
  };

  getUsage = async (req: Request, res: Response): Promise<void> => {
    try {
      const userId = requireUserId(req, res);
      if (!userId) return;

      const usage = await this.accountService.getUsage(userId);
      res.status(200).json(usage);
    } catch (error) {
      sendErrorResponse(res, error, "Usage fetch error");
    }
  };

  /**
   * プラン変更（tier は body か query で受け取る）
   */
  upgrade = async (req: Request, res: Response): Promise<void> => {
    try {
      const userId = requireUserId(req, res);
      if (!userId) return;

      const { tier } = upgradeSchema.parse({
        tier: req.body?.tier ?? req.query.tier,
      });
      const { policy } = await this.accountService.upgradeTier(userId, tier);

      res.status(200).json({
        message: `Upgraded to ${tier}`,
        new_limit: isUnlimited(policy) ? "unlimited" : policy.monthlyQuota,
      });
    } catch (error) {
      sendErrorResponse(res, error, "Upgrade error");
    }
  };
}

/**
 * 認証ミドルウェアで設定された userId を取り出す（なければ401を返す）
 */
export function requireUserId(req: Request, res: Response): string | null {
  if (!req.userId) {
    res.status(401).json({
      success: false,
      message: "Not authenticated",
    });
    return null;
  }
  return req.userId;
}
