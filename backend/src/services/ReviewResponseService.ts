// backend/src/services/ReviewResponseService.ts
import { AccountStore } from "../repositories/AccountStore";
import { MerchantProfile } from "../models/MerchantProfile";
import { UsageTrackerService } from "./UsageTrackerService";
import { PromptBuilderService } from "./PromptBuilderService";
import { ResponseGeneratorService } from "./ResponseGeneratorService";
import { policyFor } from "../constants/TierPolicies";
import { KeyedLock } from "../utils/KeyedLock";
import { UserNotFoundError } from "../errors/AppError";
import {
  GeneratedResponse,
  GenerationResult,
  PromptSpec,
  RemainingQuota,
  ReviewInput,
} from "../interfaces/ReviewReply";

export type Clock = () => Date;

interface Reservation {
  spec: PromptSpec;
  remaining: RemainingQuota;
}

/**
 * レビュー返信生成の一連の処理
 * 利用上限チェックと予約 → プロンプト生成 → AI生成（失敗時は予約を取り消す）
 */
export class ReviewResponseService {
  constructor(
    private store: AccountStore,
    private usageTracker: UsageTrackerService,
    private promptBuilder: PromptBuilderService,
    private responseGenerator: ResponseGeneratorService,
    private profileLock: KeyedLock,
    private clock: Clock = () => new Date()
  ) {}

  async generateForUser(
    userId: string,
    review: ReviewInput
  ): Promise<GenerationResult> {
    // チェックと予約だけを直列に実行し、AI呼び出しはロックの外で行う
    const { spec, remaining } = await this.profileLock.run(userId, () =>
      this.reserve(userId, review)
    );

    let responses: GeneratedResponse[];
    try {
      responses = await this.responseGenerator.generate(spec);
    } catch (error) {
      await this.release(userId);
      throw error;
    }

    return {
      responses,
      usageRemaining: remaining === "unlimited" ? remaining : remaining - 1,
    };
  }

  private async reserve(
    userId: string,
    review: ReviewInput
  ): Promise<Reservation> {
    const profile = await this.store.lookupProfile(userId);
    if (!profile) {
      throw new UserNotFoundError(userId);
    }

    let remaining: RemainingQuota;
    try {
      remaining = this.usageTracker.checkAndReserve(profile, this.clock());
    } catch (error) {
      // リセット日の更新は上限超過時も保存する
      await this.saveAfterFailure(profile);
      throw error;
    }

    this.usageTracker.reserveGeneration(profile);
    await this.store.saveProfile(profile);

    const { variantCount } = policyFor(profile.subscription_tier);
    const spec = this.promptBuilder.buildPrompt(review, profile, variantCount);
    console.log(
      `返信生成開始: userId=${userId}, sentiment=${spec.sentiment}, variants=${variantCount}`
    );

    return { spec, remaining };
  }

  /**
   * 生成に失敗した分の予約を取り消す
   */
  private async release(userId: string): Promise<void> {
    try {
      await this.profileLock.run(userId, async () => {
        const profile = await this.store.lookupProfile(userId);
        if (!profile) return;
        this.usageTracker.releaseGeneration(profile);
        await this.store.saveProfile(profile);
      });
    } catch (error) {
      console.error(`利用回数の取り消しに失敗しました: userId=${userId}`, error);
    }
  }

  /**
   * 失敗時の保存。保存エラーは記録のみ行い、元のエラーを優先する
   */
  private async saveAfterFailure(profile: MerchantProfile): Promise<void> {
    try {
      await this.store.saveProfile(profile);
    } catch (error) {
      console.error(
        `プロフィールの保存に失敗しました: userId=${profile.user_id}`,
        error
      );
    }
  }
}
