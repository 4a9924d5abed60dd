// backend/src/interfaces/ReviewReply.ts

export type Sentiment = "positive" | "neutral" | "negative";

/**
 * 返信対象のレビュー（1回の生成リクエストの間だけ存在する）
 */
export interface ReviewInput {
  review_text: string;
  rating: number;
  reviewer_name?: string | null;
  platform: string;
  context?: string | null;
}

export interface GeneratedResponse {
  style: string;
  text: string;
}

/**
 * プロンプト生成に必要な情報をまとめたもの
 * フォールバック文面もここから組み立てる
 */
export interface PromptSpec {
  businessName: string;
  businessType: string;
  sentiment: Sentiment;
  rating: number;
  reviewerName: string;
  platform: string;
  reviewText: string;
  context: string | null;
  brandVoice: string | null;
  signature: string | null;
  tone: string;
  variantCount: number;
  styles: string[];
}

/** "unlimited" は月間上限なしのプラン */
export type RemainingQuota = number | "unlimited";

export interface GenerationResult {
  responses: GeneratedResponse[];
  usageRemaining: RemainingQuota;
}
