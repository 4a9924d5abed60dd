// backend/src/services/PromptBuilderService.ts
import { PromptTemplate } from "@langchain/core/prompts";
import { MerchantProfile } from "../models/MerchantProfile";
import { stylesFor, ResponseStyles } from "../constants/ResponseStyles";
import {
  PromptSpec,
  ReviewInput,
  Sentiment,
} from "../interfaces/ReviewReply";

const DEFAULT_REVIEWER_NAME = "customer";

const REPLY_PROMPT = PromptTemplate.fromTemplate(
  `You are responding to a {sentiment} review for {business_name}, a {business_type}.

Review ({rating} stars) from {reviewer_name} on {platform}:
"{review_text}"
{context_line}{brand_context}{signature_instruction}

Generate {variant_count} different response options with a {tone} tone:

{style_list}

IMPORTANT RULES:
- For negative reviews: Acknowledge issue, apologize sincerely, offer solution
- For positive reviews: Thank genuinely, reinforce specific points they mentioned
- For neutral reviews: Thank them, address any concern they raised, invite them back
- Tailor the length and tone of each response to its style
- Match the energy level of the review
- Never be defensive or robotic
- Include specific details from their review

Return ONLY valid JSON with no markdown formatting, one entry per style above:
{output_example}`
);

/**
 * 星評価から感情を判定（4以上: positive、2以下: negative、それ以外: neutral）
 */
export function classifySentiment(rating: number): Sentiment {
  if (rating >= 4) return "positive";
  if (rating <= 2) return "negative";
  return "neutral";
}

export class PromptBuilderService {
  /**
   * レビューと店舗プロフィールからプロンプト仕様を組み立てる
   */
  buildPrompt(
    review: ReviewInput,
    profile: MerchantProfile,
    variantCount: number
  ): PromptSpec {
    return {
      businessName: profile.business_name,
      businessType: profile.business_type,
      sentiment: classifySentiment(review.rating),
      rating: review.rating,
      reviewerName: review.reviewer_name?.trim() || DEFAULT_REVIEWER_NAME,
      platform: review.platform,
      reviewText: review.review_text,
      context: review.context?.trim() || null,
      brandVoice: profile.brand_voice || null,
      signature: profile.signature || null,
      tone: profile.tone,
      variantCount,
      styles: stylesFor(variantCount).map((style) => style.label),
    };
  }

  /**
   * モデルに渡すプロンプト文字列を生成
   */
  async renderPrompt(spec: PromptSpec): Promise<string> {
    return REPLY_PROMPT.format({
      sentiment: spec.sentiment,
      business_name: spec.businessName,
      business_type: spec.businessType,
      rating: spec.rating,
      reviewer_name: spec.reviewerName,
      platform: spec.platform,
      review_text: spec.reviewText,
      context_line: spec.context ? `\nAdditional context: ${spec.context}` : "",
      brand_context: spec.brandVoice ? `\n\nBrand Voice: ${spec.brandVoice}` : "",
      signature_instruction: signatureInstruction(spec),
      variant_count: spec.variantCount,
      tone: spec.tone,
      style_list: formatStyleList(spec.styles),
      output_example: JSON.stringify(
        {
          responses: spec.styles.map((style) => ({
            style,
            text: "response here",
          })),
        },
        null,
        2
      ),
    });
  }
}

export function signatureInstruction(spec: PromptSpec): string {
  return spec.signature ? `\n\nAlways end with: ${spec.signature}` : "";
}

function formatStyleList(labels: string[]): string {
  return labels
    .map((label, index) => {
      const style = ResponseStyles.find((s) => s.label === label);
      const guidance = style ? ` (${style.guidance})` : "";
      return `${index + 1}. ${label}${guidance}`;
    })
    .join("\n");
}
