// backend/src/tests/helpers.ts
import { MerchantProfile, SubscriptionTier } from "../models/MerchantProfile";
import { LanguageModelProvider } from "../services/LanguageModelProvider";
import { ReviewInput } from "../interfaces/ReviewReply";

export function makeProfile(
  overrides: Partial<MerchantProfile> = {}
): MerchantProfile {
  return Object.assign(new MerchantProfile(), {
    user_id: "cafe-123",
    business_name: "Blue Door Cafe",
    business_type: "coffee shop",
    tone: "professional",
    brand_voice: null,
    signature: null,
    subscription_tier: SubscriptionTier.FREE,
    usage_count: 0,
    usage_reset_date: null,
    ...overrides,
  });
}

export function makeReview(overrides: Partial<ReviewInput> = {}): ReviewInput {
  return {
    review_text: "Great latte and the staff remembered my name.",
    rating: 5,
    reviewer_name: "Sam",
    platform: "google",
    context: null,
    ...overrides,
  };
}

/**
 * 呼び出し内容を記録し、あらかじめ決めた結果を返すプロバイダー
 */
export class FakeProvider implements LanguageModelProvider {
  calls: Array<{ prompt: string; maxTokens: number }> = [];

  constructor(private respond: (prompt: string) => Promise<string>) {}

  static returning(text: string): FakeProvider {
    return new FakeProvider(async () => text);
  }

  static failing(error: Error): FakeProvider {
    return new FakeProvider(async () => {
      throw error;
    });
  }

  async complete(prompt: string, maxTokens: number): Promise<string> {
    this.calls.push({ prompt, maxTokens });
    return this.respond(prompt);
  }
}

export const THREE_RESPONSES_JSON = JSON.stringify({
  responses: [
    { style: "Short & Sweet", text: "Thanks, Sam!" },
    { style: "Detailed & Personal", text: "Sam, we loved hearing about the latte." },
    { style: "Professional & Branded", text: "Thank you for visiting Blue Door Cafe." },
  ],
});

export function silenceConsole(): void {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
}
