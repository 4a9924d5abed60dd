// backend/src/services/ResponseGeneratorService.ts
import { z } from "zod";
import { LanguageModelProvider } from "./LanguageModelProvider";
import { PromptBuilderService } from "./PromptBuilderService";
import { GenerationFailedError } from "../errors/AppError";
import { GeneratedResponse, PromptSpec } from "../interfaces/ReviewReply";

export const DEFAULT_MAX_TOKENS = 1000;

const providerOutputSchema = z.object({
  responses: z.array(
    z
      .object({
        style: z.string(),
        text: z.string(),
      })
      // style/text 以外のキーもそのまま返す
      .passthrough()
  ),
});

export type ParseResult =
  | { kind: "parsed"; responses: GeneratedResponse[] }
  | { kind: "unparseable"; reason: string };

/**
 * モデル出力から ```json / ``` のマーカーを取り除く
 */
export function stripCodeFences(raw: string): string {
  return raw.replace(/```json/g, "").replace(/```/g, "").trim();
}

/**
 * モデル出力をパースする（例外は投げず、結果の種別で返す）
 */
export function parseProviderOutput(raw: string): ParseResult {
  const cleaned = stripCodeFences(raw);

  let json: unknown;
  try {
    json = JSON.parse(cleaned);
  } catch (error) {
    return {
      kind: "unparseable",
      reason: error instanceof Error ? error.message : String(error),
    };
  }

  const result = providerOutputSchema.safeParse(json);
  if (!result.success) {
    return {
      kind: "unparseable",
      reason: result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; "),
    };
  }

  return { kind: "parsed", responses: result.data.responses };
}

/**
 * モデル出力が使えない場合の定型返信（常に3件）
 */
export function buildFallbackResponses(spec: PromptSpec): GeneratedResponse[] {
  const positive = spec.sentiment === "positive";
  const signature = spec.signature ?? "";

  return [
    {
      style: "Short & Sweet",
      text: `Thank you for your ${spec.rating}-star review! We appreciate your feedback. ${signature}`.trim(),
    },
    {
      style: "Detailed & Personal",
      text: `Thank you for taking the time to share your experience at ${
        spec.businessName
      }. We're ${
        positive
          ? "thrilled"
          : "sorry to hear about your experience and would love to make it right"
      }. ${signature}`.trim(),
    },
    {
      style: "Professional & Branded",
      text: `We appreciate your feedback. ${
        positive
          ? "Your satisfaction is our priority and we hope to see you again soon!"
          : "We take all feedback seriously and would love the opportunity to improve. Please contact us directly."
      } ${signature}`.trim(),
    },
  ];
}

export interface ResponseGeneratorOptions {
  maxTokens?: number;
}

export class ResponseGeneratorService {
  private maxTokens: number;

  constructor(
    private provider: LanguageModelProvider,
    private promptBuilder: PromptBuilderService,
    options: ResponseGeneratorOptions = {}
  ) {
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  /**
   * 返信案を生成
   * プロバイダー呼び出しは1回のみ。出力が壊れている場合は定型返信を返す
   */
  async generate(spec: PromptSpec): Promise<GeneratedResponse[]> {
    const prompt = await this.promptBuilder.renderPrompt(spec);

    let raw: string;
    try {
      raw = await this.provider.complete(prompt, this.maxTokens);
    } catch (error) {
      console.error("AI generation error:", error);
      throw new GenerationFailedError(error);
    }

    const parsed = parseProviderOutput(raw);
    if (parsed.kind === "unparseable") {
      console.warn(
        `AI出力のパースに失敗したため定型返信を使用します: ${parsed.reason}`
      );
      return buildFallbackResponses(spec);
    }

    return parsed.responses;
  }
}
