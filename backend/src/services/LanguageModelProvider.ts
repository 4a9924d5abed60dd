// backend/src/services/LanguageModelProvider.ts
import { ChatAnthropic } from "@langchain/anthropic";
import { ChatOpenAI } from "@langchain/openai";
import { StringOutputParser } from "@langchain/core/output_parsers";
import { Runnable } from "@langchain/core/runnables";
import { AIConfig } from "../config/appConfig";

/**
 * 言語モデルプロバイダー
 * プロンプト文字列と出力トークン上限を受け取り、生のテキストを返す
 */
export interface LanguageModelProvider {
  complete(prompt: string, maxTokens: number): Promise<string>;
}

/** プロンプト文字列を受け取りテキストを返すチェーン */
export type TextChain = Runnable<string, string>;

export type TextChainFactory = (maxTokens: number) => TextChain;

/**
 * LangChain のチャットモデルを使ったプロバイダー実装
 * チェーンは出力上限ごとに1度だけ生成して使い回す
 */
export class LangChainModelProvider implements LanguageModelProvider {
  private chains = new Map<number, TextChain>();

  constructor(private createChain: TextChainFactory) {}

  async complete(prompt: string, maxTokens: number): Promise<string> {
    let chain = this.chains.get(maxTokens);
    if (!chain) {
      chain = this.createChain(maxTokens);
      this.chains.set(maxTokens, chain);
    }

    return chain.invoke(prompt);
  }
}

/**
 * 設定に応じたチャットモデルのチェーン生成関数を返す
 * リトライはせず、失敗はそのまま呼び出し元へ返す
 */
export function createTextChainFactory(config: AIConfig): TextChainFactory {
  if (config.provider === "openai") {
    if (!config.openaiApiKey) {
      console.warn("警告: OPENAI_API_KEY が環境変数に設定されていません");
    }
    console.log(`OpenAI モデルを使用: ${config.openaiModel}`);

    return (maxTokens) =>
      new ChatOpenAI({
        model: config.openaiModel,
        apiKey: config.openaiApiKey,
        temperature: config.temperature,
        maxTokens,
        maxRetries: 0,
        timeout: config.timeoutMs,
      }).pipe(new StringOutputParser());
  }

  if (!config.anthropicApiKey) {
    console.warn("警告: ANTHROPIC_API_KEY が環境変数に設定されていません");
  }
  console.log(`Anthropic モデルを使用: ${config.anthropicModel}`);

  return (maxTokens) =>
    new ChatAnthropic({
      model: config.anthropicModel,
      apiKey: config.anthropicApiKey,
      temperature: config.temperature,
      maxTokens,
      maxRetries: 0,
      clientOptions: { timeout: config.timeoutMs },
    }).pipe(new StringOutputParser());
}
