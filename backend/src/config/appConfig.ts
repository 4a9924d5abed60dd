// backend/src/config/appConfig.ts
import dotenv from "dotenv";
import { z } from "zod";

// 環境変数の読み込み
dotenv.config();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  NODE_ENV: z.string().default("development"),
  CORS_ORIGIN: z.string().default("*"),

  STORAGE_DRIVER: z.enum(["memory", "mysql"]).default("memory"),
  MYSQL_HOST: z.string().default("localhost"),
  MYSQL_PORT: z.coerce.number().int().positive().default(3306),
  MYSQL_USER: z.string().default("reviewreply"),
  MYSQL_PASSWORD: z.string().default(""),
  MYSQL_DATABASE: z.string().default("reviewreply"),
  TYPEORM_CONNECTION_POOL_SIZE: z.coerce.number().int().positive().default(10),

  AI_PROVIDER: z.enum(["anthropic", "openai"]).default("anthropic"),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default("claude-sonnet-4-20250514"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o"),
  AI_MAX_TOKENS: z.coerce.number().int().positive().default(1000),
  AI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
});

export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  poolSize: number;
  logging: boolean;
}

export interface AIConfig {
  provider: "anthropic" | "openai";
  anthropicApiKey?: string;
  anthropicModel: string;
  openaiApiKey?: string;
  openaiModel: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  corsOrigin: string;
  storageDriver: "memory" | "mysql";
  database: DatabaseConfig;
  ai: AIConfig;
}

/**
 * 環境変数を検証して設定オブジェクトを作る
 * 空文字の変数は未設定として扱う
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = envSchema.parse(present);

  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    corsOrigin: parsed.CORS_ORIGIN,
    storageDriver: parsed.STORAGE_DRIVER,
    database: {
      host: parsed.MYSQL_HOST,
      port: parsed.MYSQL_PORT,
      username: parsed.MYSQL_USER,
      password: parsed.MYSQL_PASSWORD,
      database: parsed.MYSQL_DATABASE,
      poolSize: parsed.TYPEORM_CONNECTION_POOL_SIZE,
      logging: parsed.NODE_ENV === "development",
    },
    ai: {
      provider: parsed.AI_PROVIDER,
      anthropicApiKey: parsed.ANTHROPIC_API_KEY,
      anthropicModel: parsed.ANTHROPIC_MODEL,
      openaiApiKey: parsed.OPENAI_API_KEY,
      openaiModel: parsed.OPENAI_MODEL,
      maxTokens: parsed.AI_MAX_TOKENS,
      temperature: parsed.AI_TEMPERATURE,
      timeoutMs: parsed.AI_TIMEOUT_MS,
    },
  };
}
