// backend/src/errors/AppError.ts

export type AppErrorCode =
  | "UNKNOWN_TIER"
  | "QUOTA_EXCEEDED"
  | "GENERATION_FAILED"
  | "USER_NOT_FOUND"
  | "INVALID_API_KEY"
  | "ACCOUNT_ALREADY_EXISTS";

/**
 * HTTPステータスを持つアプリケーションエラーの基底クラス
 * コントローラーと最終エラーハンドラーは statusCode をそのままレスポンスに使う
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: AppErrorCode;

  constructor(
    message: string,
    statusCode: number,
    code: AppErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class UnknownTierError extends AppError {
  constructor(readonly tier: string) {
    super(`Invalid tier: ${tier}`, 400, "UNKNOWN_TIER");
  }
}

export class QuotaExceededError extends AppError {
  constructor(message: string) {
    super(message, 429, "QUOTA_EXCEEDED");
  }
}

/**
 * AIプロバイダー呼び出しそのものの失敗（ネットワーク・認証・プロバイダー側の制限など）
 * 出力のパース失敗はここに含めない
 */
export class GenerationFailedError extends AppError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`AI generation failed: ${detail}`, 500, "GENERATION_FAILED", {
      cause,
    });
  }
}

export class UserNotFoundError extends AppError {
  constructor(readonly userId: string) {
    super("User not found", 404, "USER_NOT_FOUND");
  }
}

export class InvalidApiKeyError extends AppError {
  constructor() {
    super("Invalid API key", 401, "INVALID_API_KEY");
  }
}

export class AccountAlreadyExistsError extends AppError {
  constructor(readonly userId: string) {
    super(`User already registered: ${userId}`, 409, "ACCOUNT_ALREADY_EXISTS");
  }
}
