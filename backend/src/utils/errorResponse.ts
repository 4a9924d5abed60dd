// backend/src/utils/errorResponse.ts
import { Response } from "express";
import { z } from "zod";
import { AppError } from "../errors/AppError";

/**
 * body-parser などが付ける 4xx の status / statusCode を取り出す
 */
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null) return null;

  const status =
    "statusCode" in error
      ? error.statusCode
      : "status" in error
      ? error.status
      : undefined;

  return typeof status === "number" && status >= 400 && status < 500
    ? status
    : null;
}

/**
 * 例外をHTTPレスポンスに変換
 * ZodError → 400、AppError → statusCode、それ以外 → 500
 */
export function sendErrorResponse(
  res: Response,
  error: unknown,
  context: string
): void {
  if (error instanceof z.ZodError) {
    res.status(400).json({
      success: false,
      message: "Validation error",
      errors: error.errors,
    });
    return;
  }

  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      console.error(`${context}:`, error);
    } else {
      console.warn(`${context}: ${error.code} ${error.message}`);
    }
    res.status(error.statusCode).json({
      success: false,
      message: error.message,
    });
    return;
  }

  const status = clientErrorStatus(error);
  if (status !== null) {
    res.status(status).json({
      success: false,
      message: error instanceof Error ? error.message : "Bad request",
    });
    return;
  }

  console.error(`${context}:`, error);
  res.status(500).json({
    success: false,
    message: "Internal server error",
  });
}
