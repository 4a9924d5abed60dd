// backend/src/middlewares/authMiddleware.ts
import { Request, Response, NextFunction } from "express";
import { AccountService } from "../services/AccountService";
import { sendErrorResponse } from "../utils/errorResponse";

export const API_KEY_HEADER = "x-api-key";

/**
 * X-API-Key ヘッダーでユーザーを認証するミドルウェア
 */
export function authenticateApiKey(accountService: AccountService) {
  return async (req: Request, res: Response, next: NextFunction) => {
    const apiKey = req.header(API_KEY_HEADER);

    if (!apiKey) {
      console.warn("Authentication failed: No API key header");
      res.status(401).json({
        success: false,
        message: "API key required",
      });
      return;
    }

    try {
      req.userId = await accountService.authenticate(apiKey);
      next();
    } catch (error) {
      sendErrorResponse(res, error, "Authentication error");
    }
  };
}

// Request型の拡張
declare global {
  namespace Express {
    interface Request {
      userId?: string;
    }
  }
}
