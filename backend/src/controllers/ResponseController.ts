// backend/src/controllers/ResponseController.ts
import { Request, Response } from "express";
import { z } from "zod";
import { ReviewResponseService } from "../services/ReviewResponseService";
import { sendErrorResponse } from "../utils/errorResponse";
import { requireUserId } from "./AccountController";

export const reviewInputSchema = z.object({
  review_text: z
    .string()
    .refine((text) => text.trim().length > 0, "review_text must not be empty"),
  rating: z.coerce.number().int().min(1).max(5),
  reviewer_name: z.string().nullish(),
  platform: z.string().min(1).default("google"),
  context: z.string().nullish(),
});

export class ResponseController {
  constructor(private reviewResponseService: ReviewResponseService) {}

  /**
   * レビューへの返信案を生成
   */
  generate = async (req: Request, res: Response): Promise<void> => {
    try {
      const userId = requireUserId(req, res);
      if (!userId) return;

      const review = reviewInputSchema.parse(req.body);
      const result = await this.reviewResponseService.generateForUser(
        userId,
        review
      );

      res.status(200).json({
        responses: result.responses,
        usage_remaining: result.usageRemaining,
      });
    } catch (error) {
      sendErrorResponse(res, error, "Response generation error");
    }
  };
}
