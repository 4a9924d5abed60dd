// backend/src/routes/responseRoutes.ts
import express, { RequestHandler } from "express";
import { ResponseController } from "../controllers/ResponseController";

export function createResponseRoutes(
  responseController: ResponseController,
  requireApiKey: RequestHandler
) {
  const router = express.Router();

  router.post("/generate", requireApiKey, responseController.generate);

  return router;
}
