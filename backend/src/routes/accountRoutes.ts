// backend/src/routes/accountRoutes.ts
import express, { RequestHandler } from "express";
import { AccountController } from "../controllers/AccountController";

export function createAccountRoutes(
  accountController: AccountController,
  requireApiKey: RequestHandler
) {
  const router = express.Router();

  // 新規登録（認証不要）
  router.post("/register", accountController.register);

  // 以下はAPIキーが必要
  router.get("/profile", requireApiKey, accountController.getProfile);
  router.put("/profile", requireApiKey, accountController.updateProfile);
  router.get("/usage", requireApiKey, accountController.getUsage);
  router.post("/upgrade", requireApiKey, accountController.upgrade);

  return router;
}
