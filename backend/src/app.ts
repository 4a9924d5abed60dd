// backend/src/app.ts
import express from "express";
import cors from "cors";
import morgan from "morgan";
import { AccountService } from "./services/AccountService";
import { ReviewResponseService } from "./services/ReviewResponseService";
import { AccountController } from "./controllers/AccountController";
import { ResponseController } from "./controllers/ResponseController";
import { authenticateApiKey } from "./middlewares/authMiddleware";
import { createAccountRoutes } from "./routes/accountRoutes";
import { createResponseRoutes } from "./routes/responseRoutes";
import { sendErrorResponse } from "./utils/errorResponse";

export const SERVICE_NAME = "Review Reply API";
export const SERVICE_VERSION = "1.0";

export interface AppDependencies {
  accountService: AccountService;
  reviewResponseService: ReviewResponseService;
  corsOrigin?: string;
  storageDriver: "memory" | "mysql";
  /** 保存先が利用可能か（ヘルスチェック用） */
  isStorageReady: () => boolean;
  /** false にするとアクセスログを出さない */
  requestLogging?: boolean;
}

export function createApp(deps: AppDependencies) {
  const app = express();

  // ヘルスチェックエンドポイント
  app.get("/health", (req, res) => {
    const storageReady = deps.isStorageReady();
    const memoryUsage = process.memoryUsage();

    res.status(storageReady ? 200 : 503).json({
      status: storageReady ? "ok" : "error",
      timestamp: new Date().toISOString(),
      storage: {
        driver: deps.storageDriver,
        status: storageReady ? "connected" : "disconnected",
      },
      memory: {
        rss: Math.round(memoryUsage.rss / 1024 / 1024),
        heapUsed: Math.round(memoryUsage.heapUsed / 1024 / 1024),
      },
    });
  });

  // ミドルウェアの設定（拡張機能からのアクセスを許可）
  app.use(cors({ origin: deps.corsOrigin ?? "*" }));
  app.use(express.json());
  if (deps.requestLogging !== false) {
    app.use(morgan("dev"));
  }

  app.get("/", (req, res) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: "operational",
    });
  });

  const requireApiKey = authenticateApiKey(deps.accountService);
  const accountController = new AccountController(deps.accountService);
  const responseController = new ResponseController(
    deps.reviewResponseService
  );

  app.use("/api", createAccountRoutes(accountController, requireApiKey));
  app.use("/api", createResponseRoutes(responseController, requireApiKey));

  // エラーハンドリング
  app.use(
    (
      err: unknown,
      req: express.Request,
      res: express.Response,
      next: express.NextFunction
    ) => {
      if (res.headersSent) {
        next(err);
        return;
      }
      sendErrorResponse(res, err, "Unhandled error");
    }
  );

  return app;
}
