import "reflect-metadata";
import { DataSource } from "typeorm";
import { AppConfig, loadConfig } from "./config/appConfig";
import { createApp } from "./app";
import { createDataSource } from "./data-source";
import { AccountStore } from "./repositories/AccountStore";
import { InMemoryAccountStore } from "./repositories/InMemoryAccountStore";
import { TypeOrmAccountStore } from "./repositories/TypeOrmAccountStore";
import {
  LangChainModelProvider,
  createTextChainFactory,
} from "./services/LanguageModelProvider";
import { UsageTrackerService } from "./services/UsageTrackerService";
import { PromptBuilderService } from "./services/PromptBuilderService";
import { ResponseGeneratorService } from "./services/ResponseGeneratorService";
import { ReviewResponseService } from "./services/ReviewResponseService";
import { AccountService } from "./services/AccountService";
import { KeyedLock } from "./utils/KeyedLock";

/**
 * 保存先の初期化
 * mysql の場合は接続とマイグレーションを行う
 */
async function initializeStore(
  config: AppConfig
): Promise<{ store: AccountStore; dataSource: DataSource | null }> {
  if (config.storageDriver === "memory") {
    console.warn(
      "STORAGE_DRIVER=memory: アカウント情報はプロセス終了時に失われます"
    );
    return { store: new InMemoryAccountStore(), dataSource: null };
  }

  const dataSource = createDataSource(config.database);
  await dataSource.initialize();
  console.log("データベース接続確立");

  await dataSource.runMigrations();
  console.log("データベースマイグレーションが正常に適用されました");

  return { store: new TypeOrmAccountStore(dataSource), dataSource };
}

/**
 * サーバー起動関数
 */
async function startServer(): Promise<void> {
  const config = loadConfig();
  const { store, dataSource } = await initializeStore(config);

  const profileLock = new KeyedLock();
  const usageTracker = new UsageTrackerService();
  const promptBuilder = new PromptBuilderService();
  const provider = new LangChainModelProvider(
    createTextChainFactory(config.ai)
  );
  const responseGenerator = new ResponseGeneratorService(
    provider,
    promptBuilder,
    { maxTokens: config.ai.maxTokens }
  );

  const app = createApp({
    accountService: new AccountService(store, usageTracker, profileLock),
    reviewResponseService: new ReviewResponseService(
      store,
      usageTracker,
      promptBuilder,
      responseGenerator,
      profileLock
    ),
    corsOrigin: config.corsOrigin,
    storageDriver: config.storageDriver,
    isStorageReady: () => (dataSource ? dataSource.isInitialized : true),
  });

  const server = app.listen(config.port, () => {
    console.log(`サーバー起動: http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} を受信しました。サーバーを停止します`);
    server.close(() => {
      const closing = dataSource ? dataSource.destroy() : Promise.resolve();
      closing
        .then(() => process.exit(0))
        .catch((error) => {
          console.error("データベース切断エラー:", error);
          process.exit(1);
        });
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

startServer().catch((error) => {
  console.error("サーバー起動エラー:", error);
  process.exit(1);
});
