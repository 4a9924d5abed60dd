// backend/src/data-source.ts
import "reflect-metadata";
import { DataSource } from "typeorm";
import { DatabaseConfig } from "./config/appConfig";
import { MerchantProfile } from "./models/MerchantProfile";
import { ApiKey } from "./models/ApiKey";
import { CreateMerchantAccounts1700000000000 } from "./migrations/1700000000000-CreateMerchantAccounts";

export function createDataSource(config: DatabaseConfig): DataSource {
  return new DataSource({
    type: "mysql",
    host: config.host,
    port: config.port,
    username: config.username,
    password: config.password,
    database: config.database,
    synchronize: false, // マイグレーションを使うのでfalseに設定
    logging: config.logging,
    entities: [MerchantProfile, ApiKey],
    migrations: [CreateMerchantAccounts1700000000000],
    subscribers: [],
    poolSize: config.poolSize,
    connectTimeout: 20000,
    maxQueryExecutionTime: 10000,
  });
}
