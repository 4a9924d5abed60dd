// backend/src/migrations/1700000000000-CreateMerchantAccounts.ts
import { MigrationInterface, QueryRunner, Table } from "typeorm";

export class CreateMerchantAccounts1700000000000 implements MigrationInterface {
  name = "CreateMerchantAccounts1700000000000";

  public async up(queryRunner: QueryRunner): Promise<void> {
    // 店舗プロフィールテーブルの作成
    await queryRunner.createTable(
      new Table({
        name: "merchant_profiles",
        columns: [
          {
            name: "user_id",
            type: "varchar",
            length: "100",
            isPrimary: true,
          },
          {
            name: "business_name",
            type: "varchar",
            length: "255",
            isNullable: false,
          },
          {
            name: "business_type",
            type: "varchar",
            length: "100",
            isNullable: false,
          },
          {
            name: "tone",
            type: "varchar",
            length: "100",
            default: "'professional'",
          },
          {
            name: "brand_voice",
            type: "text",
            isNullable: true,
          },
          {
            name: "signature",
            type: "varchar",
            length: "255",
            isNullable: true,
            comment: "返信の末尾に付ける署名",
          },
          {
            name: "subscription_tier",
            type: "varchar",
            length: "20",
            default: "'free'",
            comment: "free / pro / enterprise",
          },
          {
            name: "usage_count",
            type: "int",
            default: 0,
            comment: "今期間の生成回数",
          },
          {
            name: "usage_reset_date",
            type: "datetime",
            precision: 3,
            isNullable: true,
            comment: "利用回数をリセットする日時",
          },
          {
            name: "created_at",
            type: "timestamp",
            default: "CURRENT_TIMESTAMP",
          },
          {
            name: "updated_at",
            type: "timestamp",
            default: "CURRENT_TIMESTAMP",
            onUpdate: "CURRENT_TIMESTAMP",
          },
        ],
      }),
      true
    );

    // APIキーテーブルの作成
    await queryRunner.createTable(
      new Table({
        name: "api_keys",
        columns: [
          {
            name: "id",
            type: "int",
            isPrimary: true,
            isGenerated: true,
            generationStrategy: "increment",
          },
          {
            name: "api_key",
            type: "varchar",
            length: "150",
            isNullable: false,
          },
          {
            name: "user_id",
            type: "varchar",
            length: "100",
            isNullable: false,
          },
          {
            name: "created_at",
            type: "timestamp",
            default: "CURRENT_TIMESTAMP",
          },
        ],
        indices: [
          {
            name: "idx_api_keys_api_key",
            columnNames: ["api_key"],
            isUnique: true,
          },
        ],
        foreignKeys: [
          {
            columnNames: ["user_id"],
            referencedTableName: "merchant_profiles",
            referencedColumnNames: ["user_id"],
            onDelete: "CASCADE",
          },
        ],
      }),
      true
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    // テーブルの削除（逆順）
    await queryRunner.dropTable("api_keys");
    await queryRunner.dropTable("merchant_profiles");
  }
}
