import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
} from "typeorm";
import { ApiKey } from "./ApiKey";

export enum SubscriptionTier {
  FREE = "free",
  PRO = "pro",
  ENTERPRISE = "enterprise",
}

@Entity("merchant_profiles")
export class MerchantProfile {
  @PrimaryColumn({ type: "varchar", length: 100 })
  user_id!: string;

  @Column({ type: "varchar", length: 255 })
  business_name!: string;

  @Column({ type: "varchar", length: 100 })
  business_type!: string;

  @Column({ type: "varchar", length: 100, default: "professional" })
  tone!: string;

  @Column({ type: "text", nullable: true })
  brand_voice!: string | null;

  @Column({ type: "varchar", length: 255, nullable: true })
  signature!: string | null;

  // 不明な値は読み出し時に UnknownTierError として扱うため enum 型にはしない
  @Column({ type: "varchar", length: 20, default: SubscriptionTier.FREE })
  subscription_tier!: string;

  @Column({ type: "int", default: 0 })
  usage_count!: number;

  @Column({ type: "datetime", precision: 3, nullable: true })
  usage_reset_date!: Date | null;

  @CreateDateColumn()
  created_at!: Date;

  @UpdateDateColumn()
  updated_at!: Date;

  @OneToMany(() => ApiKey, (apiKey) => apiKey.profile)
  api_keys!: ApiKey[];
}
