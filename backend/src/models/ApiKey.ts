import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from "typeorm";
import { MerchantProfile } from "./MerchantProfile";

@Entity("api_keys")
export class ApiKey {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index({ unique: true })
  @Column({ type: "varchar", length: 150 })
  api_key!: string;

  @Column({ type: "varchar", length: 100 })
  user_id!: string;

  @CreateDateColumn()
  created_at!: Date;

  @ManyToOne(() => MerchantProfile, (profile) => profile.api_keys, {
    onDelete: "CASCADE",
  })
  @JoinColumn({ name: "user_id" })
  profile!: MerchantProfile;
}
