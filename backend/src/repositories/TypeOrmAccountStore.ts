// backend/src/repositories/TypeOrmAccountStore.ts
import { DataSource, Repository } from "typeorm";
import { MerchantProfile } from "../models/MerchantProfile";
import { ApiKey } from "../models/ApiKey";
import { AccountStore } from "./AccountStore";

/**
 * MySQL（TypeORM）に保存する AccountStore
 */
export class TypeOrmAccountStore implements AccountStore {
  private profileRepository: Repository<MerchantProfile>;
  private apiKeyRepository: Repository<ApiKey>;

  constructor(private dataSource: DataSource) {
    this.profileRepository = dataSource.getRepository(MerchantProfile);
    this.apiKeyRepository = dataSource.getRepository(ApiKey);
  }

  async lookupProfile(userId: string): Promise<MerchantProfile | null> {
    return this.profileRepository.findOne({ where: { user_id: userId } });
  }

  async saveProfile(profile: MerchantProfile): Promise<void> {
    await this.profileRepository.save(profile);
  }

  async createAccount(profile: MerchantProfile, apiKey: string): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      await manager.save(MerchantProfile, profile);
      await manager.save(
        ApiKey,
        manager.create(ApiKey, { api_key: apiKey, user_id: profile.user_id })
      );
    });
  }

  async resolveApiKey(apiKey: string): Promise<string | null> {
    const record = await this.apiKeyRepository.findOne({
      where: { api_key: apiKey },
    });
    return record ? record.user_id : null;
  }
}
