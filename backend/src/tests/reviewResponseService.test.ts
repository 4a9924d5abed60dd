import { ReviewResponseService } from "../services/ReviewResponseService";
import { UsageTrackerService } from "../services/UsageTrackerService";
import { PromptBuilderService } from "../services/PromptBuilderService";
import { ResponseGeneratorService } from "../services/ResponseGeneratorService";
import { AccountService } from "../services/AccountService";
import { InMemoryAccountStore } from "../repositories/InMemoryAccountStore";
import { MerchantProfile } from "../models/MerchantProfile";
import { KeyedLock } from "../utils/KeyedLock";
import {
  GenerationFailedError,
  QuotaExceededError,
  UserNotFoundError,
} from "../errors/AppError";
import {
  FakeProvider,
  THREE_RESPONSES_JSON,
  makeProfile,
  makeReview,
  silenceConsole,
} from "./helpers";

const NOW = new Date("2026-05-01T09:00:00.000Z");

/**
 * 指定回数だけ保存に成功し、その後は失敗するストア
 */
class FailingSaveStore extends InMemoryAccountStore {
  constructor(private savesBeforeFailure: number) {
    super();
  }

  async saveProfile(profile: MerchantProfile): Promise<void> {
    if (this.savesBeforeFailure <= 0) {
      throw new Error("connection lost");
    }
    this.savesBeforeFailure -= 1;
    return super.saveProfile(profile);
  }
}

function setup(
  provider: FakeProvider,
  store: InMemoryAccountStore = new InMemoryAccountStore()
) {
  const promptBuilder = new PromptBuilderService();
  const profileLock = new KeyedLock();
  const service = new ReviewResponseService(
    store,
    new UsageTrackerService(),
    promptBuilder,
    new ResponseGeneratorService(provider, promptBuilder),
    profileLock,
    () => NOW
  );
  const accountService = new AccountService(
    store,
    new UsageTrackerService(),
    profileLock
  );
  return { store, service, accountService };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

beforeEach(() => {
  silenceConsole();
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("ReviewResponseService.generateForUser", () => {
  it("returns responses and increments usage", async () => {
    const { store, service } = setup(FakeProvider.returning(THREE_RESPONSES_JSON));
    await store.createAccount(makeProfile({ usage_count: 2 }), "rr_key");

    const result = await service.generateForUser("cafe-123", makeReview());

    expect(result.responses).toHaveLength(3);
    expect(result.usageRemaining).toBe(7);
    const saved = await store.lookupProfile("cafe-123");
    expect(saved?.usage_count).toBe(3);
    expect(saved?.usage_reset_date?.toISOString()).toBe(
      "2026-05-31T09:00:00.000Z"
    );
  });

  it("counts a fallback response set as a generation", async () => {
    const { store, service } = setup(FakeProvider.returning("not json at all"));
    await store.createAccount(makeProfile(), "rr_key");

    const result = await service.generateForUser("cafe-123", makeReview());

    expect(result.responses.map((r) => r.style)).toEqual([
      "Short & Sweet",
      "Detailed & Personal",
      "Professional & Branded",
    ]);
    expect(result.usageRemaining).toBe(9);
    expect((await store.lookupProfile("cafe-123"))?.usage_count).toBe(1);
  });

  it("reports unlimited remaining for enterprise", async () => {
    const { store, service } = setup(FakeProvider.returning(THREE_RESPONSES_JSON));
    await store.createAccount(
      makeProfile({ subscription_tier: "enterprise", usage_count: 900 }),
      "rr_key"
    );

    const result = await service.generateForUser("cafe-123", makeReview());

    expect(result.usageRemaining).toBe("unlimited");
    expect((await store.lookupProfile("cafe-123"))?.usage_count).toBe(901);
  });

  it("asks the provider for five styles on enterprise", async () => {
    const provider = FakeProvider.returning(THREE_RESPONSES_JSON);
    const { store, service } = setup(provider);
    await store.createAccount(
      makeProfile({ subscription_tier: "enterprise" }),
      "rr_key"
    );

    await service.generateForUser("cafe-123", makeReview());

    expect(provider.calls[0].prompt).toContain(
      "Generate 5 different response options"
    );
  });

  it("rejects an exhausted profile without calling the provider", async () => {
    const provider = FakeProvider.returning(THREE_RESPONSES_JSON);
    const { store, service } = setup(provider);
    await store.createAccount(makeProfile({ usage_count: 10 }), "rr_key");

    await expect(
      service.generateForUser("cafe-123", makeReview())
    ).rejects.toBeInstanceOf(QuotaExceededError);

    expect(provider.calls).toHaveLength(0);
    const saved = await store.lookupProfile("cafe-123");
    expect(saved?.usage_count).toBe(10);
    // 初回のリセット日は上限超過でも保存される
    expect(saved?.usage_reset_date?.toISOString()).toBe(
      "2026-05-31T09:00:00.000Z"
    );
  });

  it("rolls over an expired period before checking the quota", async () => {
    const { store, service } = setup(FakeProvider.returning(THREE_RESPONSES_JSON));
    await store.createAccount(
      makeProfile({
        usage_count: 10,
        usage_reset_date: new Date("2026-04-20T00:00:00.000Z"),
      }),
      "rr_key"
    );

    const result = await service.generateForUser("cafe-123", makeReview());

    expect(result.usageRemaining).toBe(9);
    expect((await store.lookupProfile("cafe-123"))?.usage_count).toBe(1);
  });

  it("does not increment usage when the provider fails", async () => {
    const { store, service } = setup(
      FakeProvider.failing(new Error("socket hang up"))
    );
    await store.createAccount(makeProfile({ usage_count: 4 }), "rr_key");

    await expect(
      service.generateForUser("cafe-123", makeReview())
    ).rejects.toBeInstanceOf(GenerationFailedError);

    expect((await store.lookupProfile("cafe-123"))?.usage_count).toBe(4);
  });

  it("throws UserNotFoundError for an unknown user", async () => {
    const { service } = setup(FakeProvider.returning(THREE_RESPONSES_JSON));

    await expect(
      service.generateForUser("missing", makeReview())
    ).rejects.toBeInstanceOf(UserNotFoundError);
  });

  it("reserves quota in order while provider calls overlap", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const { store, service } = setup(
      new FakeProvider(async () => {
        inFlight += 1;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await delay(20);
        inFlight -= 1;
        return THREE_RESPONSES_JSON;
      })
    );
    await store.createAccount(makeProfile({ usage_count: 8 }), "rr_key");

    const results = await Promise.allSettled([
      service.generateForUser("cafe-123", makeReview()),
      service.generateForUser("cafe-123", makeReview()),
      service.generateForUser("cafe-123", makeReview()),
    ]);

    expect(results.map((r) => r.status)).toEqual([
      "fulfilled",
      "fulfilled",
      "rejected",
    ]);
    const third = results[2];
    expect(third.status === "rejected" && third.reason).toBeInstanceOf(
      QuotaExceededError
    );
    expect(maxInFlight).toBe(2);
    expect((await store.lookupProfile("cafe-123"))?.usage_count).toBe(10);
  });

  it("lets a tier upgrade finish while the provider is still working", async () => {
    let providerEntered: () => void = () => undefined;
    const entered = new Promise<void>((resolve) => {
      providerEntered = resolve;
    });
    let releaseProvider: (text: string) => void = () => undefined;
    const providerOutput = new Promise<string>((resolve) => {
      releaseProvider = resolve;
    });
    const { store, service, accountService } = setup(
      new FakeProvider(async () => {
        providerEntered();
        return providerOutput;
      })
    );
    await store.createAccount(makeProfile(), "rr_key");

    const generation = service.generateForUser("cafe-123", makeReview());
    await entered;
    await accountService.upgradeTier("cafe-123", "pro");
    releaseProvider(THREE_RESPONSES_JSON);

    expect((await generation).usageRemaining).toBe(9);
    const saved = await store.lookupProfile("cafe-123");
    expect(saved?.subscription_tier).toBe("pro");
    expect(saved?.usage_count).toBe(1);
  });

  it("keeps the quota error when saving the profile fails", async () => {
    const { store, service } = setup(
      FakeProvider.returning(THREE_RESPONSES_JSON),
      new FailingSaveStore(0)
    );
    await store.createAccount(makeProfile({ usage_count: 10 }), "rr_key");

    await expect(
      service.generateForUser("cafe-123", makeReview())
    ).rejects.toBeInstanceOf(QuotaExceededError);
  });

  it("keeps the generation error when releasing the reservation fails", async () => {
    const { store, service } = setup(
      FakeProvider.failing(new Error("socket hang up")),
      new FailingSaveStore(1)
    );
    await store.createAccount(makeProfile({ usage_count: 4 }), "rr_key");

    await expect(
      service.generateForUser("cafe-123", makeReview())
    ).rejects.toBeInstanceOf(GenerationFailedError);

    expect((await store.lookupProfile("cafe-123"))?.usage_count).toBe(5);
  });
});
