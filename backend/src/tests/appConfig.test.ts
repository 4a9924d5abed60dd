import { loadConfig } from "../config/appConfig";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.port).toBe(8000);
    expect(config.storageDriver).toBe("memory");
    expect(config.corsOrigin).toBe("*");
    expect(config.ai).toEqual({
      provider: "anthropic",
      anthropicApiKey: undefined,
      anthropicModel: "claude-sonnet-4-20250514",
      openaiApiKey: undefined,
      openaiModel: "gpt-4o",
      maxTokens: 1000,
      temperature: 0.7,
      timeoutMs: 60000,
    });
    expect(config.database.port).toBe(3306);
  });

  it("reads and coerces environment values", () => {
    const config = loadConfig({
      PORT: "9090",
      NODE_ENV: "production",
      STORAGE_DRIVER: "mysql",
      MYSQL_HOST: "db.internal",
      AI_PROVIDER: "openai",
      OPENAI_API_KEY: "test-secret",
      AI_MAX_TOKENS: "800",
    });

    expect(config.port).toBe(9090);
    expect(config.storageDriver).toBe("mysql");
    expect(config.database.host).toBe("db.internal");
    expect(config.database.logging).toBe(false);
    expect(config.ai.provider).toBe("openai");
    expect(config.ai.openaiApiKey).toBe("test-secret");
    expect(config.ai.maxTokens).toBe(800);
  });

  it("treats empty variables as unset", () => {
    const config = loadConfig({ ANTHROPIC_API_KEY: "", PORT: "" });
    expect(config.ai.anthropicApiKey).toBeUndefined();
    expect(config.port).toBe(8000);
  });

  it("rejects an unknown storage driver", () => {
    expect(() => loadConfig({ STORAGE_DRIVER: "redis" })).toThrow();
  });
});
