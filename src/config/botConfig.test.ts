import { describe, it, expect } from "vitest";
import { ConfigError } from "../complaints/errors.ts";
import { loadBotConfig } from "./botConfig.ts";

describe("loadBotConfig", () => {
  it("reads the token and reviewer id", () => {
    expect(loadBotConfig({ TELEGRAM_BOT_TOKEN: " test-token ", REVIEWER_USER_ID: "9000" })).toEqual({
      botToken: "test-token",
      reviewerId: 9000,
      supabaseUrl: undefined,
      supabaseAnonKey: undefined,
    });
  });

  it("passes Supabase settings through when present", () => {
    const config = loadBotConfig({
      TELEGRAM_BOT_TOKEN: "test-token",
      REVIEWER_USER_ID: "9000",
      SUPABASE_URL: "http://localhost:54321",
      SUPABASE_ANON_KEY: "test-anon-key",
    });
    expect(config.supabaseUrl).toBe("http://localhost:54321");
    expect(config.supabaseAnonKey).toBe("test-anon-key");
  });

  it("requires a bot token", () => {
    expect(() => loadBotConfig({ REVIEWER_USER_ID: "9000" })).toThrow(ConfigError);
    expect(() => loadBotConfig({ TELEGRAM_BOT_TOKEN: "   ", REVIEWER_USER_ID: "9000" })).toThrow(
      "TELEGRAM_BOT_TOKEN not set"
    );
  });

  it("requires a reviewer id", () => {
    expect(() => loadBotConfig({ TELEGRAM_BOT_TOKEN: "test-token" })).toThrow("REVIEWER_USER_ID not set");
  });

  it("rejects a reviewer id that is not an integer", () => {
    expect(() => loadBotConfig({ TELEGRAM_BOT_TOKEN: "test-token", REVIEWER_USER_ID: "@reviewer" })).toThrow(
      'REVIEWER_USER_ID must be an integer, got "@reviewer"'
    );
    expect(() => loadBotConfig({ TELEGRAM_BOT_TOKEN: "test-token", REVIEWER_USER_ID: "12.5" })).toThrow(
      ConfigError
    );
  });

  it("accepts a negative id", () => {
    expect(loadBotConfig({ TELEGRAM_BOT_TOKEN: "test-token", REVIEWER_USER_ID: "-100" }).reviewerId).toBe(-100);
  });
});
