import { describe, it } from "node:test";
import assert from "assert";
import { loadConfig } from "../config";

describe("loadConfig", () => {
  it("fills in defaults for an empty environment", () => {
    const config = loadConfig({});
    assert.strictEqual(config.port, 3000);
    assert.strictEqual(config.apiKey, "");
    assert.deepStrictEqual(config.callback, { url: "", timeoutMs: 5000, maxAttempts: 1, retryDelayMs: 500 });
    assert.deepStrictEqual(config.engagement, {
      engageMessageCeiling: 8,
      stopMessageCeiling: 14,
      promptWindow: 5,
      neutralWindow: 3
    });
    assert.strictEqual(config.sessions.ttlMs, 3_600_000);
    assert.strictEqual(config.risk.modelWeight, 0);
    assert.strictEqual(config.supabase.logEnabled, true);
  });

  it("reads overrides", () => {
    const config = loadConfig({
      PORT: "8080",
      API_KEY: "test-key",
      CALLBACK_URL: "http://callback.test/final",
      CALLBACK_MAX_ATTEMPTS: "3",
      STOP_MESSAGE_CEILING: "20",
      RISK_MODEL_WEIGHT: "0.25",
      ENABLE_SUPABASE_LOG: "false"
    });
    assert.strictEqual(config.port, 8080);
    assert.strictEqual(config.apiKey, "test-key");
    assert.strictEqual(config.callback.url, "http://callback.test/final");
    assert.strictEqual(config.callback.maxAttempts, 3);
    assert.strictEqual(config.engagement.stopMessageCeiling, 20);
    assert.strictEqual(config.risk.modelWeight, 0.25);
    assert.strictEqual(config.supabase.logEnabled, false);
  });

  it("falls back on values it cannot use", () => {
    const config = loadConfig({
      PORT: "abc",
      CALLBACK_MAX_ATTEMPTS: "0",
      PROMPT_WINDOW: "2.5",
      RISK_MODEL_WEIGHT: "4"
    });
    assert.strictEqual(config.port, 3000);
    assert.strictEqual(config.callback.maxAttempts, 1);
    assert.strictEqual(config.engagement.promptWindow, 5);
    assert.strictEqual(config.risk.modelWeight, 0);
  });

  it("accepts GOOGLE_API_KEY for Gemini", () => {
    assert.strictEqual(loadConfig({ GOOGLE_API_KEY: "test-google" }).generator.geminiApiKey, "test-google");
    assert.strictEqual(
      loadConfig({ GEMINI_API_KEY: "test-gemini", GOOGLE_API_KEY: "test-google" }).generator.geminiApiKey,
      "test-gemini"
    );
  });
});
