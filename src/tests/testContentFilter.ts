import { describe, it } from "node:test";
import assert from "assert";
import { FILTER_FALLBACK_REPLY, filterReply, findBlockedPhrase } from "../core/contentFilter";

describe("filterReply", () => {
  it("replaces any reply that mentions customer care", () => {
    assert.deepStrictEqual(filterReply("ok I will call Customer Care right away"), {
      text: FILTER_FALLBACK_REPLY,
      blocked: "customer care"
    });
  });

  it("passes in-character replies through", () => {
    const reply = "Oh no, what should I do now? Which account do I send it to?";
    assert.deepStrictEqual(filterReply(reply), { text: reply, blocked: null });
  });

  it("catches replies that break character", () => {
    assert.strictEqual(findBlockedPhrase("As an AI I cannot do that"), "as an ai");
    assert.strictEqual(findBlockedPhrase("this looks like a SCAM"), "scam");
  });
});
