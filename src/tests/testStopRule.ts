import { describe, it } from "node:test";
import assert from "assert";
import { emptyIntelSet, mergeInto } from "../core/intelligence";
import { shouldStop } from "../core/stopRule";

describe("shouldStop", () => {
  it("stops as soon as a payment identifier and a phone number are both known", () => {
    const intel = emptyIntelSet();
    mergeInto(intel, { upiIds: ["x@ybl"], phoneNumbers: ["9876543210"] });
    assert.strictEqual(shouldStop(intel, 2), true);
  });

  it("treats a phishing link as a payment identifier", () => {
    const intel = emptyIntelSet();
    mergeInto(intel, { phishingLinks: ["http://bit.ly/abc"], phoneNumbers: ["9876543210"] });
    assert.strictEqual(shouldStop(intel, 1), true);
  });

  it("keeps going below the message ceiling with partial intelligence", () => {
    const intel = emptyIntelSet();
    mergeInto(intel, { upiIds: ["x@ybl"] });
    assert.strictEqual(shouldStop(intel, 13), false);
    assert.strictEqual(shouldStop(intel, 14), true);
  });

  it("stops at the ceiling even with nothing extracted", () => {
    assert.strictEqual(shouldStop(emptyIntelSet(), 2), false);
    assert.strictEqual(shouldStop(emptyIntelSet(), 14), true);
    assert.strictEqual(shouldStop(emptyIntelSet(), 6, 6), true);
  });
});
