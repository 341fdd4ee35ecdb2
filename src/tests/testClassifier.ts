import { describe, it } from "node:test";
import assert from "assert";
import fs from "fs";
import os from "os";
import path from "path";
import { loadSeedExamples, NaiveBayesModel, tokenize } from "../core/classifier";

describe("classifier", () => {
  it("tokenizes on non-alphanumerics and drops single characters", () => {
    assert.deepStrictEqual(tokenize("Hi, I'm OK-99"), ["hi", "ok", "99"]);
  });

  it("loads the bundled seed examples", () => {
    const examples = loadSeedExamples();
    assert.strictEqual(examples.length, 20);
    assert.strictEqual(examples.filter((example) => example.label === "scam").length, 10);
  });

  it("rejects a seed file with an unknown label", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "seed-"));
    const file = path.join(dir, "seed.json");
    fs.writeFileSync(file, JSON.stringify([{ text: "hello", label: "spam" }]));
    try {
      assert.throws(() => loadSeedExamples(file));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("separates scam wording from everyday messages", () => {
    const model = new NaiveBayesModel(loadSeedExamples());
    assert.ok(model.probability("account blocked verify now") > 0.5);
    assert.ok(model.probability("see you at lunch tomorrow") < 0.5);
  });

  it("falls back to the class prior for empty text", () => {
    const model = new NaiveBayesModel(loadSeedExamples());
    assert.strictEqual(model.probability(""), 0.5);
  });
});
