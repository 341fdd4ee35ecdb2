import { describe, it } from "node:test";
import assert from "assert";
import { PerKeyLock } from "../utils/lock";

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("PerKeyLock", () => {
  it("runs work for one key in submission order", async () => {
    const lock = new PerKeyLock<string>();
    const events: string[] = [];

    const first = lock.run("a", async () => {
      events.push("first:start");
      await tick();
      events.push("first:end");
    });
    const second = lock.run("a", async () => {
      events.push("second:start");
      events.push("second:end");
    });

    await Promise.all([first, second]);
    assert.deepStrictEqual(events, ["first:start", "first:end", "second:start", "second:end"]);
    assert.strictEqual(lock.isLocked("a"), false);
  });

  it("lets different keys overlap", async () => {
    const lock = new PerKeyLock<string>();
    const events: string[] = [];

    await Promise.all([
      lock.run("a", async () => {
        events.push("a:start");
        await tick();
        events.push("a:end");
      }),
      lock.run("b", async () => {
        events.push("b:start");
      })
    ]);

    assert.ok(events.indexOf("b:start") < events.indexOf("a:end"));
  });

  it("releases the key when work throws", async () => {
    const lock = new PerKeyLock<string>();
    await assert.rejects(lock.run("a", async () => {
      throw new Error("boom");
    }), { message: "boom" });
    assert.strictEqual(lock.isLocked("a"), false);
    assert.strictEqual(await lock.run("a", async () => 42), 42);
  });

  it("reports a key as locked while work is pending", async () => {
    const lock = new PerKeyLock<number>();
    let finish: () => void = () => undefined;
    const running = lock.run(7, () => new Promise<void>((resolve) => {
      finish = resolve;
    }));
    assert.strictEqual(lock.isLocked(7), true);
    await tick();
    finish();
    await running;
    assert.strictEqual(lock.isLocked(7), false);
  });
});
