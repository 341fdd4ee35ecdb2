import { describe, it } from "node:test";
import assert from "assert";
import request from "supertest";
import { createApp } from "../app";
import type { CallbackDispatcher, DispatchResult, FinalReport } from "../core/callback";
import { Orchestrator } from "../core/orchestrator";
import type { ReplyGenerator } from "../core/providers/chain";
import { RiskScorer } from "../core/riskScorer";
import { SessionStore } from "../core/sessionStore";

const API_KEY = "test-key";

const generator: ReplyGenerator = {
  name: "fake",
  generate: async () => "Which account should I use?"
};

class RecordingCallback implements CallbackDispatcher {
  readonly reports: FinalReport[] = [];

  async dispatch(report: FinalReport): Promise<DispatchResult> {
    this.reports.push(report);
    return { ok: true, attempts: 1, status: 200 };
  }
}

function buildApp(clock?: () => Date) {
  const store = new SessionStore();
  const callback = new RecordingCallback();
  const orchestrator = new Orchestrator({ store, scorer: new RiskScorer(), generator, callback, clock });
  return { app: createApp({ orchestrator, store, apiKey: API_KEY }), store, callback };
}

function body(sessionId: string, text: string) {
  return {
    sessionId,
    message: { sender: "scammer", text, timestamp: 1767225600000 },
    conversationHistory: [],
    metadata: { channel: "SMS", language: "English", locale: "IN" }
  };
}

describe("POST /api/v1/ingest", () => {
  it("rejects requests without the API key", async () => {
    const { app } = buildApp();
    const res = await request(app).post("/api/v1/ingest").send(body("s1", "hello"));
    assert.strictEqual(res.status, 401);
    assert.strictEqual(res.body.status, "error");
  });

  it("rejects an empty message", async () => {
    const { app } = buildApp();
    const res = await request(app).post("/api/v1/ingest").set("x-api-key", API_KEY).send(body("s1", "   "));
    assert.strictEqual(res.status, 400);
    assert.strictEqual(res.body.error, "message.text: Message cannot be empty");
  });

  it("rejects a missing session id", async () => {
    const { app } = buildApp();
    const res = await request(app)
      .post("/api/v1/ingest")
      .set("x-api-key", API_KEY)
      .send({ message: { sender: "scammer", text: "hello" } });
    assert.strictEqual(res.status, 400);
    assert.strictEqual(res.body.status, "error");
  });

  it("rejects malformed JSON", async () => {
    const { app } = buildApp();
    const res = await request(app)
      .post("/api/v1/ingest")
      .set("x-api-key", API_KEY)
      .set("Content-Type", "application/json")
      .send('{"sessionId": ');
    assert.strictEqual(res.status, 400);
    assert.strictEqual(res.body.error, "invalid request body");
  });

  it("runs a turn and returns the reply", async () => {
    const { app, store } = buildApp();
    const res = await request(app)
      .post("/api/v1/ingest")
      .set("x-api-key", API_KEY)
      .send(body("s1", "hello how are you doing"));

    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.body.status, "success");
    assert.strictEqual(res.body.sessionId, "s1");
    assert.strictEqual(res.body.agentReply, "Which account should I use?");
    assert.strictEqual(res.body.totalMessages, 2);
    assert.strictEqual(store.get("s1")?.messages[0].timestamp, "2026-01-01T00:00:00.000Z");
  });

  it("maps conversation history onto the session", async () => {
    const { app, store } = buildApp();
    const res = await request(app)
      .post("/api/honeypot")
      .set("x-api-key", API_KEY)
      .send({
        ...body("s2", "are you there"),
        conversationHistory: [
          { sender: "scammer", text: "send the fee to crook@ybl", timestamp: "2026-01-01T09:00:00.000Z" },
          { sender: "user", text: "what fee?", timestamp: "2026-01-01T09:01:00.000Z" }
        ]
      });

    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.body.totalMessages, 4);
    const snapshot = store.get("s2");
    assert.deepStrictEqual(
      snapshot?.messages.map((message) => message.origin),
      ["counterpart", "agent", "counterpart", "agent"]
    );
    assert.deepStrictEqual(snapshot?.intelligence.upiIds, ["crook@ybl"]);
  });

  it("reports once across repeated turns", async () => {
    const { app, callback } = buildApp();
    const text = "Your account is BLOCKED!!! Pay immediately to 9876543210 or verify at http://bit.ly/abc";
    for (let i = 0; i < 3; i += 1) {
      const res = await request(app).post("/api/v1/ingest").set("x-api-key", API_KEY).send(body("s3", text));
      assert.strictEqual(res.status, 200);
    }
    assert.strictEqual(callback.reports.length, 1);
  });

  it("answers 500 when the turn fails unexpectedly", async () => {
    const { app } = buildApp(() => {
      throw new Error("clock broke");
    });
    const res = await request(app)
      .post("/api/v1/ingest")
      .set("x-api-key", API_KEY)
      .send(body("s4", "hello how are you doing"));
    assert.strictEqual(res.status, 500);
    assert.deepStrictEqual(res.body, { status: "error", error: "internal error" });
  });
});

describe("session and health routes", () => {
  it("returns the report for a known session", async () => {
    const { app } = buildApp();
    await request(app).post("/api/v1/ingest").set("x-api-key", API_KEY).send(body("s1", "pay to crook@ybl"));

    const res = await request(app).get("/api/v1/sessions/s1").set("x-api-key", API_KEY);
    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.body.totalMessages, 2);
    assert.strictEqual(res.body.callbackSent, false);
    assert.strictEqual(res.body.currentGoal, "ask_for_phone");
    assert.deepStrictEqual(res.body.intelligence.upiIds, ["crook@ybl"]);
  });

  it("returns 404 for an unknown session", async () => {
    const { app } = buildApp();
    const res = await request(app).get("/api/v1/sessions/nope").set("x-api-key", API_KEY);
    assert.strictEqual(res.status, 404);
  });

  it("reports health and session count", async () => {
    const { app } = buildApp();
    await request(app).post("/api/v1/ingest").set("x-api-key", API_KEY).send(body("s1", "hello how are you doing"));
    const res = await request(app).get("/health");
    assert.deepStrictEqual(res.body, { ok: true, sessions: 1 });
  });
});
