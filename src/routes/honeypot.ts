import { Router, type Request, type Response } from "express";
import type { Orchestrator, SeedMessage } from "../core/orchestrator";
import type { SessionStore } from "../core/sessionStore";
import { describeError, safeError, safeLog, safeStringify, sanitizeHeaders } from "../utils/logging";
import { firstIssue, ingestSchema, toIsoTimestamp, type WireMessage } from "../utils/schema";

export type HoneypotRouterDeps = {
  orchestrator: Orchestrator;
  store: SessionStore;
  apiKey: string;
};

function logIncoming(req: Request): void {
  safeLog(`[INCOMING] headers: ${safeStringify(sanitizeHeaders(req.headers), 2000)}`);
  safeLog(`[INCOMING] body: ${safeStringify(req.body, 2000)}`);
}

function logOutgoing(status: number, responseJson: unknown): void {
  safeLog(`[OUTGOING] status: ${status} response_json: ${safeStringify(responseJson, 5000)}`);
}

function reply(res: Response, status: number, body: unknown): Response {
  logOutgoing(status, body);
  return res.status(status).json(body);
}

function toSeedMessages(history: WireMessage[], now: string): SeedMessage[] {
  return history
    .filter((message) => message.text.trim().length > 0)
    .map((message) => ({
      origin: message.sender === "scammer" ? "counterpart" : "agent",
      text: message.text,
      timestamp: toIsoTimestamp(message.timestamp, now)
    }));
}

export function createHoneypotRouter(deps: HoneypotRouterDeps): Router {
  const router = Router();

  router.post(["/api/v1/ingest", "/api/honeypot"], async (req: Request, res: Response) => {
    logIncoming(req);

    if (deps.apiKey && req.header("x-api-key") !== deps.apiKey) {
      return reply(res, 401, { status: "error", error: "Invalid API key" });
    }

    const parsed = ingestSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply(res, 400, { status: "error", error: firstIssue(parsed.error) });
    }

    const body = parsed.data;
    const now = new Date().toISOString();
    try {
      const result = await deps.orchestrator.handleMessage({
        sessionId: body.sessionId,
        text: body.message.text,
        timestamp: toIsoTimestamp(body.message.timestamp, now),
        history: toSeedMessages(body.conversationHistory, now),
        metadata: body.metadata
      });
      return reply(res, 200, result);
    } catch (err) {
      safeError(`[INGEST] session=${body.sessionId} failed: ${describeError(err)}`);
      return reply(res, 500, { status: "error", error: "internal error" });
    }
  });

  router.get("/api/v1/sessions/:sessionId", (req: Request, res: Response) => {
    if (deps.apiKey && req.header("x-api-key") !== deps.apiKey) {
      return res.status(401).json({ status: "error", error: "Invalid API key" });
    }
    const snapshot = deps.store.get(req.params.sessionId);
    if (!snapshot) {
      return res.status(404).json({ status: "error", error: "Unknown session" });
    }
    return res.status(200).json({
      sessionId: snapshot.sessionId,
      totalMessages: snapshot.totalMessageCount,
      callbackSent: snapshot.callbackSent,
      currentGoal: snapshot.currentGoal,
      goalsCompleted: snapshot.goalsCompleted,
      createdAt: snapshot.createdAt,
      lastActivityAt: snapshot.lastActivityAt,
      intelligence: snapshot.intelligence
    });
  });

  return router;
}
