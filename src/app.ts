import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import type { Orchestrator } from "./core/orchestrator";
import type { SessionStore } from "./core/sessionStore";
import { createHoneypotRouter } from "./routes/honeypot";
import { describeError, safeWarn } from "./utils/logging";

export type AppDeps = {
  orchestrator: Orchestrator;
  store: SessionStore;
  apiKey: string;
};

function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("status" in err)) return null;
  const status = err.status;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  app.get("/health", (_req, res) => {
    return res.json({ ok: true, sessions: deps.store.size });
  });

  app.use(createHoneypotRouter(deps));

  // body-parser hands malformed or oversized bodies here
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    safeWarn(`[HTTP] request rejected: ${describeError(err)}`);
    const status = clientErrorStatus(err);
    if (status) return res.status(status).json({ status: "error", error: "invalid request body" });
    return res.status(500).json({ status: "error", error: "internal error" });
  });

  return app;
}
