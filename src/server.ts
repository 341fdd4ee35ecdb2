import { createApp } from "./app";
import { loadConfigFromDotenv } from "./config";
import { HttpCallbackDispatcher } from "./core/callback";
import { loadSeedExamples, NaiveBayesModel } from "./core/classifier";
import { Orchestrator } from "./core/orchestrator";
import { ProviderChain, type ReplyGenerator } from "./core/providers/chain";
import { GeminiReplyGenerator } from "./core/providers/geminiClient";
import { OpenAIReplyGenerator } from "./core/providers/openaiClient";
import { RiskScorer } from "./core/riskScorer";
import { SessionStore } from "./core/sessionStore";
import { SupabaseTranscriptLog } from "./core/transcript";
import { describeError, maskApiKey, safeError, safeLog, safeWarn } from "./utils/logging";

const config = loadConfigFromDotenv();

const store = new SessionStore({ ttlMs: config.sessions.ttlMs });

const scorer = new RiskScorer(
  config.risk.modelWeight > 0
    ? { model: new NaiveBayesModel(loadSeedExamples()), modelWeight: config.risk.modelWeight }
    : {}
);

const providers: ReplyGenerator[] = [];
if (config.generator.openaiApiKey) {
  providers.push(
    new OpenAIReplyGenerator({
      apiKey: config.generator.openaiApiKey,
      model: config.generator.openaiModel,
      timeoutMs: config.generator.timeoutMs
    })
  );
}
if (config.generator.geminiApiKey) {
  providers.push(new GeminiReplyGenerator({ apiKey: config.generator.geminiApiKey, model: config.generator.geminiModel }));
}
const generator = new ProviderChain(providers);
if (generator.size === 0) {
  safeWarn("[BOOT] no OPENAI_API_KEY or GEMINI_API_KEY set; every reply will use the fallback line");
}

const orchestrator = new Orchestrator({
  store,
  scorer,
  generator,
  callback: new HttpCallbackDispatcher(config.callback),
  transcript: SupabaseTranscriptLog.fromOptions({
    url: config.supabase.url,
    serviceRoleKey: config.supabase.serviceRoleKey,
    enabled: config.supabase.logEnabled
  }),
  settings: { ...config.engagement, generatorTimeoutMs: config.generator.timeoutMs }
});

const app = createApp({ orchestrator, store, apiKey: config.apiKey });

const server = app.listen(config.port, () => {
  safeLog(
    `[BOOT] listening on port ${config.port} generator=${generator.name} api_key=${maskApiKey(config.apiKey)}`
  );
});

const sweeper = setInterval(() => store.sweep(), config.sessions.sweepIntervalMs);
sweeper.unref();

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  safeLog(`[BOOT] ${signal} received, draining ${orchestrator.pendingReportCount} pending report(s)`);
  clearInterval(sweeper);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await orchestrator.drain();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      safeError(`[BOOT] shutdown failed: ${describeError(err)}`);
      process.exit(1);
    });
  });
}
