import dotenv from "dotenv";

export type Env = Record<string, string | undefined>;

export type AppConfig = {
  port: number;
  apiKey: string;
  callback: {
    url: string;
    timeoutMs: number;
    maxAttempts: number;
    retryDelayMs: number;
  };
  engagement: {
    engageMessageCeiling: number;
    stopMessageCeiling: number;
    promptWindow: number;
    neutralWindow: number;
  };
  generator: {
    timeoutMs: number;
    openaiApiKey: string;
    openaiModel: string;
    geminiApiKey: string;
    geminiModel: string;
  };
  sessions: {
    ttlMs: number;
    sweepIntervalMs: number;
  };
  risk: {
    modelWeight: number;
  };
  supabase: {
    url: string;
    serviceRoleKey: string;
    logEnabled: boolean;
  };
};

function readInt(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) return fallback;
  return value;
}

function readWeight(env: Env, key: string): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return 0;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) return 0;
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: readInt(env, "PORT", 3000, 1),
    apiKey: env.API_KEY || "",
    callback: {
      url: env.CALLBACK_URL || "",
      timeoutMs: readInt(env, "CALLBACK_TIMEOUT_MS", 5000, 1),
      maxAttempts: readInt(env, "CALLBACK_MAX_ATTEMPTS", 1, 1),
      retryDelayMs: readInt(env, "CALLBACK_RETRY_DELAY_MS", 500)
    },
    engagement: {
      engageMessageCeiling: readInt(env, "ENGAGE_MESSAGE_CEILING", 8, 1),
      stopMessageCeiling: readInt(env, "STOP_MESSAGE_CEILING", 14, 1),
      promptWindow: readInt(env, "PROMPT_WINDOW", 5, 1),
      neutralWindow: readInt(env, "NEUTRAL_WINDOW", 3, 1)
    },
    generator: {
      timeoutMs: readInt(env, "GENERATOR_TIMEOUT_MS", 6000, 1),
      openaiApiKey: env.OPENAI_API_KEY || "",
      openaiModel: env.OPENAI_MODEL || "gpt-4o-mini",
      geminiApiKey: env.GEMINI_API_KEY || env.GOOGLE_API_KEY || "",
      geminiModel: env.GEMINI_MODEL || "gemini-2.0-flash"
    },
    sessions: {
      ttlMs: readInt(env, "SESSION_TTL_MS", 60 * 60 * 1000),
      sweepIntervalMs: readInt(env, "SESSION_SWEEP_MS", 60 * 1000, 1)
    },
    risk: {
      modelWeight: readWeight(env, "RISK_MODEL_WEIGHT")
    },
    supabase: {
      url: env.SUPABASE_URL || "",
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY || "",
      logEnabled: env.ENABLE_SUPABASE_LOG !== "false"
    }
  };
}

export function loadConfigFromDotenv(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
