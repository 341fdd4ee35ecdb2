import axios, { type AxiosInstance } from "axios";
import { describeError, safeLog, safeWarn } from "../utils/logging";
import type { SerializedIntelligence } from "./intelligence";

export type FinalReport = {
  sessionId: string;
  scamDetected: true;
  totalMessagesExchanged: number;
  extractedIntelligence: SerializedIntelligence;
  agentNotes: string;
};

export type DispatchResult = {
  ok: boolean;
  attempts: number;
  status?: number;
  error?: string;
};

export interface CallbackDispatcher {
  dispatch(report: FinalReport): Promise<DispatchResult>;
}

export type HttpCallbackOptions = {
  url: string;
  timeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  http?: AxiosInstance;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class HttpCallbackDispatcher implements CallbackDispatcher {
  private readonly http: AxiosInstance;

  constructor(private readonly options: HttpCallbackOptions) {
    this.http = options.http ?? axios.create();
  }

  async dispatch(report: FinalReport): Promise<DispatchResult> {
    if (!this.options.url) {
      safeWarn(`[CALLBACK] no CALLBACK_URL configured, report for ${report.sessionId} not sent`);
      return { ok: false, attempts: 0, error: "callback url not configured" };
    }

    const maxAttempts = Math.max(1, this.options.maxAttempts);
    let lastError = "";
    let lastStatus: number | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        const response = await this.http.post(this.options.url, report, {
          timeout: this.options.timeoutMs,
          headers: { "Content-Type": "application/json" }
        });
        safeLog(`[CALLBACK] session=${report.sessionId} status=${response.status} attempt=${attempt}`);
        return { ok: true, attempts: attempt, status: response.status };
      } catch (err) {
        lastStatus = axios.isAxiosError(err) ? err.response?.status : undefined;
        lastError = describeError(err);
        safeWarn(`[CALLBACK] session=${report.sessionId} attempt=${attempt} failed: ${lastError}`);
      }
      if (attempt < maxAttempts) {
        await sleep(this.options.retryDelayMs * 2 ** (attempt - 1));
      }
    }

    return { ok: false, attempts: maxAttempts, status: lastStatus, error: lastError };
  }
}

export function buildAgentNotes(intel: SerializedIntelligence, signals: string[]): string {
  const parts: string[] = [];
  if (intel.threatTypes.length > 0) parts.push(`Threats: ${intel.threatTypes.join(", ")}.`);
  if (intel.impersonatedEntities.length > 0) {
    parts.push(`Claimed authority: ${intel.impersonatedEntities.join(", ")}.`);
  }
  const impersonation = [...intel.domainImpersonation, ...intel.providerImpersonation];
  if (impersonation.length > 0) parts.push(`${impersonation.join("; ")}.`);
  if (signals.length > 0) parts.push(`Last message signals: ${signals.join(", ")}.`);
  return parts.length > 0 ? parts.join(" ") : "Scam engagement completed.";
}
