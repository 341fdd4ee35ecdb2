import { describeError, safeWarn } from "../../utils/logging";
import type { GenerationRequest } from "../goalPolicy";

/** Text-in/text-out boundary to whatever writes the persona's replies. */
export interface ReplyGenerator {
  readonly name: string;
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>;
}

export const PERSONA_SYSTEM_PROMPT = [
  "You are a confused, elderly, not very tech-savvy person replying to text messages.",
  "Write as that person in first person and address the other person as 'you'.",
  "Act worried but cooperative. Ask simple, innocent questions.",
  "Use plain English with the odd small typo.",
  "Never say the words scam, fraud, detection, AI or bot.",
  "Never give advice and never mention official helplines or websites.",
  "Keep it to 1-2 short sentences. Output ONLY the reply text."
].join(" ");

export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`${label} timeout after ${timeoutMs}ms`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([work(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Tries each generator in order; the first non-empty reply wins. */
export class ProviderChain implements ReplyGenerator {
  readonly name: string;

  constructor(private readonly providers: ReplyGenerator[]) {
    this.name = providers.map((provider) => provider.name).join(">") || "none";
  }

  get size(): number {
    return this.providers.length;
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    let lastErr: unknown = new Error("no reply generator configured");
    for (const provider of this.providers) {
      if (signal?.aborted) break;
      try {
        const reply = (await provider.generate(request, signal)).trim();
        if (reply) return reply;
        lastErr = new Error(`${provider.name} returned an empty reply`);
      } catch (err) {
        lastErr = err;
        safeWarn(`[GENERATOR] ${provider.name} failed: ${describeError(err)}`);
      }
    }
    throw lastErr;
  }
}
