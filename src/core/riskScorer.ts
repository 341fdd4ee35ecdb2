import type { RiskModel } from "./classifier";

export type RiskDecision = "scam" | "uncertain" | "safe";

export type RiskSignal =
  | "urgency"
  | "threat"
  | "action_request"
  | "authority_impersonation"
  | "sensitive_info_request"
  | "suspicious_url"
  | "grammar_anomaly";

export type RiskAssessment = {
  confidence: number;
  decision: RiskDecision;
  signals: RiskSignal[];
};

export const SCAM_THRESHOLD = 0.7;
export const UNCERTAIN_THRESHOLD = 0.4;

export const SAFE_ASSESSMENT: RiskAssessment = { confidence: 0, decision: "safe", signals: [] };

const URGENCY_TERMS = ["immediately", "urgent", "today", "now", "within", "24 hours", "limited time"];
const THREAT_TERMS = ["blocked", "suspended", "terminated", "legal action", "penalty", "frozen"];
const ACTION_TERMS = ["verify", "click", "login", "pay", "transfer", "update", "confirm"];
const AUTHORITY_TERMS = ["bank", "government", "support", "customer care", "admin", "official"];
const SENSITIVE_TERMS = ["otp", "pin", "password", "cvv", "account number", "upi"];
const SUSPICIOUS_TLDS = [".xyz", ".top", ".info", ".click", ".link"];
const URL_SHORTENERS = ["bit.ly", "tinyurl", "goo.gl", "t.co"];

// weights in hundredths so the sum is exact
const WEIGHTS: Record<RiskSignal, number> = {
  urgency: 15,
  threat: 15,
  action_request: 15,
  authority_impersonation: 10,
  sensitive_info_request: 15,
  suspicious_url: 15,
  grammar_anomaly: 10
};

function containsAny(text: string, terms: string[]): boolean {
  return terms.some((term) => text.includes(term));
}

export function extractUrls(lower: string): string[] {
  return lower.match(/https?:\/\/\S+/g) ?? [];
}

export function isSuspiciousUrl(url: string): boolean {
  return containsAny(url, SUSPICIOUS_TLDS) || containsAny(url, URL_SHORTENERS);
}

export function hasStyleAnomaly(text: string): boolean {
  if (/[a-z]/i.test(text) && text === text.toUpperCase()) return true;
  if (text.includes("!!!") || text.includes("???")) return true;
  const words = text.split(/\s+/).filter(Boolean);
  return words.length < 5 && containsAny(text.toLowerCase(), URGENCY_TERMS);
}

export function bucketFor(confidence: number): RiskDecision {
  if (confidence >= SCAM_THRESHOLD) return "scam";
  if (confidence >= UNCERTAIN_THRESHOLD) return "uncertain";
  return "safe";
}

export function scoreLexical(text: string): RiskAssessment {
  const lower = text.toLowerCase();
  const signals: RiskSignal[] = [];

  if (containsAny(lower, URGENCY_TERMS)) signals.push("urgency");
  if (containsAny(lower, THREAT_TERMS)) signals.push("threat");
  if (containsAny(lower, ACTION_TERMS)) signals.push("action_request");
  if (containsAny(lower, AUTHORITY_TERMS)) signals.push("authority_impersonation");
  if (containsAny(lower, SENSITIVE_TERMS)) signals.push("sensitive_info_request");
  if (extractUrls(lower).some(isSuspiciousUrl)) signals.push("suspicious_url");
  if (hasStyleAnomaly(text)) signals.push("grammar_anomaly");

  const points = Math.min(
    100,
    signals.reduce((sum, signal) => sum + WEIGHTS[signal], 0)
  );
  const confidence = points / 100;
  return { confidence, decision: bucketFor(confidence), signals };
}

/** Anything that can score a message; the orchestrator depends on this only. */
export interface RiskScoring {
  score(text: string): RiskAssessment;
}

export type RiskScorerOptions = {
  model?: RiskModel;
  /** Share of the final confidence taken from the model, in [0,1]. */
  modelWeight?: number;
};

export class RiskScorer implements RiskScoring {
  private readonly model?: RiskModel;
  private readonly modelWeight: number;

  constructor(options: RiskScorerOptions = {}) {
    this.model = options.model;
    const weight = options.modelWeight ?? 0;
    this.modelWeight = Math.min(1, Math.max(0, weight));
  }

  score(text: string): RiskAssessment {
    const lexical = scoreLexical(text);
    if (!this.model || this.modelWeight === 0) return lexical;

    const probability = Math.min(1, Math.max(0, this.model.probability(text)));
    const blended = (1 - this.modelWeight) * lexical.confidence + this.modelWeight * probability;
    const confidence = Math.round(Math.min(1, Math.max(0, blended)) * 100) / 100;
    return { confidence, decision: bucketFor(confidence), signals: lexical.signals };
  }
}
