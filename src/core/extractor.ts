import { INTEL_CATEGORIES, type ExtractedIntelligence, type IntelCategory } from "./intelligence";

const SUSPICIOUS_TERMS = [
  "urgent",
  "verify",
  "blocked",
  "immediately",
  "suspension",
  "penalty",
  "freeze",
  "debit",
  "credit",
  "charge",
  "security"
];

const THREAT_PATTERNS: Record<string, string[]> = {
  "account-blocked": ["blocked", "suspended", "freeze"],
  "legal-threat": ["legal", "court", "penalty", "case"],
  "payment-pressure": ["pay", "immediately", "today"]
};

const IMPERSONATION_TERMS = [
  "bank",
  "rbi",
  "government",
  "kyc",
  "customer care",
  "support",
  "income tax"
];

const KNOWN_BANK_BRANDS = ["sbi", "hdfc", "icici", "axis", "kotak", "pnb", "canara"];

const DEFAULT_BANK_SUFFIXES = [".co.in", ".bank.in"];

const BANK_DOMAIN_SUFFIXES: Record<string, string[]> = {
  sbi: [...DEFAULT_BANK_SUFFIXES, ".sbi"]
};

const LEGITIMATE_UPI_HANDLES = new Set([
  "paytm",
  "phonepe",
  "googlepay",
  "gpay",
  "bhim",
  "ybl",
  "ibl",
  "axl",
  "apl",
  "upi",
  "okhdfcbank",
  "oksbi",
  "okicici",
  "okaxis",
  "hdfcbank",
  "icici",
  "sbi",
  "axisbank",
  "kotak",
  "pnb"
]);

const UPI_PATTERNS = [
  /(?<![a-z0-9._-])([a-z][a-z0-9._-]*@[a-z0-9]{4,15})\b(?!\.[a-z])/g,
  /(?<![a-z0-9._-])([a-z0-9._-]{3,}@(?:paytm|phonepe|ybl|ibl|axl|apl|upi))\b(?!\.[a-z])/g,
  /(?<![a-z0-9._-])([a-z0-9._-]{3,}@[a-z]+bank)\b(?!\.[a-z])/g
];

const LINK_PATTERN = /\[([^\]\s]*(?:http|www)[^\]\s]*)\]|https?:\/\/[^\s<>"]+|www\.[^\s<>"]+/g;
const URL_LIKE_TOKEN = /^(?:https?:\/\/|www\.)\S+$|^[a-z0-9-]+(?:\.[a-z0-9-]+)*\.[a-z]{2,}(?:[/?#]\S*)?$/;
const PHONE_PATTERN = /\+91\d{10}|\b\d{10}\b/g;
const BANK_ACCOUNT_PATTERN = /\b\d{4}-\d{4}-\d{4}\b/g;
const AMOUNT_PATTERN = /(?:\brs\.?|₹|\binr)\s?\d{1,7}/g;

const MIN_LINK_LENGTH = 6;

function unique(values: Iterable<string>): string[] {
  const set = new Set<string>();
  for (const raw of values) {
    const value = raw.trim();
    if (value) set.add(value);
  }
  return Array.from(set);
}

export function cleanLink(raw: string): string {
  return raw
    .trim()
    .replace(/^[[(<"']+/, "")
    .replace(/[\])>"'.,;:!?]+$/, "");
}

function findLinks(text: string): string[] {
  const candidates: string[] = [];

  for (const token of text.split(/\s+/)) {
    const stripped = cleanLink(token);
    if (URL_LIKE_TOKEN.test(stripped)) candidates.push(stripped);
  }

  for (const match of text.matchAll(LINK_PATTERN)) {
    candidates.push(match[1] ?? match[0]);
  }

  return unique(
    candidates
      .map(cleanLink)
      .filter((link) => link.length >= MIN_LINK_LENGTH)
      .filter((link) => link.includes("http") || link.includes("www"))
  );
}

function findUpiIds(text: string): string[] {
  const found: string[] = [];
  for (const pattern of UPI_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      found.push(match[1]);
    }
  }
  return unique(found);
}

function matchAll(text: string, pattern: RegExp): string[] {
  return unique(text.match(pattern) ?? []);
}

function linkHost(link: string): string | null {
  try {
    const parsed = new URL(link.startsWith("http") ? link : `http://${link}`);
    return parsed.host.toLowerCase() || null;
  } catch {
    return null;
  }
}

export function enrichDomains(links: string[]): { domains: string[]; notes: string[] } {
  const domains: string[] = [];
  const notes: string[] = [];
  for (const link of links) {
    const host = linkHost(link);
    if (!host) continue;
    domains.push(host);
    for (const bank of KNOWN_BANK_BRANDS) {
      const suffixes = BANK_DOMAIN_SUFFIXES[bank] ?? DEFAULT_BANK_SUFFIXES;
      if (host.includes(bank) && !suffixes.some((suffix) => host.endsWith(suffix))) {
        notes.push(`Domain '${host}' may impersonate ${bank.toUpperCase()}`);
      }
    }
  }
  return { domains: unique(domains), notes: unique(notes) };
}

export function enrichUpiHandles(upiIds: string[]): string[] {
  const notes: string[] = [];
  for (const upi of upiIds) {
    const at = upi.indexOf("@");
    if (at === -1) continue;
    const handle = upi.slice(at + 1).toLowerCase();
    if (LEGITIMATE_UPI_HANDLES.has(handle)) continue;
    for (const bank of KNOWN_BANK_BRANDS) {
      if (handle.includes(bank)) {
        notes.push(`UPI handle '${handle}' may impersonate ${bank.toUpperCase()}`);
      }
    }
  }
  return unique(notes);
}

/**
 * Pulls payment handles, contacts, links, amounts and scam tags out of one
 * message. Categories with no values are omitted.
 */
export function extractIntelligence(text: string): ExtractedIntelligence {
  const lower = text.toLowerCase();

  const phishingLinks = findLinks(lower);
  const upiIds = findUpiIds(lower);
  const threatTypes = Object.entries(THREAT_PATTERNS)
    .filter(([, words]) => words.some((word) => lower.includes(word)))
    .map(([threat]) => threat);
  const { domains, notes } = enrichDomains(phishingLinks);

  const found: Record<IntelCategory, string[]> = {
    upiIds,
    bankAccounts: matchAll(lower, BANK_ACCOUNT_PATTERN),
    phishingLinks,
    phoneNumbers: matchAll(lower, PHONE_PATTERN),
    amounts: matchAll(lower, AMOUNT_PATTERN),
    suspiciousKeywords: SUSPICIOUS_TERMS.filter((term) => lower.includes(term)),
    threatTypes,
    impersonatedEntities: IMPERSONATION_TERMS.filter((term) => lower.includes(term)),
    linkDomains: domains,
    domainImpersonation: notes,
    providerImpersonation: enrichUpiHandles(upiIds)
  };

  const result: ExtractedIntelligence = {};
  for (const category of INTEL_CATEGORIES) {
    if (found[category].length > 0) result[category] = found[category];
  }
  return result;
}
