export const INTEL_CATEGORIES = [
  "upiIds",
  "bankAccounts",
  "phishingLinks",
  "phoneNumbers",
  "amounts",
  "suspiciousKeywords",
  "threatTypes",
  "impersonatedEntities",
  "linkDomains",
  "domainImpersonation",
  "providerImpersonation"
] as const;

export type IntelCategory = (typeof INTEL_CATEGORIES)[number];

/** Extractor output: only categories with at least one value are present. */
export type ExtractedIntelligence = Partial<Record<IntelCategory, string[]>>;

/** Cumulative per-session intelligence. Every category is always present. */
export type IntelSet = Record<IntelCategory, Set<string>>;

/** Wire form: every category present, values sorted ascending. */
export type SerializedIntelligence = Record<IntelCategory, string[]>;

function byCategory<T>(make: (category: IntelCategory) => T): Record<IntelCategory, T> {
  return {
    upiIds: make("upiIds"),
    bankAccounts: make("bankAccounts"),
    phishingLinks: make("phishingLinks"),
    phoneNumbers: make("phoneNumbers"),
    amounts: make("amounts"),
    suspiciousKeywords: make("suspiciousKeywords"),
    threatTypes: make("threatTypes"),
    impersonatedEntities: make("impersonatedEntities"),
    linkDomains: make("linkDomains"),
    domainImpersonation: make("domainImpersonation"),
    providerImpersonation: make("providerImpersonation")
  };
}

export function emptyIntelSet(): IntelSet {
  return byCategory(() => new Set<string>());
}

export function mergeInto(target: IntelSet, extracted: ExtractedIntelligence | undefined): number {
  if (!extracted) return 0;
  let added = 0;
  for (const category of INTEL_CATEGORIES) {
    const values = extracted[category];
    if (!values || values.length === 0) continue;
    for (const raw of values) {
      const value = raw.trim();
      if (!value || target[category].has(value)) continue;
      target[category].add(value);
      added += 1;
    }
  }
  return added;
}

export function serializeIntel(intel: IntelSet): SerializedIntelligence {
  return byCategory((category) => Array.from(intel[category]).sort());
}

export function hasAny(intel: IntelSet, ...categories: IntelCategory[]): boolean {
  return categories.some((category) => intel[category].size > 0);
}
