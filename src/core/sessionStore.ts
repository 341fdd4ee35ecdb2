import { PerKeyLock } from "../utils/lock";
import { safeLog } from "../utils/logging";
import type { Goal } from "./goalPolicy";
import {
  INTEL_CATEGORIES,
  emptyIntelSet,
  mergeInto,
  serializeIntel,
  type ExtractedIntelligence,
  type IntelSet,
  type SerializedIntelligence
} from "./intelligence";

export type MessageOrigin = "counterpart" | "agent";

export type SessionMessage = {
  origin: MessageOrigin;
  text: string;
  timestamp: string;
};

type SessionRecord = {
  sessionId: string;
  messages: SessionMessage[];
  intelligence: IntelSet;
  totalMessageCount: number;
  callbackSent: boolean;
  currentGoal: Goal | null;
  goalsCompleted: Set<Goal>;
  createdAt: string;
  lastActivityAt: number;
};

/** Detached copy of a session; mutating it never touches the store. */
export type SessionSnapshot = {
  sessionId: string;
  messages: SessionMessage[];
  intelligence: SerializedIntelligence;
  totalMessageCount: number;
  callbackSent: boolean;
  currentGoal: Goal | null;
  goalsCompleted: Goal[];
  createdAt: string;
  lastActivityAt: string;
};

export class UnknownSessionError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string, operation: string) {
    super(`${operation} on unknown session '${sessionId}'; ensure() must run first`);
    this.name = "UnknownSessionError";
    this.sessionId = sessionId;
  }
}

export type SessionStoreOptions = {
  /** Idle time after which sweep() evicts a session. 0 disables eviction. */
  ttlMs?: number;
  /** How many reported session ids are remembered after eviction. */
  reportedCapacity?: number;
  now?: () => number;
};

function cloneIntel(intel: IntelSet): IntelSet {
  const copy = emptyIntelSet();
  for (const category of INTEL_CATEGORIES) {
    for (const value of intel[category]) copy[category].add(value);
  }
  return copy;
}

export const DEFAULT_REPORTED_CAPACITY = 10_000;

export class SessionStore {
  private readonly sessions = new Map<string, SessionRecord>();
  // outlives eviction so a returning session id is never reported twice
  private readonly reported = new Set<string>();
  private readonly reportedCapacity: number;
  private readonly lock = new PerKeyLock<string>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? Date.now;
    this.reportedCapacity = Math.max(1, options.reportedCapacity ?? DEFAULT_REPORTED_CAPACITY);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Creates the session if missing. Returns true only when it was created. */
  ensure(sessionId: string): boolean {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.lastActivityAt = this.now();
      return false;
    }
    const now = this.now();
    this.sessions.set(sessionId, {
      sessionId,
      messages: [],
      intelligence: emptyIntelSet(),
      totalMessageCount: 0,
      callbackSent: this.reported.has(sessionId),
      currentGoal: null,
      goalsCompleted: new Set<Goal>(),
      createdAt: new Date(now).toISOString(),
      lastActivityAt: now
    });
    return true;
  }

  get(sessionId: string): SessionSnapshot | undefined {
    const record = this.sessions.get(sessionId);
    if (!record) return undefined;
    return {
      sessionId: record.sessionId,
      messages: record.messages.map((message) => ({ ...message })),
      intelligence: serializeIntel(record.intelligence),
      totalMessageCount: record.totalMessageCount,
      callbackSent: record.callbackSent,
      currentGoal: record.currentGoal,
      goalsCompleted: Array.from(record.goalsCompleted),
      createdAt: record.createdAt,
      lastActivityAt: new Date(record.lastActivityAt).toISOString()
    };
  }

  private require(sessionId: string, operation: string): SessionRecord {
    const record = this.sessions.get(sessionId);
    if (!record) throw new UnknownSessionError(sessionId, operation);
    return record;
  }

  appendMessage(sessionId: string, origin: MessageOrigin, text: string, timestamp: string): number {
    const record = this.require(sessionId, "appendMessage");
    record.messages.push({ origin, text, timestamp });
    record.totalMessageCount += 1;
    record.lastActivityAt = this.now();
    return record.totalMessageCount;
  }

  mergeIntelligence(sessionId: string, extracted: ExtractedIntelligence | undefined): number {
    const record = this.require(sessionId, "mergeIntelligence");
    return mergeInto(record.intelligence, extracted);
  }

  /**
   * Flips the callback guard. Returns true only for the caller that flipped
   * it; every later call returns false.
   */
  markCallbackSent(sessionId: string): boolean {
    const record = this.require(sessionId, "markCallbackSent");
    if (record.callbackSent || this.reported.has(sessionId)) {
      record.callbackSent = true;
      return false;
    }
    record.callbackSent = true;
    this.rememberReported(sessionId);
    return true;
  }

  private rememberReported(sessionId: string): void {
    this.reported.add(sessionId);
    while (this.reported.size > this.reportedCapacity) {
      const oldest = this.reported.values().next();
      if (oldest.done) break;
      this.reported.delete(oldest.value);
    }
  }

  isCallbackSent(sessionId: string): boolean {
    return this.require(sessionId, "isCallbackSent").callbackSent;
  }

  setGoal(sessionId: string, goal: Goal): void {
    const record = this.require(sessionId, "setGoal");
    if (record.currentGoal && record.currentGoal !== goal) {
      record.goalsCompleted.add(record.currentGoal);
    }
    record.currentGoal = goal;
  }

  intelligence(sessionId: string): IntelSet {
    return cloneIntel(this.require(sessionId, "intelligence").intelligence);
  }

  serializeIntelligence(sessionId: string): SerializedIntelligence {
    return serializeIntel(this.require(sessionId, "serializeIntelligence").intelligence);
  }

  messageCount(sessionId: string): number {
    return this.require(sessionId, "messageCount").totalMessageCount;
  }

  recentMessages(sessionId: string, limit: number): SessionMessage[] {
    const record = this.require(sessionId, "recentMessages");
    return record.messages.slice(-limit).map((message) => ({ ...message }));
  }

  /** Runs `work` with exclusive access to one session id. */
  runExclusive<T>(sessionId: string, work: () => Promise<T>): Promise<T> {
    return this.lock.run(sessionId, work);
  }

  /** Evicts sessions idle longer than the TTL, skipping any that are in use. */
  sweep(): string[] {
    if (this.ttlMs <= 0) return [];
    const cutoff = this.now() - this.ttlMs;
    const evicted: string[] = [];
    for (const [sessionId, record] of this.sessions) {
      if (record.lastActivityAt > cutoff || this.lock.isLocked(sessionId)) continue;
      this.sessions.delete(sessionId);
      evicted.push(sessionId);
    }
    if (evicted.length > 0) {
      safeLog(`[SESSION] evicted ${evicted.length} idle session(s)`);
    }
    return evicted;
  }
}
