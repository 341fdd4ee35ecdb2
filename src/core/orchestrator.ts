import { describeError, maskDigits, safeError, safeLog, safeStringify, safeWarn } from "../utils/logging";
import { buildAgentNotes, type CallbackDispatcher, type FinalReport } from "./callback";
import { filterReply } from "./contentFilter";
import { extractIntelligence } from "./extractor";
import {
  buildGoalPrompt,
  buildNeutralPrompt,
  formatTranscript,
  mentionsPayment,
  nextGoal,
  type GenerationRequest,
  type Goal
} from "./goalPolicy";
import type { ExtractedIntelligence } from "./intelligence";
import { withTimeout, type ReplyGenerator } from "./providers/chain";
import { SAFE_ASSESSMENT, type RiskAssessment, type RiskDecision, type RiskScoring, type RiskSignal } from "./riskScorer";
import type { MessageOrigin, SessionStore } from "./sessionStore";
import { shouldStop } from "./stopRule";
import type { TranscriptSink } from "./transcript";

export const CLOSING_REPLY = "Okay, I have written everything down. Let me go and do it now, I will message you after.";
export const GENERATOR_FALLBACK_REPLY = "Sorry, my phone is acting strange. Can you please tell me again what I should do?";

export type AgentStage = "extraction" | "reporting" | "probing";

export type SeedMessage = {
  origin: MessageOrigin;
  text: string;
  timestamp: string;
};

export type InboundMessage = {
  sessionId: string;
  text: string;
  timestamp?: string;
  /** Prior conversation, applied only when the session is new. */
  history?: SeedMessage[];
  /** Channel details; carried for logging only. */
  metadata?: Record<string, string | undefined>;
};

export type TurnResult = {
  status: "success";
  sessionId: string;
  agentActivated: boolean;
  decision: RiskDecision;
  confidence: number;
  agentStage: AgentStage;
  goal: Goal;
  signals: RiskSignal[];
  agentReply: string;
  totalMessages: number;
};

export type OrchestratorSettings = {
  engageMessageCeiling: number;
  stopMessageCeiling: number;
  promptWindow: number;
  neutralWindow: number;
  generatorTimeoutMs: number;
};

export const DEFAULT_SETTINGS: OrchestratorSettings = {
  engageMessageCeiling: 8,
  stopMessageCeiling: 14,
  promptWindow: 5,
  neutralWindow: 3,
  generatorTimeoutMs: 6000
};

export type OrchestratorDeps = {
  store: SessionStore;
  scorer: RiskScoring;
  generator: ReplyGenerator;
  callback: CallbackDispatcher;
  transcript?: TranscriptSink | null;
  settings?: Partial<OrchestratorSettings>;
  extract?: (text: string) => ExtractedIntelligence;
  clock?: () => Date;
};

export class Orchestrator {
  private readonly store: SessionStore;
  private readonly scorer: RiskScoring;
  private readonly generator: ReplyGenerator;
  private readonly callback: CallbackDispatcher;
  private readonly transcript: TranscriptSink | null;
  private readonly settings: OrchestratorSettings;
  private readonly extract: (text: string) => ExtractedIntelligence;
  private readonly clock: () => Date;
  private readonly pendingReports = new Set<Promise<void>>();

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.scorer = deps.scorer;
    this.generator = deps.generator;
    this.callback = deps.callback;
    this.transcript = deps.transcript ?? null;
    this.settings = { ...DEFAULT_SETTINGS, ...deps.settings };
    this.extract = deps.extract ?? extractIntelligence;
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Processes one inbound message; messages for the same session never interleave. */
  handleMessage(inbound: InboundMessage): Promise<TurnResult> {
    return this.store.runExclusive(inbound.sessionId, () => this.processTurn(inbound));
  }

  /** Resolves once every callback dispatched so far has settled. */
  async drain(): Promise<void> {
    await Promise.allSettled(Array.from(this.pendingReports));
  }

  get pendingReportCount(): number {
    return this.pendingReports.size;
  }

  private nowIso(): string {
    return this.clock().toISOString();
  }

  private async processTurn(inbound: InboundMessage): Promise<TurnResult> {
    const { sessionId, text } = inbound;
    const created = this.store.ensure(sessionId);
    if (created && inbound.history && inbound.history.length > 0) {
      this.seed(sessionId, inbound.history);
    }

    this.append(sessionId, "counterpart", text, inbound.timestamp ?? this.nowIso());

    const risk = this.score(text);
    this.store.mergeIntelligence(sessionId, this.safeExtract(text));
    const paymentRequested = mentionsPayment(text);

    const intel = this.store.intelligence(sessionId);
    const goal = nextGoal(intel, paymentRequested);
    this.store.setGoal(sessionId, goal);

    const total = this.store.messageCount(sessionId);
    const engage = risk.decision === "scam" || total < this.settings.engageMessageCeiling;

    let stage: AgentStage;
    let reply: string;
    if (!engage) {
      stage = "probing";
      const context = formatTranscript(this.store.recentMessages(sessionId, this.settings.neutralWindow));
      reply = await this.generateReply(sessionId, buildNeutralPrompt(context));
    } else if (
      !this.store.isCallbackSent(sessionId) &&
      shouldStop(intel, total, this.settings.stopMessageCeiling)
    ) {
      stage = "reporting";
      reply = CLOSING_REPLY;
    } else {
      stage = "extraction";
      const context = formatTranscript(this.store.recentMessages(sessionId, this.settings.promptWindow));
      reply = await this.generateReply(sessionId, buildGoalPrompt(goal, context));
    }

    const totalMessages = this.append(sessionId, "agent", reply, this.nowIso());
    if (stage === "reporting") this.reportOnce(sessionId, risk.signals);

    this.record((sink) =>
      sink.recordDecision({
        sessionId,
        turnIndex: totalMessages,
        stage,
        goal,
        decision: risk.decision,
        confidence: risk.confidence,
        reply
      })
    );

    safeLog(
      `[TURN] ${safeStringify(
        {
          sessionId,
          channel: inbound.metadata?.channel,
          decision: risk.decision,
          confidence: risk.confidence,
          stage,
          goal,
          totalMessages
        },
        2000
      )}`
    );

    return {
      status: "success",
      sessionId,
      agentActivated: engage,
      decision: risk.decision,
      confidence: risk.confidence,
      agentStage: stage,
      goal,
      signals: risk.signals,
      agentReply: reply,
      totalMessages
    };
  }

  private seed(sessionId: string, history: SeedMessage[]): void {
    for (const message of history) {
      this.append(sessionId, message.origin, message.text, message.timestamp);
      if (message.origin === "counterpart") {
        this.store.mergeIntelligence(sessionId, this.safeExtract(message.text));
      }
    }
    safeLog(`[SESSION] seeded ${sessionId} with ${history.length} prior message(s)`);
  }

  private append(sessionId: string, origin: MessageOrigin, text: string, timestamp: string): number {
    const turnIndex = this.store.appendMessage(sessionId, origin, text, timestamp);
    if (origin === "counterpart") safeLog(`[SCAMMER] ${maskDigits(text)}`);
    else safeLog(`[HONEYPOT] ${maskDigits(text)}`);
    this.record((sink) => sink.recordMessage({ sessionId, turnIndex, origin, text, timestamp }));
    return turnIndex;
  }

  private score(text: string): RiskAssessment {
    try {
      return this.scorer.score(text);
    } catch (err) {
      safeWarn(`[TURN] risk scoring failed, treating as safe: ${describeError(err)}`);
      return { ...SAFE_ASSESSMENT, signals: [] };
    }
  }

  private safeExtract(text: string): ExtractedIntelligence {
    try {
      return this.extract(text);
    } catch (err) {
      safeWarn(`[TURN] extraction failed, nothing merged: ${describeError(err)}`);
      return {};
    }
  }

  private async generateReply(sessionId: string, request: GenerationRequest): Promise<string> {
    let raw: string;
    try {
      raw = await withTimeout(
        (signal) => this.generator.generate(request, signal),
        this.settings.generatorTimeoutMs,
        this.generator.name
      );
    } catch (err) {
      safeWarn(`[GENERATOR] session=${sessionId} goal=${request.goal} fell back: ${describeError(err)}`);
      return GENERATOR_FALLBACK_REPLY;
    }

    const trimmed = raw.trim();
    if (!trimmed) {
      safeWarn(`[GENERATOR] session=${sessionId} empty reply, fell back`);
      return GENERATOR_FALLBACK_REPLY;
    }

    const filtered = filterReply(trimmed);
    if (filtered.blocked) {
      safeWarn(`[GENERATOR] session=${sessionId} reply rejected for phrase '${filtered.blocked}'`);
    }
    return filtered.text;
  }

  private reportOnce(sessionId: string, signals: RiskSignal[]): void {
    if (!this.store.markCallbackSent(sessionId)) return;

    const intelligence = this.store.serializeIntelligence(sessionId);
    const report: FinalReport = {
      sessionId,
      scamDetected: true,
      totalMessagesExchanged: this.store.messageCount(sessionId),
      extractedIntelligence: intelligence,
      agentNotes: buildAgentNotes(intelligence, signals)
    };

    const task: Promise<void> = Promise.resolve()
      .then(() => this.callback.dispatch(report))
      .then((result) => {
        if (!result.ok) {
          safeWarn(`[CALLBACK] session=${sessionId} not delivered after ${result.attempts} attempt(s)`);
        }
      })
      .catch((err: unknown) => {
        safeError(`[CALLBACK] session=${sessionId} dispatch threw: ${describeError(err)}`);
      })
      .finally(() => {
        this.pendingReports.delete(task);
      });
    this.pendingReports.add(task);
  }

  private record(write: (sink: TranscriptSink) => Promise<void>): void {
    if (!this.transcript) return;
    void write(this.transcript).catch((err: unknown) => {
      safeWarn(`[TRANSCRIPT] write failed: ${describeError(err)}`);
    });
  }
}
