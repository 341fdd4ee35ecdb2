import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { MessageOrigin } from "./sessionStore";

export type MessageLogEntry = {
  sessionId: string;
  turnIndex: number;
  origin: MessageOrigin;
  text: string;
  timestamp: string;
};

export type DecisionLogEntry = {
  sessionId: string;
  turnIndex: number;
  stage: string;
  goal: string;
  decision: string;
  confidence: number;
  reply: string;
};

/** Write-only audit trail of turns. Implementations may drop writes. */
export interface TranscriptSink {
  recordMessage(entry: MessageLogEntry): Promise<void>;
  recordDecision(entry: DecisionLogEntry): Promise<void>;
}

export type SupabaseTranscriptOptions = {
  url: string;
  serviceRoleKey: string;
  enabled: boolean;
};

export class SupabaseTranscriptLog implements TranscriptSink {
  private readonly client: SupabaseClient;

  constructor(client: SupabaseClient) {
    this.client = client;
  }

  static fromOptions(options: SupabaseTranscriptOptions): SupabaseTranscriptLog | null {
    if (!options.enabled || !options.url || !options.serviceRoleKey) return null;
    const client = createClient(options.url, options.serviceRoleKey, { auth: { persistSession: false } });
    return new SupabaseTranscriptLog(client);
  }

  async recordMessage(entry: MessageLogEntry): Promise<void> {
    const { error } = await this.client.from("honeypot_messages").insert({
      session_id: entry.sessionId,
      turn_index: entry.turnIndex,
      sender: entry.origin,
      text: entry.text,
      ts: entry.timestamp
    });
    if (error) throw new Error(`honeypot_messages insert failed: ${error.message}`);
  }

  async recordDecision(entry: DecisionLogEntry): Promise<void> {
    const { error } = await this.client.from("honeypot_decisions").insert({
      session_id: entry.sessionId,
      turn_index: entry.turnIndex,
      stage: entry.stage,
      goal: entry.goal,
      decision: entry.decision,
      confidence: entry.confidence,
      reply: entry.reply
    });
    if (error) throw new Error(`honeypot_decisions insert failed: ${error.message}`);
  }
}
