import { z } from "zod";

const timestampSchema = z.union([z.string().min(1), z.number().finite()]).optional();

const messageSchema = z.object({
  sender: z.string().min(1).default("scammer"),
  text: z.string(),
  timestamp: timestampSchema
});

export const ingestSchema = z.object({
  sessionId: z.string().trim().min(1, "sessionId is required"),
  message: messageSchema.refine((message) => message.text.trim().length > 0, {
    message: "Message cannot be empty",
    path: ["text"]
  }),
  conversationHistory: z.array(messageSchema).default([]),
  metadata: z
    .object({
      channel: z.string().optional(),
      language: z.string().optional(),
      locale: z.string().optional()
    })
    .optional()
});

export type IngestBody = z.infer<typeof ingestSchema>;
export type WireMessage = z.infer<typeof messageSchema>;

/** Accepts ISO strings or epoch milliseconds; anything unparseable becomes `fallback`. */
export function toIsoTimestamp(value: string | number | undefined, fallback: string): string {
  if (value === undefined) return fallback;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? fallback : date.toISOString();
}

export function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid request body";
  const where = issue.path.join(".");
  return where ? `${where}: ${issue.message}` : issue.message;
}
