import { hasAny, type IntelSet } from "./intelligence";
import type { SessionMessage } from "./sessionStore";

export type Goal = "ask_for_payment" | "ask_for_phone" | "confirm_details" | "keep_engaged";

export type GenerationRequest = {
  goal: Goal | "stay_engaged";
  /** Transcript excerpt, one `speaker: text` line per message. */
  context: string;
  instructions: string;
  /** Full instruction text handed to the reply generator. */
  prompt: string;
};

const PAYMENT_PATTERN =
  /\b(pay|paying|payment|paid|transfer|send money|deposit|fee|fees|charge|charges|rupees?|rs\.?|inr|upi)\b|₹/;

export function mentionsPayment(text: string): boolean {
  return PAYMENT_PATTERN.test(text.toLowerCase());
}

/** First matching rule wins. */
export function nextGoal(intel: IntelSet, paymentRequested: boolean): Goal {
  if (paymentRequested && !hasAny(intel, "upiIds", "bankAccounts")) {
    return "ask_for_payment";
  }
  if (hasAny(intel, "upiIds") && !hasAny(intel, "phoneNumbers")) {
    return "ask_for_phone";
  }
  if (hasAny(intel, "upiIds")) {
    return "confirm_details";
  }
  return "keep_engaged";
}

const SITUATION =
  "You are being told YOUR account is blocked or in danger. " +
  "YOU are scared and confused. The other person is demanding action from YOU.";

const GOAL_ASKS: Record<Goal, string> = {
  ask_for_payment:
    "You are asking me to send money now. I do not understand how to do that. " +
    "Please explain what payment method YOU want me to use.",
  ask_for_phone:
    "I am very worried now. Please give me a phone number so I can talk to a real person.",
  confirm_details:
    "You already told me how to pay, but I am not sure I understood. " +
    "Please explain again what YOU want me to do.",
  keep_engaged: "Please explain clearly what YOU want me to do now."
};

const NEUTRAL_ASK = "I am not sure what this message is about. Can you tell me again what you need from me?";

export function formatTranscript(messages: SessionMessage[]): string {
  return messages
    .map((message) => `${message.origin === "agent" ? "me" : "them"}: ${message.text}`)
    .join("\n");
}

function compose(goal: GenerationRequest["goal"], context: string, instructions: string): GenerationRequest {
  const prompt = `${SITUATION}\n\nConversation:\n${context}\n\n${instructions}`;
  return { goal, context, instructions, prompt };
}

export function buildGoalPrompt(goal: Goal, context: string): GenerationRequest {
  return compose(goal, context, GOAL_ASKS[goal]);
}

/** Low-commitment instruction used when the exchange is not worth extracting from. */
export function buildNeutralPrompt(context: string): GenerationRequest {
  return compose("stay_engaged", context, NEUTRAL_ASK);
}
