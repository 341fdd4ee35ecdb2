const BLOCKED_PHRASES = [
  "customer care",
  "customer support",
  "helpline",
  "official website",
  "official app",
  "contact your bank",
  "visit your bank",
  "visit the branch",
  "report this",
  "cyber crime",
  "cybercrime",
  "police",
  "i suggest",
  "i recommend",
  "you should",
  "be careful",
  "do not share",
  "don't share",
  "never share",
  "search online",
  "google it",
  "look it up",
  "scam",
  "fraud",
  "as an ai",
  "language model"
];

export const FILTER_FALLBACK_REPLY = "Sorry, I did not understand. Please tell me again what I should do?";

export function findBlockedPhrase(reply: string): string | null {
  const lower = reply.toLowerCase();
  return BLOCKED_PHRASES.find((phrase) => lower.includes(phrase)) ?? null;
}

export function filterReply(reply: string): { text: string; blocked: string | null } {
  const blocked = findBlockedPhrase(reply);
  if (blocked) return { text: FILTER_FALLBACK_REPLY, blocked };
  return { text: reply, blocked: null };
}
