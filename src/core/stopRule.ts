import { hasAny, type IntelSet } from "./intelligence";

export const DEFAULT_STOP_CEILING = 14;

export function shouldStop(
  intel: IntelSet,
  totalMessages: number,
  ceiling: number = DEFAULT_STOP_CEILING
): boolean {
  const hasPaymentArtifact = hasAny(intel, "upiIds", "bankAccounts", "phishingLinks");
  const hasContact = hasAny(intel, "phoneNumbers");
  if (hasPaymentArtifact && hasContact) return true;
  return totalMessages >= ceiling;
}
