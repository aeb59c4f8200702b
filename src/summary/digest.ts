import type { Digest, DigestTier, SummaryEntry } from "./types.js";

const TIER_MESSAGES: Record<DigestTier, string> = {
  reflect: "It might be worth reflecting on your tone in messages. Let's keep things constructive! 💬",
  improve: "You're doing okay, but there's room for improvement in communication style.",
  positive: "Great job keeping your messages respectful and positive! 🎉",
};

export function averageScore(entries: readonly SummaryEntry[]): number | undefined {
  if (entries.length === 0) return undefined;
  return entries.reduce((sum, e) => sum + e.score, 0) / entries.length;
}

export function selectTier(average: number): DigestTier {
  if (average >= 0.7) return "reflect";
  if (average >= 0.4) return "improve";
  return "positive";
}

export function formatDigest(average: number): string {
  return `Hi there! Your average toxicity score this week was ${average.toFixed(2)}.\n${TIER_MESSAGES[selectTier(average)]}`;
}

export function buildDigests(drained: ReadonlyMap<string, readonly SummaryEntry[]>): Digest[] {
  const digests: Digest[] = [];
  for (const [userId, entries] of drained) {
    const average = averageScore(entries);
    if (average === undefined) continue;
    digests.push({ userId, average, tier: selectTier(average), text: formatDigest(average) });
  }
  return digests;
}
