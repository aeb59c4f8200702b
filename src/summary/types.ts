export interface SummaryEntry {
  readonly userId: string;
  readonly score: number;
  readonly timestamp: number;
}

/** Per-user score log shared by every pipeline run and the digest job. */
export interface ScoreStore {
  append(entry: SummaryEntry): void;
  /** Removes and returns everything recorded so far as one step. */
  drain(): Map<string, SummaryEntry[]>;
  readonly size: number;
}

export type DigestTier = "reflect" | "improve" | "positive";

export interface Digest {
  readonly userId: string;
  readonly average: number;
  readonly tier: DigestTier;
  readonly text: string;
}
