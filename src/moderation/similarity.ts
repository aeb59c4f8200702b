import type { Logger } from "../logging/logger.js";
import type { EmbeddingProvider } from "../llm/types.js";
import { IMPLICIT_THREAT_PHRASES } from "./lexicon.js";
import type { Thresholds } from "./thresholds.js";
import type { HistoryMessage } from "./types.js";

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Math.min(1, Math.max(0, similarity));
}

export interface QuoteCheckOptions {
  /** Timestamp of the message under test; it is never its own quote source. */
  readonly excludeTs?: string;
  readonly window?: number;
}

export class SimilarityDetector {
  private threatVectors: Promise<number[][]> | null = null;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly thresholds: Pick<Thresholds, "implicitThreat" | "quote">,
    private readonly logger: Logger,
  ) {}

  /** Highest cosine similarity between `text` and any reference phrase, 0 on failure. */
  async maxSimilarity(text: string, referencePhrases: readonly string[]): Promise<number> {
    if (!text.trim() || referencePhrases.length === 0) return 0;
    try {
      const vectors = await this.provider.embed([text, ...referencePhrases]);
      const [input, ...references] = vectors;
      return input ? maxAgainst(input, references) : 0;
    } catch (err) {
      this.logger.warn({ err }, "Similarity check failed");
      return 0;
    }
  }

  async implicitThreatScore(text: string): Promise<number> {
    if (!text.trim()) return 0;
    try {
      const [input] = await this.provider.embed([text]);
      const references = await this.threatReferenceVectors();
      return input ? maxAgainst(input, references) : 0;
    } catch (err) {
      this.logger.warn({ err }, "Implicit threat check failed");
      return 0;
    }
  }

  async isImplicitThreat(text: string): Promise<boolean> {
    return (await this.implicitThreatScore(text)) >= this.thresholds.implicitThreat;
  }

  async isLikelyQuoted(
    text: string,
    window: readonly HistoryMessage[],
    opts: QuoteCheckOptions = {},
  ): Promise<boolean> {
    const recent = window
      .filter((m) => m.ts !== opts.excludeTs)
      .map((m) => m.text?.trim() ?? "")
      .filter((t) => t.length > 0)
      .slice(-(opts.window ?? 5));

    if (!text.trim() || recent.length === 0) return false;

    const score = await this.maxSimilarity(text, recent);
    this.logger.debug({ score }, "Quote similarity");
    return score >= this.thresholds.quote;
  }

  private threatReferenceVectors(): Promise<number[][]> {
    if (!this.threatVectors) {
      const pending = this.provider.embed(IMPLICIT_THREAT_PHRASES);
      // A failed fetch is not cached, the next message tries again
      void pending.catch(() => {
        if (this.threatVectors === pending) this.threatVectors = null;
      });
      this.threatVectors = pending;
    }
    return this.threatVectors;
  }
}

function maxAgainst(input: readonly number[], references: readonly number[][]): number {
  return references.reduce((max, ref) => Math.max(max, cosineSimilarity(input, ref)), 0);
}
