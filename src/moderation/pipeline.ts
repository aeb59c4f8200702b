import type { DetectionConfig } from "../config/types.js";
import { messageLogger, type Logger } from "../logging/logger.js";
import type { ScoreStore } from "../summary/types.js";
import type { ContextAssembler } from "./context.js";
import { containsLegalJustification, isInappropriateLanguage, matchesExplicitThreat } from "./lexical.js";
import type { Notifier } from "./notifier.js";
import { isReasonableResponse } from "./reasonableness.js";
import { firstMatchingRule, type Signals } from "./rules.js";
import { highestScore, type CategoryScorer } from "./scorer.js";
import type { SimilarityDetector } from "./similarity.js";
import type { Thresholds } from "./thresholds.js";
import type { Flags, ModerationMessage, ModerationOutcome, RuleId, ActionKind } from "./types.js";

export interface ModerationPipelineDeps {
  readonly similarity: SimilarityDetector;
  readonly context: ContextAssembler;
  readonly scorer: CategoryScorer;
  readonly notifier: Notifier;
  readonly scores: ScoreStore;
  readonly thresholds: Thresholds;
  readonly detection: DetectionConfig;
  readonly logger: Logger;
  readonly now?: () => number;
}

type Stage = (message: ModerationMessage, signals: Signals, log: Logger) => Promise<Partial<Signals>>;

export class ModerationPipeline {
  private readonly stages: ReadonlyArray<readonly [string, Stage]>;

  constructor(private readonly deps: ModerationPipelineDeps) {
    this.stages = [
      ["legal-justification", async (m) => ({ legalJustification: containsLegalJustification(m.text) })],
      ["explicit-threat", async (m) => ({ explicitThreat: matchesExplicitThreat(m.text) })],
      ["implicit-threat", async (m) => ({ implicitThreatScore: await deps.similarity.implicitThreatScore(m.text) })],
      ["abusive-language", async (m) => ({ abusive: isInappropriateLanguage(m.text) })],
      ["classification", (m, _s, log) => this.classify(m, log)],
    ];
  }

  /** Runs the detectors in priority order and stops at the first rule that matches. Never rejects. */
  async process(message: ModerationMessage): Promise<ModerationOutcome> {
    const log = messageLogger(this.deps.logger, message);
    let signals: Signals = {};

    try {
      for (const [name, stage] of this.stages) {
        signals = { ...signals, ...(await stage(message, signals, log)) };
        const rule = firstMatchingRule(signals, this.deps.thresholds);
        if (rule) {
          log.debug({ stage: name, rule: rule.id }, "Decision rule matched");
          return this.outcome(message, signals, rule.outcome, rule.id);
        }
      }
      return this.outcome(message, signals, "none", "below-threshold");
    } catch (err) {
      log.error({ err }, "Moderation pipeline failed");
      return this.outcome(message, signals, "none", "pipeline-error");
    }
  }

  /** `process`, then the warning if one was decided. */
  async handle(message: ModerationMessage): Promise<ModerationOutcome> {
    const outcome = await this.process(message);
    if (outcome.action.kind !== "none") {
      await this.deps.notifier.warn(outcome.action);
    }
    return outcome;
  }

  private async classify(message: ModerationMessage, log: Logger): Promise<Partial<Signals>> {
    const window = await this.deps.context.build(message);
    log.debug({ source: window.source, lines: window.messages.length }, "Context assembled");

    if (this.deps.detection.quoteSuppression) {
      const quoted = await this.deps.similarity.isLikelyQuoted(message.text, window.messages, {
        excludeTs: message.ts,
        window: this.deps.detection.quoteWindow,
      });
      if (quoted) return { quoted: true };
    }

    const transcript = window.transcript || message.text;
    const assessment = await this.deps.scorer.score(transcript);
    if (!assessment) return { scoringFailed: true };

    const top = highestScore(assessment);
    if (top !== undefined) {
      try {
        this.deps.scores.append({ userId: message.userId, score: top, timestamp: this.now() });
      } catch (err) {
        log.warn({ err }, "Failed to record score for the weekly summary");
      }
    }

    return {
      assessment,
      reasonableResponse: isReasonableResponse(
        message.text,
        "coercive_authority",
        assessment.scores.coercive_authority ?? 0,
        this.deps.thresholds.complianceCeiling,
      ),
    };
  }

  private outcome(message: ModerationMessage, signals: Signals, kind: ActionKind, rule: RuleId): ModerationOutcome {
    const flags: Flags = {
      abusive: signals.abusive === true,
      explicitThreat: signals.explicitThreat === true,
      implicitThreat:
        signals.implicitThreatScore !== undefined &&
        signals.implicitThreatScore >= this.deps.thresholds.implicitThreat,
    };

    return {
      action: { kind, rule, userId: message.userId, channel: message.channel },
      flags,
      ...(signals.assessment ? { assessment: signals.assessment } : {}),
    };
  }

  private now(): number {
    return this.deps.now?.() ?? Date.now();
  }
}
