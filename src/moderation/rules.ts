import type { Thresholds } from "./thresholds.js";
import type { ActionKind, RuleId, ToxicityAssessment, WarningKind } from "./types.js";

/**
 * Detector outputs gathered so far for one message. A field stays undefined until the
 * stage that produces it has run, so rules can be evaluated between stages.
 */
export interface Signals {
  readonly legalJustification?: boolean;
  readonly explicitThreat?: boolean;
  readonly implicitThreatScore?: number;
  readonly abusive?: boolean;
  readonly quoted?: boolean;
  readonly scoringFailed?: boolean;
  readonly assessment?: ToxicityAssessment;
  /** Reasonableness override for the coercive-authority score. */
  readonly reasonableResponse?: boolean;
}

export interface DecisionRule {
  readonly id: RuleId;
  readonly outcome: ActionKind;
  matches(signals: Signals, thresholds: Thresholds): boolean;
}

export interface Decision {
  readonly kind: ActionKind;
  readonly rule: RuleId;
}

export function categorize(signals: Signals, thresholds: Thresholds): ReadonlySet<WarningKind> {
  const categories = new Set<WarningKind>();
  const scores = signals.assessment?.scores;
  if (!scores) return categories;

  if (
    signals.abusive === true ||
    (scores.aggression ?? 0) >= thresholds.aggression ||
    (scores.harassment ?? 0) >= thresholds.harassment ||
    (scores.condescension ?? 0) >= thresholds.condescension
  ) {
    categories.add("abusive");
  }
  if ((scores.threat ?? 0) >= thresholds.threat) {
    categories.add("threat");
  }
  if ((scores.coercive_authority ?? 0) >= thresholds.coerciveAuthority && signals.reasonableResponse !== true) {
    categories.add("coercive");
  }

  return categories;
}

function hasNoScores(assessment: ToxicityAssessment): boolean {
  return Object.keys(assessment.scores).length === 0;
}

/** Evaluated top to bottom; the first match is the message's only action. */
export const DECISION_RULES: readonly DecisionRule[] = [
  {
    id: "legal-justification",
    outcome: "none",
    matches: (s) => s.legalJustification === true,
  },
  {
    id: "explicit-threat",
    outcome: "threat",
    matches: (s) => s.explicitThreat === true,
  },
  {
    id: "implicit-threat",
    outcome: "threat",
    matches: (s, t) => s.implicitThreatScore !== undefined && s.implicitThreatScore >= t.implicitThreat,
  },
  {
    id: "quoted-message",
    outcome: "none",
    matches: (s) => s.quoted === true,
  },
  {
    id: "scoring-failed",
    outcome: "none",
    matches: (s) => s.scoringFailed === true,
  },
  {
    id: "no-signal",
    outcome: "none",
    matches: (s, t) =>
      s.assessment !== undefined &&
      hasNoScores(s.assessment) &&
      s.abusive !== true &&
      categorize(s, t).size === 0,
  },
  {
    id: "threat-category",
    outcome: "threat",
    matches: (s, t) => categorize(s, t).has("threat"),
  },
  {
    id: "coercive-category",
    outcome: "coercive",
    matches: (s, t) => categorize(s, t).has("coercive"),
  },
  {
    id: "abusive-category",
    outcome: "abusive",
    matches: (s, t) => categorize(s, t).has("abusive"),
  },
];

export function firstMatchingRule(
  signals: Signals,
  thresholds: Thresholds,
  rules: readonly DecisionRule[] = DECISION_RULES,
): DecisionRule | undefined {
  return rules.find((rule) => rule.matches(signals, thresholds));
}

export function decide(
  signals: Signals,
  thresholds: Thresholds,
  rules: readonly DecisionRule[] = DECISION_RULES,
): Decision {
  const rule = firstMatchingRule(signals, thresholds, rules);
  return rule ? { kind: rule.outcome, rule: rule.id } : { kind: "none", rule: "below-threshold" };
}
