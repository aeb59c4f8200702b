export const CATEGORIES = [
  "aggression",
  "harassment",
  "threat",
  "coercive_authority",
  "condescension",
] as const;

export type Category = (typeof CATEGORIES)[number];

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((category) => category === value);
}

/** A single inbound chat message, immutable for the duration of one pipeline run. */
export interface ModerationMessage {
  readonly ts: string;
  readonly channel: string;
  readonly userId: string;
  readonly text: string;
  readonly isBot: boolean;
}

/** One entry of channel history as returned by the chat provider. */
export interface HistoryMessage {
  readonly ts: string;
  readonly userId?: string;
  readonly text?: string;
  readonly botId?: string;
  readonly subtype?: string;
}

export interface ToxicityAssessment {
  readonly scores: Readonly<Partial<Record<Category, number>>>;
  readonly triggered: ReadonlySet<Category>;
}

export interface Flags {
  readonly abusive: boolean;
  readonly explicitThreat: boolean;
  readonly implicitThreat: boolean;
}

export type WarningKind = "threat" | "coercive" | "abusive";
export type ActionKind = "none" | WarningKind;

export type RuleId =
  | "legal-justification"
  | "explicit-threat"
  | "implicit-threat"
  | "quoted-message"
  | "scoring-failed"
  | "no-signal"
  | "threat-category"
  | "coercive-category"
  | "abusive-category"
  | "below-threshold"
  | "pipeline-error";

export interface WarningAction {
  readonly kind: ActionKind;
  readonly rule: RuleId;
  readonly userId: string;
  readonly channel: string;
}

export interface ModerationOutcome {
  readonly action: WarningAction;
  readonly flags: Flags;
  readonly assessment?: ToxicityAssessment;
}
