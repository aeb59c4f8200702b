import type { Category } from "./types.js";

const QUOTED_MATERIAL = /“[^”]+”|"[^"]+"/;
const RESPECTFUL_DISAGREEMENT = ["frankly", "disagree", "unreasonable", "concerned", "unfair", "respectfully"];
const PROFANITY = ["idiot", "shut up"];
const LEGAL_REFERENCES = ["attorney general", "massachusetts law"];
const WILLINGNESS_TO_COMPLY = ["i'm willing to", "i am willing to", "i remain open to", "i will comply once", "i just need"];

/**
 * Whether a coercive-authority score should be disregarded because the message is a
 * proportionate reply: citing someone, pushing back politely, invoking the law, or
 * agreeing to comply under conditions. Other categories are never overridden.
 */
export function isReasonableResponse(
  text: string,
  category: Category,
  modelScore: number,
  complianceCeiling: number,
): boolean {
  if (category !== "coercive_authority") return false;

  const lowered = text.toLowerCase();
  const includesAny = (phrases: readonly string[]) => phrases.some((p) => lowered.includes(p));

  if (QUOTED_MATERIAL.test(text)) return true;
  if (includesAny(RESPECTFUL_DISAGREEMENT) && !includesAny(PROFANITY)) return true;
  if (includesAny(LEGAL_REFERENCES)) return true;
  if (modelScore < complianceCeiling && includesAny(WILLINGNESS_TO_COMPLY)) return true;

  return false;
}
