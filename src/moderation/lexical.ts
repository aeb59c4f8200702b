import {
  ABUSIVE_TERMS,
  EXPLICIT_THREAT_PHRASES,
  LEGAL_JUSTIFICATION_PHRASES,
  THREAT_PHRASINGS,
} from "./lexicon.js";

export interface LexicalReport {
  readonly legalJustification: boolean;
  readonly explicitThreat: boolean;
  readonly abusive: boolean;
  readonly matched: string[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Boundaries are letters/digits of any script, so "à" or "ã" at a phrase edge still anchors.
function wholePhrasePattern(phrase: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(phrase)}(?![\\p{L}\\p{N}_])`, "u");
}

const LEGAL_PATTERNS = LEGAL_JUSTIFICATION_PHRASES.map((phrase) => ({
  phrase,
  pattern: wholePhrasePattern(phrase),
}));

function normalize(text: string | null | undefined): string | null {
  if (typeof text !== "string" || text.length === 0) return null;
  return text.toLowerCase();
}

function findSubstring(text: string, phrases: readonly string[]): string | undefined {
  return phrases.find((phrase) => text.includes(phrase));
}

export function findLegalJustification(text: string | null | undefined): string | undefined {
  const lowered = normalize(text);
  if (!lowered) return undefined;
  return LEGAL_PATTERNS.find(({ pattern }) => pattern.test(lowered))?.phrase;
}

export function containsLegalJustification(text: string | null | undefined): boolean {
  try {
    return findLegalJustification(text) !== undefined;
  } catch {
    return false;
  }
}

export function findExplicitThreat(text: string | null | undefined): string | undefined {
  const lowered = normalize(text);
  if (!lowered) return undefined;
  return findSubstring(lowered, EXPLICIT_THREAT_PHRASES);
}

export function matchesExplicitThreat(text: string | null | undefined): boolean {
  try {
    return findExplicitThreat(text) !== undefined;
  } catch {
    return false;
  }
}

export function findInappropriateLanguage(text: string | null | undefined): string | undefined {
  const lowered = normalize(text);
  if (!lowered) return undefined;
  return findSubstring(lowered, ABUSIVE_TERMS) ?? findSubstring(lowered, THREAT_PHRASINGS);
}

export function isInappropriateLanguage(text: string | null | undefined): boolean {
  try {
    return findInappropriateLanguage(text) !== undefined;
  } catch {
    return false;
  }
}

export function inspectText(text: string | null | undefined): LexicalReport {
  const matched = [
    findLegalJustification(text),
    findExplicitThreat(text),
    findInappropriateLanguage(text),
  ].filter((m): m is string => m !== undefined);

  return {
    legalJustification: containsLegalJustification(text),
    explicitThreat: matchesExplicitThreat(text),
    abusive: isInappropriateLanguage(text),
    matched: [...new Set(matched)],
  };
}
