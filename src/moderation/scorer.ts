import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import type { ClassificationProvider } from "../llm/types.js";
import { CATEGORIES, isCategory, type Category, type ToxicityAssessment } from "./types.js";

export const CLASSIFIER_SYSTEM_PROMPT = [
  "You are a toxicity classifier for workplace chat messages.",
  "Given the conversation context below, return a JSON object with a `scores` object",
  "(toxicity category: number between 0 and 1) and a `triggered` list of triggered labels.",
  "Toxicity categories are: `aggression`, `harassment`, `threat`, `coercive_authority`, and `condescension`.",
  "The category `coercive_authority` refers to subtle or indirect language that pressures, monitors,",
  "or corrects someone's behavior by implying hierarchical control, using policy speak, surveillance",
  "language, or piling on questions that make the recipient feel micromanaged or distrusted.",
  "However, if the message is from a manager responding to previous unprofessional behavior, and the",
  "tone is proportionate and necessary for accountability or clarity, it should score low.",
  "Respond with the JSON object only.",
].join(" ");

const score = z.number().min(0).max(1);

// A reply without scores is "no signal", not a parse failure
const assessmentSchema = z.object({
  scores: z
    .object({
      aggression: score.optional(),
      harassment: score.optional(),
      threat: score.optional(),
      coercive_authority: score.optional(),
      condescension: score.optional(),
    })
    .nullish()
    .transform((scores): Partial<Record<Category, number>> => scores ?? {}),
  triggered: z.array(z.string()).default([]),
});

export class AssessmentParseError extends Error {
  constructor(
    message: string,
    readonly raw: string,
  ) {
    super(message);
    this.name = "AssessmentParseError";
  }
}

const FENCE_PATTERN = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/;

export function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const match = FENCE_PATTERN.exec(trimmed);
  return match ? (match[1] ?? "").trim() : trimmed;
}

export function parseAssessment(raw: string): ToxicityAssessment {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFence(raw));
  } catch {
    throw new AssessmentParseError("Classifier output is not JSON", raw);
  }

  const result = assessmentSchema.safeParse(json);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new AssessmentParseError(
      `Classifier output does not match schema${first ? ` at ${first.path.join(".")}: ${first.message}` : ""}`,
      raw,
    );
  }

  const scores: Partial<Record<Category, number>> = {};
  for (const category of CATEGORIES) {
    const value = result.data.scores[category];
    if (value !== undefined) scores[category] = value;
  }

  return {
    scores,
    triggered: new Set(result.data.triggered.filter(isCategory)),
  };
}

export function highestScore(assessment: ToxicityAssessment): number | undefined {
  const values = Object.values(assessment.scores);
  return values.length > 0 ? Math.max(...values) : undefined;
}

export class CategoryScorer {
  constructor(
    private readonly provider: ClassificationProvider,
    private readonly logger: Logger,
  ) {}

  /** Returns null when the model call or its output fails; the caller ends the run without a warning. */
  async score(contextText: string): Promise<ToxicityAssessment | null> {
    let raw: string;
    try {
      raw = await this.provider.complete(CLASSIFIER_SYSTEM_PROMPT, contextText);
    } catch (err) {
      this.logger.error({ err }, "Classifier call failed");
      return null;
    }

    try {
      const assessment = parseAssessment(raw);
      this.logger.debug(
        { scores: assessment.scores, triggered: [...assessment.triggered] },
        "Classifier scores",
      );
      return assessment;
    } catch (err) {
      this.logger.error({ err, raw }, "Failed to parse classifier output");
      return null;
    }
  }
}
