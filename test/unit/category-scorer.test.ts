import { describe, it, expect } from "vitest";
import {
  AssessmentParseError,
  CLASSIFIER_SYSTEM_PROMPT,
  CategoryScorer,
  highestScore,
  parseAssessment,
  stripCodeFence,
} from "../../src/moderation/scorer.js";
import { FakeClassifier, silentLogger } from "../helpers/fakes.js";

describe("stripCodeFence", () => {
  it("unwraps a json fenced block", () => {
    expect(stripCodeFence('```json\n{"scores":{}}\n```')).toBe('{"scores":{}}');
  });

  it("unwraps a bare fence", () => {
    expect(stripCodeFence('```\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it("leaves unfenced text trimmed", () => {
    expect(stripCodeFence('  {"a":1}  ')).toBe('{"a":1}');
  });
});

describe("parseAssessment", () => {
  it("reads scores and triggered labels", () => {
    const assessment = parseAssessment(
      JSON.stringify({ scores: { threat: 0.7, aggression: 0.1 }, triggered: ["threat"] }),
    );

    expect(assessment.scores).toEqual({ threat: 0.7, aggression: 0.1 });
    expect([...assessment.triggered]).toEqual(["threat"]);
  });

  it("drops unknown categories and labels", () => {
    const assessment = parseAssessment(
      JSON.stringify({ scores: { threat: 0.2, sarcasm: 0.9 }, triggered: ["sarcasm", "threat"] }),
    );

    expect(assessment.scores).toEqual({ threat: 0.2 });
    expect([...assessment.triggered]).toEqual(["threat"]);
  });

  it("defaults triggered to an empty set", () => {
    const assessment = parseAssessment(JSON.stringify({ scores: {} }));
    expect(assessment.triggered.size).toBe(0);
  });

  it("accepts fenced output", () => {
    const assessment = parseAssessment('```json\n{"scores":{"harassment":0.6},"triggered":[]}\n```');
    expect(assessment.scores).toEqual({ harassment: 0.6 });
  });

  it("rejects non-JSON output", () => {
    expect(() => parseAssessment("I cannot classify this.")).toThrow(AssessmentParseError);
  });

  it("reads missing or null scores as no scores", () => {
    expect(parseAssessment(JSON.stringify({ triggered: [] })).scores).toEqual({});
    expect(parseAssessment("{}").scores).toEqual({});
    expect(parseAssessment(JSON.stringify({ scores: null })).scores).toEqual({});
  });

  it("rejects a reply that is not an object", () => {
    expect(() => parseAssessment("[]")).toThrow(AssessmentParseError);
  });

  it("rejects scores outside [0, 1]", () => {
    expect(() => parseAssessment(JSON.stringify({ scores: { threat: 1.5 } }))).toThrow(
      /scores\.threat/,
    );
  });

  it("keeps the raw output on the error", () => {
    try {
      parseAssessment("nope");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AssessmentParseError);
      if (err instanceof AssessmentParseError) expect(err.raw).toBe("nope");
    }
  });
});

describe("highestScore", () => {
  it("returns the maximum category score", () => {
    expect(highestScore(parseAssessment('{"scores":{"threat":0.3,"condescension":0.65}}'))).toBe(0.65);
  });

  it("returns undefined without scores", () => {
    expect(highestScore(parseAssessment('{"scores":{}}'))).toBeUndefined();
  });
});

describe("CategoryScorer", () => {
  it("sends the transcript with the classifier prompt", async () => {
    const classifier = FakeClassifier.scoring({ aggression: 0.4 });
    const scorer = new CategoryScorer(classifier, silentLogger());

    const assessment = await scorer.score("U1: where is it\nU2: soon");

    expect(classifier.calls).toEqual([
      { systemPrompt: CLASSIFIER_SYSTEM_PROMPT, userText: "U1: where is it\nU2: soon" },
    ]);
    expect(assessment?.scores).toEqual({ aggression: 0.4 });
  });

  it("returns null when the call fails", async () => {
    const scorer = new CategoryScorer(new FakeClassifier(new Error("timeout")), silentLogger());
    expect(await scorer.score("text")).toBeNull();
  });

  it("returns null on malformed output", async () => {
    const scorer = new CategoryScorer(new FakeClassifier("{not json"), silentLogger());
    expect(await scorer.score("text")).toBeNull();
  });
});
