import { describe, it, expect } from "vitest";
import { averageScore, buildDigests, formatDigest, selectTier } from "../../src/summary/digest.js";
import { ScoreLog } from "../../src/summary/store.js";

describe("averageScore", () => {
  it("averages the entries", () => {
    expect(averageScore([
      { userId: "u1", score: 0.8, timestamp: 1 },
      { userId: "u1", score: 0.2, timestamp: 2 },
    ])).toBe(0.5);
  });

  it("is undefined for no entries", () => {
    expect(averageScore([])).toBeUndefined();
  });
});

describe("selectTier", () => {
  it("picks tiers at their lower bounds", () => {
    expect(selectTier(0.7)).toBe("reflect");
    expect(selectTier(0.4)).toBe("improve");
    expect(selectTier(0.39)).toBe("positive");
  });
});

describe("formatDigest", () => {
  it("rounds the average to two decimals", () => {
    expect(formatDigest(0.456)).toBe(
      "Hi there! Your average toxicity score this week was 0.46.\nYou're doing okay, but there's room for improvement in communication style.",
    );
  });
});

describe("buildDigests", () => {
  it("builds one digest per user from a drained log", () => {
    const log = new ScoreLog();
    log.append({ userId: "u1", score: 0.8, timestamp: 1 });
    log.append({ userId: "u1", score: 0.2, timestamp: 2 });
    log.append({ userId: "u2", score: 0.1, timestamp: 3 });

    const digests = buildDigests(log.drain());

    expect(log.size).toBe(0);
    expect(digests.map((d) => [d.userId, d.average, d.tier])).toEqual([
      ["u1", 0.5, "improve"],
      ["u2", 0.1, "positive"],
    ]);
    expect(digests[1]?.text).toBe(
      "Hi there! Your average toxicity score this week was 0.10.\nGreat job keeping your messages respectful and positive! 🎉",
    );
  });
});
