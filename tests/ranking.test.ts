import { describe, expect, it } from "vitest";
import { ExtractionError } from "../src/errors";
import { ideaByRank, parseRankedIdeas } from "../src/pipeline/ranking";

function evaluation(ideas: unknown[]): string {
  return `After weighing the trends:\n\`\`\`json\n${JSON.stringify({ top_ideas: ideas })}\n\`\`\``;
}

function extractionFailure(run: () => unknown): ExtractionError {
  try {
    run();
  } catch (error) {
    if (error instanceof ExtractionError) return error;
    throw error;
  }
  throw new Error("expected an ExtractionError");
}

describe("parseRankedIdeas", () => {
  it("orders ideas by rank and keeps contiguous ranks", () => {
    const result = parseRankedIdeas(
      evaluation([
        { rank: 2, title: "Sync Notes", pitch: "Offline notes" },
        { rank: 1, title: "Habit Forge", feasibility_score: 8, target_users: "students" },
        { rank: 3, title: "Queue Pilot" }
      ])
    );

    expect(result.renumbered).toBe(false);
    expect(result.ideas[0].model_rank).toBeUndefined();
    expect(result.ideas.map((idea) => [idea.rank, idea.title])).toEqual([
      [1, "Habit Forge"],
      [2, "Sync Notes"],
      [3, "Queue Pilot"]
    ]);
    expect(result.ideas[0].feasibility_score).toBe(8);
    expect(result.ideas[2].pitch).toBe("");
  });

  it("renumbers gaps in listed order", () => {
    const result = parseRankedIdeas(
      evaluation([
        { rank: 1, title: "A" },
        { rank: 3, title: "B" },
        { rank: 5, title: "C" }
      ])
    );

    expect(result.renumbered).toBe(true);
    expect(result.ideas.map((idea) => `${idea.rank}:${idea.title}`)).toEqual(["1:A", "2:B", "3:C"]);
    expect(result.ideas.map((idea) => idea.model_rank)).toEqual([1, 3, 5]);
  });

  it("breaks duplicate ranks by position", () => {
    const result = parseRankedIdeas(
      evaluation([
        { rank: 1, title: "First" },
        { rank: 1, title: "Second" },
        { rank: 2, title: "Third" }
      ])
    );

    expect(result.renumbered).toBe(true);
    expect(result.ideas.map((idea) => idea.title)).toEqual(["First", "Second", "Third"]);
    expect(result.ideas.map((idea) => idea.rank)).toEqual([1, 2, 3]);
  });

  it("coerces numeric strings and keeps extra fields", () => {
    const result = parseRankedIdeas(evaluation([{ rank: "1", title: "Solo", source_trends: ["local-first"] }]));
    expect(result.ideas[0].rank).toBe(1);
    expect(result.ideas[0].source_trends).toEqual(["local-first"]);
  });

  it("fails with reason empty on blank output", () => {
    expect(extractionFailure(() => parseRankedIdeas("  \n")).reason).toBe("empty");
  });

  it("fails with reason unparseable when no JSON is present", () => {
    const error = extractionFailure(() => parseRankedIdeas("I could not pick any ideas today."));
    expect(error.reason).toBe("unparseable");
    expect(error.stage).toBe("Evaluation");
  });

  it("fails with reason invalid when the ranked list field is missing", () => {
    const error = extractionFailure(() => parseRankedIdeas('{"ideas": [{"rank": 1, "title": "A"}]}'));
    expect(error.reason).toBe("invalid");
    expect(error.message).toBe(
      'Evaluation stage: parsed JSON does not have the expected shape (missing "top_ideas" list)'
    );
  });

  it("fails when the list is empty", () => {
    expect(extractionFailure(() => parseRankedIdeas('{"top_ideas": []}')).reason).toBe("invalid");
  });

  it("fails when an idea has no title", () => {
    const error = extractionFailure(() => parseRankedIdeas('{"top_ideas": [{"rank": 1}]}'));
    expect(error.reason).toBe("invalid");
    expect(error.message).toContain("0.title");
  });
});

describe("ideaByRank", () => {
  it("throws for a rank that is not listed", () => {
    const { ideas } = parseRankedIdeas(evaluation([{ rank: 1, title: "Only" }]));
    expect(ideaByRank(ideas, 1).title).toBe("Only");
    expect(() => ideaByRank(ideas, 2)).toThrow("No idea with rank 2");
  });
});
