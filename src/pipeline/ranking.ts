import { z } from "zod";
import { ExtractionError } from "../errors";
import { extractJson, isRecord } from "../extract/jsonExtract";

export const RankedIdeaSchema = z
  .object({
    rank: z.coerce.number().int().positive(),
    title: z.string().min(1),
    pitch: z.string().default(""),
    feasibility_score: z.coerce.number().finite().optional(),
    target_users: z.string().default("")
  })
  .passthrough();

export type RankedIdea = z.infer<typeof RankedIdeaSchema>;

/** Field of the Evaluation output that holds the ranked list. */
export const RANKED_LIST_FIELD = "top_ideas";

export interface RankedIdeasResult {
  ideas: RankedIdea[];
  /** True when the model's ranks were not exactly 1..N and had to be reassigned. */
  renumbered: boolean;
}

export function parseRankedIdeas(text: string): RankedIdeasResult {
  if (!text.trim()) {
    throw new ExtractionError("Evaluation", "empty", "");
  }

  const value = extractJson(text);
  if (value === null) {
    throw new ExtractionError("Evaluation", "unparseable", `${text.length} chars of output`);
  }

  const list = isRecord(value) ? value[RANKED_LIST_FIELD] : undefined;
  if (!Array.isArray(list)) {
    throw new ExtractionError("Evaluation", "invalid", `missing "${RANKED_LIST_FIELD}" list`);
  }
  if (list.length === 0) {
    throw new ExtractionError("Evaluation", "invalid", "the critic rejected every idea");
  }

  const parsed = z.array(RankedIdeaSchema).safeParse(list);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ExtractionError("Evaluation", "invalid", issues);
  }

  return normalizeRanks(parsed.data);
}

/**
 * Orders ideas by rank and guarantees ranks are exactly 1..N. Gaps or duplicates are
 * resolved by keeping the model's order (rank, then position) and renumbering; the
 * rank the model gave is kept as `model_rank`.
 */
export function normalizeRanks(ideas: RankedIdea[]): RankedIdeasResult {
  const ordered = ideas
    .map((idea, index) => ({ idea, index }))
    .sort((a, b) => a.idea.rank - b.idea.rank || a.index - b.index)
    .map(({ idea }) => idea);

  const contiguous = ordered.every((idea, index) => idea.rank === index + 1);
  if (contiguous) {
    return { ideas: ordered, renumbered: false };
  }
  return {
    ideas: ordered.map((idea, index) => ({ ...idea, rank: index + 1, model_rank: idea.rank })),
    renumbered: true
  };
}

export function ideaByRank(ideas: RankedIdea[], rank: number): RankedIdea {
  const idea = ideas.find((candidate) => candidate.rank === rank);
  if (!idea) {
    throw new Error(`No idea with rank ${rank}`);
  }
  return idea;
}
