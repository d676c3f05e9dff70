import { RankedIdea, ideaByRank } from "./ranking";

/** Blocking line input from the operator. */
export interface Prompter {
  ask(message: string, signal?: AbortSignal): Promise<string>;
}

export type Printer = (text: string) => void;

export const DESIGN_PREVIEW_CHARS = 2500;
/** Ideas offered at the selection gate; lower-ranked extras are never selectable. */
export const SELECTION_SIZE = 3;

const AFFIRMATIVE = new Set(["y", "yes"]);
const NEGATIVE = new Set(["n", "no"]);

/** Re-asks until `accept` takes the (trimmed) answer, which is then returned. */
export async function askUntil(
  prompter: Prompter,
  message: string,
  accept: (answer: string) => boolean,
  options: { signal?: AbortSignal; onReject?: (answer: string) => void } = {}
): Promise<string> {
  for (;;) {
    const answer = (await prompter.ask(message, options.signal)).trim();
    if (accept(answer)) return answer;
    options.onReject?.(answer);
  }
}

export function formatRankedIdeas(ideas: RankedIdea[]): string {
  return ideas
    .map((idea) => {
      const score = idea.feasibility_score === undefined ? "" : ` (feasibility ${idea.feasibility_score}/10)`;
      const lines = [`${idea.rank}. ${idea.title}${score}`];
      if (idea.pitch) lines.push(`   ${idea.pitch}`);
      if (idea.target_users) lines.push(`   Target users: ${idea.target_users}`);
      return lines.join("\n");
    })
    .join("\n\n");
}

export async function selectionGate(
  ideas: RankedIdea[],
  prompter: Prompter,
  print: Printer,
  signal?: AbortSignal
): Promise<RankedIdea> {
  const offered = ideas.slice(0, SELECTION_SIZE);
  const choices = offered.map((idea) => String(idea.rank));
  print(`\n=== TOP ${offered.length} IDEAS ===\n${formatRankedIdeas(offered)}\n`);

  const answer = await askUntil(
    prompter,
    `Pick an idea to design [${choices.join("/")}]:`,
    (value) => choices.includes(value),
    { signal, onReject: (value) => print(`"${value}" is not one of ${choices.join(", ")}.`) }
  );
  return ideaByRank(offered, Number(answer));
}

export function formatDesignPreview(design: string, location: string, limit = DESIGN_PREVIEW_CHARS): string {
  if (design.length <= limit) return design;
  const remaining = design.length - limit;
  return `${design.slice(0, limit)}\n\n... (${remaining} more characters in ${location})`;
}

/** True when the operator approves the design. */
export async function approvalGate(
  design: string,
  location: string,
  prompter: Prompter,
  print: Printer,
  signal?: AbortSignal
): Promise<boolean> {
  print(`\n=== DESIGN DOCUMENT ===\n${formatDesignPreview(design, location)}\n`);

  const answer = await askUntil(
    prompter,
    "Approve this design and start construction? [y/n]:",
    (value) => AFFIRMATIVE.has(value.toLowerCase()) || NEGATIVE.has(value.toLowerCase()),
    { signal, onReject: () => print("Please answer y or n.") }
  );
  return AFFIRMATIVE.has(answer.toLowerCase());
}
