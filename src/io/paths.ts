import path from "path";

export type ArtifactSlot = "discovery" | "evaluation" | "chosenIdea" | "design" | "construction";

/**
 * One well-known file per artifact, overwritten by every run. Two runs started at
 * the same time race on these files; run the pipeline one at a time.
 */
export const ARTIFACT_FILES: Record<ArtifactSlot, string> = {
  discovery: "discovery_output.md",
  evaluation: "evaluation_output.md",
  chosenIdea: "chosen_idea.json",
  design: "design_doc.md",
  construction: "construction_output.md"
};

export function artifactPath(storageDir: string, slot: ArtifactSlot): string {
  return path.join(storageDir, ARTIFACT_FILES[slot]);
}

export function runLedgerPath(storageDir: string): string {
  return path.join(storageDir, "runs.json");
}

export function candidateLogPath(storageDir: string): string {
  return path.join(storageDir, "trends.jsonl");
}

export function pipelineLogPath(logDir: string): string {
  return path.join(logDir, "pipeline.log");
}

export function projectDir(outputDir: string, slug: string): string {
  return path.join(outputDir, slug);
}
