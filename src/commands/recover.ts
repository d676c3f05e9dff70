import path from "path";
import { loadEnv } from "../config/env";
import { ArtifactStore } from "../io/artifacts";
import { Logger } from "../logging/logger";
import { parseBuildManifest } from "../pipeline/manifest";
import { listDirectoriesByMtime, pathExists, readText } from "../utils/fs";
import { slugify } from "../utils/text";
import { GitRunner, ProjectWriter, WriteOutcome } from "../writer/projectWriter";
import { createLogger } from "./context";

export interface RecoverOptions {
  storageDir: string;
  outputDir: string;
  logger: Logger;
  /** Construction output to replay; defaults to the stored Construction artifact. */
  artifactPath?: string;
  /** Target directory name under the output root. */
  project?: string;
  git?: GitRunner;
}

async function resolveSlug(options: RecoverOptions, manifestSlug: string | null): Promise<string> {
  if (options.project) return slugify(options.project);
  if (manifestSlug) return slugify(manifestSlug);

  const [latest] = await listDirectoriesByMtime(options.outputDir);
  if (!latest) {
    throw new Error(
      `No previously materialized project directory under ${options.outputDir}; pass --project to name one.`
    );
  }
  return path.basename(latest);
}

/**
 * Replays a captured Construction output through the Project Writer without calling
 * any agent. Running it twice leaves the same files on disk.
 */
export async function runRecover(options: RecoverOptions): Promise<WriteOutcome> {
  const artifactPath = options.artifactPath ?? new ArtifactStore(options.storageDir).pathFor("construction");
  if (!(await pathExists(artifactPath))) {
    throw new Error(`No construction output found at ${artifactPath}. Run the full pipeline first.`);
  }

  const manifest = parseBuildManifest(await readText(artifactPath));
  if (manifest.files.length === 0) {
    throw new Error(`The construction output at ${artifactPath} lists no files to write.`);
  }

  const slug = await resolveSlug(options, manifest.projectSlug);
  const writer = new ProjectWriter({ outputDir: options.outputDir, logger: options.logger, git: options.git });
  options.logger.info(`Recovering ${manifest.files.length} file(s) into ${writer.projectDir(slug)}`);

  const outcome = await writer.writeManifest(slug, manifest.files);
  if (outcome.written.length > 0) {
    await writer.finalize(outcome.projectDir);
  }
  return outcome;
}

export async function runRecoverCommand(options: { artifact?: string; project?: string }): Promise<void> {
  const env = loadEnv();
  const logger = createLogger(env);
  const outcome = await runRecover({
    storageDir: env.TREND_STORAGE_DIR,
    outputDir: env.TREND_OUTPUT_DIR,
    logger,
    artifactPath: options.artifact ? path.resolve(options.artifact) : undefined,
    project: options.project
  });

  console.log(`Recovered ${outcome.written.length} file(s) into ${outcome.projectDir}`);
  if (outcome.skipped.length > 0) {
    console.log(`Skipped ${outcome.skipped.length}: ${outcome.skipped.map((entry) => entry.path).join(", ")}`);
  }
}
