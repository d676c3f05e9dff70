import path from "path";
import execa from "execa";
import { errorMessage } from "../errors";
import { Logger } from "../logging/logger";
import { pathExists, writeText } from "../utils/fs";
import { ManifestEntry } from "../pipeline/manifest";
import { projectDir as projectDirFor } from "../io/paths";

export type GitRunner = (args: string[], cwd: string) => Promise<void>;

export interface ProjectWriterOptions {
  outputDir: string;
  logger: Logger;
  git?: GitRunner;
}

export interface WriteOutcome {
  projectDir: string;
  written: string[];
  skipped: { path: string; reason: string }[];
}

const defaultGit: GitRunner = async (args, cwd) => {
  await execa("git", args, { cwd });
};

export class ProjectWriter {
  private readonly git: GitRunner;

  constructor(private readonly options: ProjectWriterOptions) {
    this.git = options.git ?? defaultGit;
  }

  projectDir(slug: string): string {
    return projectDirFor(this.options.outputDir, slug);
  }

  /**
   * Writes one file below `<outputDir>/<slug>`, creating parent directories.
   * Returns the absolute path written.
   */
  async writeFile(slug: string, relativePath: string, content: string): Promise<string> {
    const root = path.resolve(this.projectDir(slug));
    const target = resolveInside(root, relativePath);
    await writeText(target, content);
    this.options.logger.info(`Wrote ${target} (${content.length} chars)`);
    return target;
  }

  async writeManifest(slug: string, entries: ManifestEntry[]): Promise<WriteOutcome> {
    const outcome: WriteOutcome = { projectDir: this.projectDir(slug), written: [], skipped: [] };
    for (const entry of entries) {
      try {
        await this.writeFile(slug, entry.path, entry.content);
        outcome.written.push(entry.path);
      } catch (error) {
        this.options.logger.warn(`Skipped ${entry.path}`, errorMessage(error));
        outcome.skipped.push({ path: entry.path, reason: errorMessage(error) });
      }
    }
    return outcome;
  }

  /** Turns the project directory into a git repository with everything committed. */
  async finalize(projectDir: string): Promise<boolean> {
    try {
      if (!(await pathExists(path.join(projectDir, ".git")))) {
        await this.git(["init"], projectDir);
      }
      await this.git(["add", "-A"], projectDir);
      await this.git(
        [
          "-c",
          "user.name=trend-to-product",
          "-c",
          "user.email=trend-to-product@localhost",
          "commit",
          "--allow-empty",
          "-m",
          "Initial scaffold"
        ],
        projectDir
      );
      this.options.logger.info(`Initialized git repository in ${projectDir}`);
      return true;
    } catch (error) {
      this.options.logger.warn(`Git finalization failed for ${projectDir}`, errorMessage(error));
      return false;
    }
  }
}

function resolveInside(root: string, relativePath: string): string {
  const cleaned = relativePath.trim().replace(/\\/g, "/");
  if (!cleaned) {
    throw new Error("empty path");
  }
  if (path.isAbsolute(cleaned) || /^[a-zA-Z]:/.test(cleaned)) {
    throw new Error(`absolute path not allowed: ${relativePath}`);
  }
  const target = path.resolve(root, cleaned);
  const rel = path.relative(root, target);
  if (!rel || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new Error(`path escapes the project directory: ${relativePath}`);
  }
  return target;
}
