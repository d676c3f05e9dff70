import { z } from "zod";
import { ExtractionError } from "../errors";
import { extractJson, isRecord } from "../extract/jsonExtract";

export interface ManifestEntry {
  path: string;
  content: string;
}

export interface BuildManifest {
  projectSlug: string | null;
  files: ManifestEntry[];
  /** Entries that were not `{ path, content }` pairs. */
  rejected: number;
}

const EntrySchema = z.object({
  path: z.string().trim().min(1),
  content: z.unknown()
});

const SLUG_FIELDS = ["project_slug", "slug", "project_name"] as const;

function toEntry(value: unknown): ManifestEntry | null {
  const parsed = EntrySchema.safeParse(value);
  if (!parsed.success || parsed.data.content === undefined) return null;
  const { path, content } = parsed.data;
  // models sometimes emit package.json and friends as objects
  return { path, content: typeof content === "string" ? content : JSON.stringify(content, null, 2) };
}

/**
 * Reads the Build Manifest embedded in the Construction output: a list of
 * `{ path, content }` pairs, or an object carrying such a list under `files`.
 */
export function parseBuildManifest(text: string): BuildManifest {
  if (!text.trim()) {
    throw new ExtractionError("Construction", "empty", "");
  }

  const value = extractJson(text);
  if (value === null) {
    throw new ExtractionError("Construction", "unparseable", `${text.length} chars of output`);
  }

  let list: unknown[];
  let projectSlug: string | null = null;
  if (Array.isArray(value)) {
    list = value;
  } else if (isRecord(value) && Array.isArray(value.files)) {
    list = value.files;
    for (const field of SLUG_FIELDS) {
      const candidate = value[field];
      if (typeof candidate === "string" && candidate.trim()) {
        projectSlug = candidate.trim();
        break;
      }
    }
  } else {
    throw new ExtractionError("Construction", "invalid", "expected a file list or an object with \"files\"");
  }

  const files: ManifestEntry[] = [];
  let rejected = 0;
  for (const item of list) {
    const entry = toEntry(item);
    if (entry) {
      files.push(entry);
    } else {
      rejected++;
    }
  }

  return { projectSlug, files, rejected };
}
