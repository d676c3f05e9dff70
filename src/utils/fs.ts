import { promises as fs } from "fs";
import path from "path";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function readText(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf8");
}

export async function writeText(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, content, "utf8");
}

export async function readJson<T>(filePath: string): Promise<T> {
  const content = await fs.readFile(filePath, "utf8");
  return JSON.parse(content) as T;
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await writeText(filePath, JSON.stringify(data, null, 2));
}

export async function appendJsonLines(filePath: string, records: unknown[]): Promise<void> {
  if (records.length === 0) return;
  await ensureDir(path.dirname(filePath));
  const content = records.map((record) => JSON.stringify(record)).join("\n");
  await fs.appendFile(filePath, content + "\n", "utf8");
}

/** Subdirectories of `rootDir`, most recently modified first. Missing root yields []. */
export async function listDirectoriesByMtime(rootDir: string): Promise<string[]> {
  let entries: import("fs").Dirent[];
  try {
    entries = await fs.readdir(rootDir, { withFileTypes: true });
  } catch {
    return [];
  }

  const dirs = await Promise.all(
    entries
      .filter((entry) => entry.isDirectory())
      .map(async (entry) => {
        const fullPath = path.join(rootDir, entry.name);
        const stat = await fs.stat(fullPath);
        return { fullPath, mtime: stat.mtimeMs };
      })
  );
  return dirs.sort((a, b) => b.mtime - a.mtime).map((dir) => dir.fullPath);
}
