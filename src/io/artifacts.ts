import { ArtifactSlot, artifactPath } from "./paths";
import { pathExists, readText, writeText } from "../utils/fs";

export class ArtifactStore {
  constructor(readonly storageDir: string) {}

  pathFor(slot: ArtifactSlot): string {
    return artifactPath(this.storageDir, slot);
  }

  async write(slot: ArtifactSlot, content: string): Promise<string> {
    const filePath = this.pathFor(slot);
    await writeText(filePath, content);
    return filePath;
  }

  async writeJson(slot: ArtifactSlot, data: unknown): Promise<string> {
    return this.write(slot, JSON.stringify(data, null, 2));
  }

  /** Null when the slot has never been written. */
  async read(slot: ArtifactSlot): Promise<string | null> {
    const filePath = this.pathFor(slot);
    if (!(await pathExists(filePath))) return null;
    return readText(filePath);
  }
}
