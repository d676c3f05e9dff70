import { DrizzleRunLedger } from "./dbLedger";
import { FileRunLedger } from "./fileLedger";
import { RunLedger } from "./types";

export function createRunLedger(options: { databaseUrl?: string; storageDir: string }): RunLedger {
  if (options.databaseUrl) {
    return DrizzleRunLedger.fromUrl(options.databaseUrl);
  }
  return new FileRunLedger(options.storageDir);
}
