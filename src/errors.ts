export type ExtractionFailure = "empty" | "unparseable" | "invalid";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A stage produced text where structured data was required and none could be used.
 * `reason` separates "no output at all", "output without any JSON value" and
 * "JSON value of the wrong shape".
 */
export class ExtractionError extends Error {
  readonly stage: string;
  readonly reason: ExtractionFailure;

  constructor(stage: string, reason: ExtractionFailure, detail: string) {
    super(`${stage} stage: ${describeFailure(reason)}${detail ? ` (${detail})` : ""}`);
    this.name = "ExtractionError";
    this.stage = stage;
    this.reason = reason;
  }
}

export class UserAbortError extends Error {
  constructor(message = "Aborted by user") {
    super(message);
    this.name = "UserAbortError";
  }
}

export class InterruptedError extends Error {
  constructor(message = "Interrupted by user") {
    super(message);
    this.name = "InterruptedError";
  }
}

function describeFailure(reason: ExtractionFailure): string {
  switch (reason) {
    case "empty":
      return "no output produced";
    case "unparseable":
      return "output produced but no JSON value could be parsed";
    case "invalid":
      return "parsed JSON does not have the expected shape";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isInterruption(error: unknown): boolean {
  if (error instanceof InterruptedError) return true;
  if (!(error instanceof Error)) return false;
  // prompt libraries and fetch report cancellation under these names
  return (
    error.name === "ExitPromptError" ||
    error.name === "AbortPromptError" ||
    error.name === "AbortError" ||
    error.name === "APIUserAbortError"
  );
}
