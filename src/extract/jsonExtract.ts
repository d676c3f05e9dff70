export type JsonContainer = Record<string, unknown> | unknown[];

const CLOSERS: Record<string, string> = { "{": "}", "[": "]" };

/**
 * Returns the first JSON object or array embedded in free text, or null.
 *
 * Every `{` / `[` is tried in order of position; the first one that starts a
 * complete, parseable value wins. A balanced value that fails to parse is skipped
 * whole, so nothing nested inside it is returned. Text after the value's closing
 * bracket is ignored.
 */
export function extractJson(text: string): JsonContainer | null {
  for (let start = 0; start < text.length; start++) {
    const ch = text[start];
    if (ch !== "{" && ch !== "[") continue;

    const end = findValueEnd(text, start);
    if (end === -1) continue;

    const parsed = tryParse(text.slice(start, end + 1));
    if (parsed !== null) return parsed;
    start = end;
  }
  return null;
}

/**
 * Index of the bracket closing the one at `start`, honouring JSON strings.
 * -1 when the brackets never balance or close with the wrong kind.
 */
function findValueEnd(text: string, start: number): number {
  const expected: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{" || ch === "[") {
      expected.push(CLOSERS[ch]);
    } else if (ch === "}" || ch === "]") {
      if (expected.pop() !== ch) return -1;
      if (expected.length === 0) return i;
    }
  }
  return -1;
}

function tryParse(candidate: string): JsonContainer | null {
  try {
    const value: unknown = JSON.parse(candidate);
    if (Array.isArray(value)) return value;
    if (isRecord(value)) return value;
    return null;
  } catch {
    return null;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
