/**
 * Newline-delimited JSON framing: one envelope per line.
 */

export function isBlankLine(line: string): boolean {
  return line.trim() === "";
}

/** Plain JSON numbers: integers beyond 2^53 come back as the nearest double. */
export function parseJsonLine(line: string): unknown {
  return JSON.parse(line.trim()) as unknown;
}

export function serializeLine(obj: unknown): string {
  return JSON.stringify(obj) + "\n";
}
