export type Verdict = "pass" | "fail";

/**
 * Returns the first line of `text` containing `marker`, or undefined. The match
 * is a case-sensitive substring test and scanning stops at the first hit.
 */
export function findMarkerLine(text: string, marker: string): string | undefined {
  let start = 0;
  for (;;) {
    const newline = text.indexOf("\n", start);
    const end = newline === -1 ? text.length : newline;
    const line = text.slice(start, end);
    if (line.includes(marker)) {
      return line.endsWith("\r") ? line.slice(0, -1) : line;
    }
    if (newline === -1) return undefined;
    start = newline + 1;
  }
}

/**
 * Only the marker signals failure: crashes, empty output and wrong but
 * marker-free output all classify as pass.
 */
export function classifyOutput(text: string, marker: string): Verdict {
  return findMarkerLine(text, marker) === undefined ? "pass" : "fail";
}
