export interface DiffWindow {
  headLines: number;
  tailLines: number;
}

/**
 * Window sizes tried in order, from generous to aggressive
 */
export const DIFF_WINDOW_SCHEDULE: readonly DiffWindow[] = [
  { headLines: 120, tailLines: 40 },
  { headLines: 80, tailLines: 24 },
  { headLines: 40, tailLines: 12 },
  { headLines: 20, tailLines: 6 },
];

function splitLines(text: string): string[] {
  if (!text) {
    return [];
  }
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Keep the first `headLines` and last `tailLines` lines of a diff, replacing
 * the middle with a single marker line that says how many lines were dropped.
 * Text that is already short enough comes back unchanged.
 */
export function windowDiff(
  text: string,
  headLines: number,
  tailLines: number
): string {
  const lines = splitLines(text);
  if (lines.length <= headLines + tailLines + 1) {
    return text;
  }

  const head = lines.slice(0, headLines);
  const tail = tailLines > 0 ? lines.slice(-tailLines) : [];
  const omitted = lines.length - head.length - tail.length;

  return [
    ...head,
    `...[diff compressed: ${omitted} lines omitted]...`,
    ...tail,
  ].join("\n");
}
