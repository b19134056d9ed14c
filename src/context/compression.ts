import { InvalidTokenBudgetError } from "../errors.js";
import { Section, SectionTitle } from "./change.js";
import { DIFF_WINDOW_SCHEDULE, DiffWindow, windowDiff } from "./diff-window.js";
import { charLength, renderSections } from "./render.js";

/**
 * Sections removed first when the context is over its token budget
 */
export const DROPPABLE_SECTIONS = [
  "Untracked Files",
  "Recent Commit Subjects",
] as const;

export type DroppableSection = (typeof DROPPABLE_SECTIONS)[number];

/**
 * Sections narrowed by head/tail windowing
 */
export const DIFF_SECTIONS = ["Staged Diff", "Unstaged Diff"] as const;

export type CompressionStage =
  | { kind: "drop-section"; section: DroppableSection }
  | { kind: "window-diffs"; headLines: number; tailLines: number }
  | { kind: "hard-truncate" };

/**
 * Token counting needed by the pipeline (satisfied by TokenCounter)
 */
export interface ContextTokenCounter {
  count(text: string): number;
  truncate(text: string, maxTokens: number): string;
}

export interface StageRecord {
  stage: CompressionStage;
  /** Token count of the context once this stage has run */
  contextTokens: number;
  /** Length of the context in code points once this stage has run */
  contextChars: number;
  /**
   * False when the stage's re-render came out larger and was discarded, in
   * which case the counts are those of the unchanged context
   */
  adopted: boolean;
}

export interface CompressionResult {
  /** Context before any stage ran */
  initialContext: string;
  context: string;
  tokensBefore: number;
  tokensAfter: number;
  tokenLimit: number | null;
  /** Every stage that ran, including any whose output was discarded */
  stages: CompressionStage[];
  trail: StageRecord[];
}

export interface CompressOptions {
  maxChars: number;
  /** Token budget; when absent the context is only measured */
  maxTokens?: number;
  counter: ContextTokenCounter;
  /** Diff window sizes, generous first */
  schedule?: readonly DiffWindow[];
}

/**
 * Stable identifier for a stage, safe to join into an audit line
 */
export function stageId(stage: CompressionStage): string {
  switch (stage.kind) {
    case "drop-section":
      return `drop_${stage.section.toLowerCase().replace(/ /g, "_")}`;
    case "window-diffs":
      return `compress_diffs_head${stage.headLines}_tail${stage.tailLines}`;
    case "hard-truncate":
      return "hard_token_truncate";
  }
}

/**
 * Reject token budgets that are not positive integers
 */
export function assertTokenBudget(maxTokens: number): void {
  if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
    throw new InvalidTokenBudgetError(maxTokens);
  }
}

function contentOf(sections: readonly Section[], title: SectionTitle): string {
  return sections.find((section) => section.title === title)?.content ?? "";
}

function withContent(
  sections: readonly Section[],
  title: SectionTitle,
  content: string
): Section[] {
  return sections.map((section) =>
    section.title === title ? { ...section, content } : section
  );
}

/**
 * Shrink rendered sections until they fit `maxTokens`.
 *
 * Stages run in a fixed order and stop as soon as the budget is met:
 * drop low-value sections, window the diffs at decreasing sizes, then cut
 * the context at the token level. A re-render only replaces the current
 * context when it is no longer and no larger in tokens, so the trail never
 * grows.
 */
export function compressSections(
  sections: readonly Section[],
  options: CompressOptions
): CompressionResult {
  const { maxChars, maxTokens, counter } = options;
  const schedule = options.schedule ?? DIFF_WINDOW_SCHEDULE;

  if (maxTokens !== undefined) {
    assertTokenBudget(maxTokens);
  }

  let working: Section[] = sections.map((section) => ({ ...section }));
  const initialContext = renderSections(working, maxChars);
  const tokensBefore = counter.count(initialContext);

  let context = initialContext;
  let tokens = tokensBefore;
  const trail: StageRecord[] = [];

  const result = (): CompressionResult => ({
    initialContext,
    context,
    tokensBefore,
    tokensAfter: tokens,
    tokenLimit: maxTokens ?? null,
    stages: trail.map((record) => record.stage),
    trail,
  });

  if (maxTokens === undefined || tokens <= maxTokens) {
    return result();
  }

  const record = (stage: CompressionStage, candidate: string): void => {
    const candidateTokens = counter.count(candidate);
    const adopted =
      candidateTokens <= tokens && charLength(candidate) <= charLength(context);
    if (adopted) {
      context = candidate;
      tokens = candidateTokens;
    }
    trail.push({ stage, contextTokens: tokens, contextChars: charLength(context), adopted });
  };

  // 1. Drop low-value sections one at a time
  for (const section of DROPPABLE_SECTIONS) {
    if (!contentOf(working, section).trim()) {
      continue;
    }
    working = withContent(working, section, "");
    record({ kind: "drop-section", section }, renderSections(working, maxChars));
    if (tokens <= maxTokens) {
      return result();
    }
  }

  // 2. Window the diffs, always from their original text so the
  //    omitted-line counts stay accurate
  const originalDiffs = DIFF_SECTIONS.map(
    (title) => [title, contentOf(sections, title)] as const
  );
  for (const { headLines, tailLines } of schedule) {
    let changed = false;
    for (const [title, original] of originalDiffs) {
      const windowed = windowDiff(original, headLines, tailLines);
      if (windowed !== contentOf(working, title)) {
        working = withContent(working, title, windowed);
        changed = true;
      }
    }
    if (!changed) {
      continue;
    }

    record(
      { kind: "window-diffs", headLines, tailLines },
      renderSections(working, maxChars)
    );
    if (tokens <= maxTokens) {
      return result();
    }
  }

  // 3. Nothing structural left: cut at the token level
  context = counter.truncate(context, maxTokens);
  tokens = counter.count(context);
  trail.push({
    stage: { kind: "hard-truncate" },
    contextTokens: tokens,
    contextChars: charLength(context),
    adopted: true,
  });
  return result();
}
