/**
 * Description of pending repository changes, as supplied by whoever inspects
 * the repository. commit-context never runs git itself.
 */
export interface ChangeDescription {
  branch: string;
  /** Changed paths in `git status` order, without duplicates */
  changedFiles: readonly string[];
  /** `git status --short` output */
  statusShort: string;
  stagedDiff: string;
  unstagedDiff: string;
  /** `git ls-files --others --exclude-standard` output */
  untrackedFiles: string;
  /** Recent commit subject lines, newest first */
  recentCommits: string;
}

/**
 * Section titles in priority order. Earlier sections are never sacrificed
 * to make room for later ones.
 */
export const SECTION_TITLES = [
  "Branch",
  "Changed Files",
  "Working Tree Status",
  "Staged Diff",
  "Unstaged Diff",
  "Untracked Files",
  "Recent Commit Subjects",
] as const;

export type SectionTitle = (typeof SECTION_TITLES)[number];

/**
 * One droppable block of context. A null title marks text that was already
 * rendered (e.g. a previous context fed back in) and is emitted as is.
 */
export interface Section {
  title: SectionTitle | null;
  content: string;
}

/**
 * Remove duplicate paths, keeping the first occurrence
 */
export function dedupePaths(paths: readonly string[]): string[] {
  return Array.from(new Set(paths));
}

/**
 * Split a change description into sections, in priority order
 */
export function buildSections(change: ChangeDescription): Section[] {
  const changedFiles = dedupePaths(change.changedFiles)
    .map((file) => `- ${file}`)
    .join("\n");

  return [
    { title: "Branch", content: change.branch },
    { title: "Changed Files", content: changedFiles },
    { title: "Working Tree Status", content: change.statusShort },
    { title: "Staged Diff", content: change.stagedDiff },
    { title: "Unstaged Diff", content: change.unstagedDiff },
    { title: "Untracked Files", content: change.untrackedFiles },
    { title: "Recent Commit Subjects", content: change.recentCommits },
  ];
}
