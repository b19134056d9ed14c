import { Section } from "./change.js";

export const TRUNCATION_MARKER = "...[truncated]";

/** Characters held back from a cut section so the marker still fits */
export const MARKER_RESERVE = 20;

/**
 * Upper bound on how far a rendered context may exceed its character budget.
 * The reserve covers the marker, so the bound is currently zero; callers
 * should still use this rather than assume it.
 */
export const MARKER_OVERHEAD = Math.max(
  0,
  TRUNCATION_MARKER.length + 1 - MARKER_RESERVE
);

/**
 * Length in code points, the unit `maxChars` is measured in. Astral
 * characters such as emoji count once and are never split.
 */
export function charLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Render a single section, or "" when it has nothing to say
 */
export function renderSection(section: Section): string {
  const content = section.content.trim();
  if (!content) {
    return "";
  }
  if (section.title === null) {
    return `${content}\n`;
  }
  return `## ${section.title}\n${content}\n`;
}

/**
 * Render sections in order within `maxChars` code points.
 *
 * Sections are added whole while they fit. The first one that doesn't is cut
 * and followed by TRUNCATION_MARKER, and nothing after it is considered.
 */
export function renderSections(
  sections: readonly Section[],
  maxChars: number
): string {
  const parts: string[] = [];
  let used = 0;

  for (const section of sections) {
    const rendered = renderSection(section);
    if (!rendered) {
      continue;
    }

    const remaining = maxChars - used;
    if (remaining <= 0) {
      break;
    }

    const chars = Array.from(rendered);
    if (chars.length <= remaining) {
      parts.push(rendered);
      used += chars.length;
      continue;
    }

    const head = chars.slice(0, Math.max(0, remaining - MARKER_RESERVE)).join("");
    if (head) {
      parts.push(`${head.trimEnd()}\n${TRUNCATION_MARKER}\n`);
    }
    break;
  }

  return parts
    .map((part) => part.trimEnd())
    .join("\n")
    .trim();
}
