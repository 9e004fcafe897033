/**
 * Boilerplate Detector
 *
 * Finds short lines repeated verbatim across a high fraction of a document's
 * pages or slides (running headers, footers, watermarks) and removes them.
 *
 * @module services/dedup/boilerplate
 */

/** Lines longer than this are never treated as boilerplate (default) */
export const DEFAULT_BOILERPLATE_MAX_LINE_LENGTH = 120;

/**
 * Lines whose page frequency reaches minFraction.
 *
 * Each page contributes a line at most once. Lines are compared after
 * trimming; empty lines and lines over maxLineLength are ignored.
 */
export function findBoilerplate(
  pages: string[],
  minFraction: number,
  maxLineLength: number = DEFAULT_BOILERPLATE_MAX_LINE_LENGTH
): Set<string> {
  const total = Math.max(pages.length, 1);
  const pageCounts = new Map<string, number>();

  for (const page of pages) {
    const lines = new Set<string>();
    for (const raw of page.split(/\r\n|\r|\n/)) {
      const line = raw.trim();
      if (line.length > 0 && line.length <= maxLineLength) lines.add(line);
    }
    for (const line of lines) {
      pageCounts.set(line, (pageCounts.get(line) ?? 0) + 1);
    }
  }

  const boilerplate = new Set<string>();
  for (const [line, count] of pageCounts) {
    if (count / total >= minFraction) boilerplate.add(line);
  }
  return boilerplate;
}

/**
 * Remove boilerplate lines, keeping the remaining lines in order.
 * Blank lines are dropped along with them; text is returned as-is when the
 * set is empty.
 */
export function dropBoilerplate(text: string, boilerplate: ReadonlySet<string>): string {
  if (boilerplate.size === 0) return text;
  return text
    .split(/\r\n|\r|\n/)
    .filter((line) => {
      const trimmed = line.trim();
      return trimmed.length > 0 && !boilerplate.has(trimmed);
    })
    .join('\n');
}
