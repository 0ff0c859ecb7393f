/**
 * Rendering of content matches as numbered text lines.
 *
 * @module tools/format-matches
 */

import type { LineRecord, MatchBlock } from "../core/types.js";

/** Markers wrapped around matched segments in highlight mode */
export const HIGHLIGHT_OPEN = "**";
export const HIGHLIGHT_CLOSE = "**";

/**
 * Concatenate the segments of one line, wrapping matches when highlighting.
 *
 * @returns The line text, or null when the line has no segments
 */
function renderLine(record: LineRecord, highlight: boolean): string | null {
  const segments = record.segments ?? [];
  if (segments.length === 0) {
    return null;
  }

  let text = "";
  for (const segment of segments) {
    const segmentText = segment.text ?? "";
    if (highlight && segment.match === true) {
      text += `${HIGHLIGHT_OPEN}${segmentText}${HIGHLIGHT_CLOSE}`;
    } else {
      text += segmentText;
    }
  }
  return text;
}

/**
 * Flatten match blocks into "Line {n}: {text}" lines.
 *
 * Lines with no segments, or whose text is blank, are left out. Order
 * follows the blocks and the lines within them.
 *
 * @param contentMatches - The `content_matches` of one search result
 * @param highlight - Wrap segments flagged `match: true` in `**`
 * @returns Newline-joined lines, or "" when none survive
 *
 * @example
 * formatMatches([{ lines: [{ line: 3, segments: [
 *   { text: "def " }, { text: "foo", match: true }, { text: "():" },
 * ] }] }], true)
 * // => "Line 3: def **foo**():"
 */
export function formatMatches(contentMatches: MatchBlock[], highlight: boolean = false): string {
  const formattedLines: string[] = [];

  for (const block of contentMatches) {
    for (const record of block.lines ?? []) {
      const text = renderLine(record, highlight);
      if (text === null || text.trim() === "") {
        continue;
      }
      formattedLines.push(`Line ${record.line ?? ""}: ${text}`);
    }
  }

  return formattedLines.join("\n");
}
