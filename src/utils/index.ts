/**
 * Utility functions for talkdeck
 */

/**
 * Escape HTML entities
 */
export function escapeHtml(text: string): string {
  const htmlEntities: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
  };
  return text.replace(/[&<>"']/g, (char) => htmlEntities[char] ?? char);
}

/**
 * Width of a run of leading whitespace, with tabs advancing to the next tab stop
 */
export function indentWidth(whitespace: string, tabWidth: number): number {
  let width = 0;
  for (const char of whitespace) {
    if (char === '\t') {
      width += tabWidth - (width % tabWidth);
    } else {
      width++;
    }
  }
  return width;
}

/**
 * Remove the leading whitespace every non-empty line shares.
 * Lines are otherwise returned byte for byte.
 */
export function dedentLines(lines: readonly string[]): string[] {
  let common: string | null = null;
  for (const line of lines) {
    if (line.trim() === '') continue;
    const leading = /^[ \t]*/.exec(line)?.[0] ?? '';
    if (common === null) {
      common = leading;
      continue;
    }
    let i = 0;
    while (i < common.length && i < leading.length && common[i] === leading[i]) {
      i++;
    }
    common = common.slice(0, i);
  }

  const prefix = common ?? '';
  return lines.map((line) =>
    line.startsWith(prefix) ? line.slice(prefix.length) : line.trimStart(),
  );
}
