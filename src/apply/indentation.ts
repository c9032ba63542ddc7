/**
 * Indentation Resolver
 *
 * The indentation convention is inferred per edit site, not per project.
 * Policy for the next level: any tab in the prefix means tabs; a prefix whose
 * width is a multiple of 2 but not of 4 means 2-space steps; everything else,
 * including an empty prefix, means 4-space steps. Files that mix 2- and
 * 4-space blocks get whichever step matches the local prefix.
 */

export function extractIndent(line: string): string {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0] : '';
}

export function nestIndent(prefix: string): string {
  if (prefix.includes('\t')) return `${prefix}\t`;
  if (prefix.length > 0 && prefix.length % 2 === 0 && prefix.length % 4 !== 0) {
    return `${prefix}  `;
  }
  return `${prefix}    `;
}

/** Column limit for rendered documentation, indentation included. */
export const MAX_LINE_LENGTH = 79;

/**
 * Greedy word wrap to `width` columns. A word longer than `width` gets a
 * line of its own rather than being split.
 */
export function wrapWords(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = '';
  for (const word of text.split(/\s+/)) {
    if (word === '') continue;
    if (current === '') {
      current = word;
    } else if (current.length + 1 + word.length > width) {
      lines.push(current);
      current = word;
    } else {
      current += ` ${word}`;
    }
  }
  if (current !== '') lines.push(current);
  return lines;
}

/**
 * Wrap one line at `max` columns; continuation lines keep its indentation.
 */
export function wrapLine(line: string, max = MAX_LINE_LENGTH): string[] {
  if (line.length <= max) return [line];
  const indent = extractIndent(line);
  return wrapWords(line.slice(indent.length), max - indent.length).map(part => `${indent}${part}`);
}
