/**
 * Doc Literal
 *
 * Line-level facts about existing documentation: where a triple-quoted
 * literal sits, where a definition header ends, and whether what is there
 * counts as real documentation. All indices are 0-based line indices.
 */

import { isMarkerLine } from './tokens.js';

export type DocState =
  | { kind: 'absent' }
  | { kind: 'placeholder'; content: string }
  | { kind: 'present'; content: string };

export interface LineSpan {
  start: number;
  end: number;  // inclusive
}

export interface DocLiteral extends LineSpan {
  content: string;
}

export type DefinitionKind = 'class' | 'function';

export interface Definition {
  kind: DefinitionKind;
  name: string;
}

export const PLACEHOLDER_TOKENS = new Set([
  'TODO',
  'TO DO',
  'TO_DO',
  'FIXME',
  'TO_REVIEW',
  'TO REVIEW',
  'PLACEHOLDER',
]);

const OPENING_QUOTE = /^[rRuU]?("""|''')/;
const FUNCTION_DEF = /^(?:async\s+)?def\s+([A-Za-z_]\w*)/;
const CLASS_DEF = /^class\s+([A-Za-z_]\w*)/;

export function isBlank(line: string): boolean {
  return line.trim() === '';
}

export function isComment(line: string): boolean {
  return line.trimStart().startsWith('#');
}

export function parseDefinition(line: string): Definition | null {
  const stripped = line.trimStart();
  const fn = FUNCTION_DEF.exec(stripped);
  if (fn) return { kind: 'function', name: fn[1] };
  const cls = CLASS_DEF.exec(stripped);
  if (cls) return { kind: 'class', name: cls[1] };
  return null;
}

/**
 * Last line of a definition header. Brackets opened on the `def`/`class`
 * line are followed until they balance, so multi-line signatures resolve to
 * the line carrying the closing `):`.
 */
export function findHeaderEnd(lines: string[], defIdx: number, limit = lines.length): number {
  let depth = 0;
  for (let i = defIdx; i < limit; i++) {
    for (const ch of codeOf(lines[i])) {
      if (ch === '(' || ch === '[' || ch === '{') depth++;
      else if (ch === ')' || ch === ']' || ch === '}') depth--;
    }
    if (depth <= 0) return i;
  }
  return defIdx;
}

/** True when the header line ends with `:` and has no body on the same line. */
export function opensBlock(headerLine: string): boolean {
  return codeOf(headerLine).trimEnd().endsWith(':');
}

/**
 * Find a triple-quoted literal starting at `from`, skipping blank lines.
 * Stops at the first other statement, at a marker line, or at `limit`.
 */
export function findDocLiteral(lines: string[], from: number, limit = lines.length): DocLiteral | null {
  let start = from;
  while (start < limit && isBlank(lines[start])) start++;
  if (start >= limit || isMarkerLine(lines[start])) return null;

  const opening = lines[start].trimStart();
  const match = OPENING_QUOTE.exec(opening);
  if (!match) return null;

  const quote = match[1];
  const rest = opening.slice(match[0].length);
  let end: number | null = null;
  if (rest.includes(quote)) {
    end = start;
  } else {
    for (let i = start + 1; i < limit; i++) {
      if (isMarkerLine(lines[i])) break;
      if (lines[i].includes(quote)) {
        end = i;
        break;
      }
    }
  }
  if (end === null) return null;

  return { start, end, content: literalContent(lines.slice(start, end + 1).join('\n'), quote) };
}

/** First line that is neither blank nor a comment, or -1. */
export function findFirstStatement(lines: string[], from = 0, limit = lines.length): number {
  for (let i = from; i < limit; i++) {
    if (!isBlank(lines[i]) && !isComment(lines[i])) return i;
  }
  return -1;
}

/**
 * Contiguous run of plain `#` comment lines directly above `codeIdx`.
 * Marker lines and blank lines end the run; `floor` bounds it from below.
 */
export function findCommentRun(lines: string[], codeIdx: number, floor = 0): LineSpan | null {
  let start = codeIdx;
  while (start - 1 >= floor && isComment(lines[start - 1]) && !isMarkerLine(lines[start - 1])) {
    start--;
  }
  return start === codeIdx ? null : { start, end: codeIdx - 1 };
}

export function commentText(lines: string[], span: LineSpan): string {
  return lines
    .slice(span.start, span.end + 1)
    .map(line => line.trimStart().replace(/^#\s?/, '').trimEnd())
    .join('\n')
    .trim();
}

export function classifyDoc(content: string | null): DocState {
  if (content === null) return { kind: 'absent' };
  const bare = content.replace(/^["'\s]+|["'\s]+$/g, '');
  if (bare === '' || PLACEHOLDER_TOKENS.has(bare.toUpperCase())) {
    return { kind: 'placeholder', content };
  }
  return { kind: 'present', content };
}

function literalContent(text: string, quote: string): string {
  const trimmed = text.trim().replace(OPENING_QUOTE, '');
  const body = trimmed.endsWith(quote) ? trimmed.slice(0, -quote.length) : trimmed;
  return body.trim();
}

/**
 * The line with string literal contents and any trailing comment removed.
 * Quotes stay so the result keeps its shape; `#` and brackets inside strings
 * do not count.
 */
export function codeOf(line: string): string {
  let out = '';
  let quote: string | null = null;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) {
        quote = null;
        out += ch;
      }
      continue;
    }
    if (ch === '#') break;
    if (ch === '"' || ch === "'") quote = ch;
    out += ch;
  }
  return out;
}
