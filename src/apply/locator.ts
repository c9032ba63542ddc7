/**
 * Edit-site locator
 *
 * Re-finds the construct a task points at in freshly read lines and decides
 * where its documentation goes. Searches are bounded by the anchor line:
 * the walk upward from the anchor is O(anchor line) at worst.
 */

import { TargetNotFoundError } from '../errors.js';
import { parseMarkerLine, MARKER_TOKENS, type MarkerCategory } from '../markers/tokens.js';
import {
  findCommentRun,
  findDocLiteral,
  findFirstStatement,
  findHeaderEnd,
  isBlank,
  isComment,
  opensBlock,
  parseDefinition,
  type DefinitionKind,
} from '../markers/doc-literal.js';
import { extractIndent, nestIndent } from './indentation.js';

/** Replace `deleteCount` lines at 0-based `start`; 0 means insert. */
export interface EditSite {
  start: number;
  deleteCount: number;
  indent: string;
}

export interface LocateTarget {
  category: MarkerCategory;
  lineNumber: number;
  markerText: string;
  scopeName: string;
}

export function locate(lines: string[], target: LocateTarget): EditSite {
  switch (target.category) {
    case 'module':
      return locateModule(lines);
    case 'class':
    case 'function':
      return locateDefinition(lines, target, target.category);
    case 'comment':
      return locateComment(lines, target);
  }
}

/**
 * The module docstring is the first statement of the file.
 */
export function locateModule(lines: string[]): EditSite {
  const hasMarker = lines.some(line => {
    const marker = parseMarkerLine(line);
    return marker?.category === 'module' && marker.edge === 'start';
  });
  if (!hasMarker) {
    throw new TargetNotFoundError(`${MARKER_TOKENS.module.start} is no longer in the file`);
  }

  const first = findFirstStatement(lines);
  if (first === -1) {
    const end = lines.length > 0 && lines[lines.length - 1] === '' ? lines.length - 1 : lines.length;
    return { start: end, deleteCount: 0, indent: '' };
  }
  const literal = findDocLiteral(lines, first);
  if (literal) return { start: literal.start, deleteCount: literal.end - literal.start + 1, indent: '' };

  // Stay above delimiters that open blocks around the first statement.
  let start = first;
  while (start > 0) {
    const marker = parseMarkerLine(lines[start - 1]);
    if (!marker || marker.edge !== 'start' || marker.category === 'module') break;
    start--;
  }
  return { start, deleteCount: 0, indent: '' };
}

/**
 * Walk up from the anchor to the nearest `def`/`class` of the right kind at
 * the marker's indentation. Deeper lines are skipped; a shallower statement
 * or the block's own start delimiter ends the search.
 */
export function locateDefinition(lines: string[], target: LocateTarget, kind: DefinitionKind): EditSite {
  const markerIndent = extractIndent(target.markerText);
  const anchor = target.lineNumber - 1;
  if (anchor < 0 || anchor >= lines.length) {
    throw new TargetNotFoundError(`Line ${target.lineNumber} is past the end of the file`);
  }

  const keyword = kind === 'class' ? 'class' : 'def';
  for (let i = anchor; i >= 0; i--) {
    const line = lines[i];
    if (isBlank(line)) continue;

    const marker = parseMarkerLine(line);
    if (marker) {
      if (marker.category === kind && marker.edge === 'start' && marker.indent === markerIndent) break;
      continue;
    }
    if (isComment(line)) continue;

    const indent = extractIndent(line);
    if (indent !== markerIndent) {
      if (indent.length > markerIndent.length && indent.startsWith(markerIndent)) continue;
      break;
    }

    const def = parseDefinition(line);
    if (!def || def.kind !== kind) continue;
    if (def.name !== target.scopeName) {
      throw new TargetNotFoundError(
        `Expected ${keyword} ${target.scopeName} above line ${target.lineNumber}, found ${def.name} at line ${i + 1}`,
      );
    }
    return definitionSite(lines, i, target);
  }

  throw new TargetNotFoundError(`No ${keyword} ${target.scopeName} found above line ${target.lineNumber}`);
}

function definitionSite(lines: string[], defIdx: number, target: LocateTarget): EditSite {
  const headerEnd = findHeaderEnd(lines, defIdx);
  if (!opensBlock(lines[headerEnd])) {
    throw new TargetNotFoundError(`${target.scopeName} at line ${defIdx + 1} has its body on the header line`);
  }

  const defIndent = extractIndent(lines[defIdx]);
  const literal = findDocLiteral(lines, headerEnd + 1);
  const indent = bodyIndent(lines, headerEnd + 1, defIndent) ?? nestIndent(defIndent);
  if (literal) return { start: literal.start, deleteCount: literal.end - literal.start + 1, indent };
  return { start: headerEnd + 1, deleteCount: 0, indent };
}

/**
 * Indentation of the first body statement, when it is deeper than the
 * header. A docstring at any other depth would not parse.
 */
function bodyIndent(lines: string[], from: number, defIndent: string): string | null {
  for (let i = from; i < lines.length; i++) {
    if (isBlank(lines[i]) || isComment(lines[i])) continue;
    const indent = extractIndent(lines[i]);
    return indent.length > defIndent.length && indent.startsWith(defIndent) ? indent : null;
  }
  return null;
}

/**
 * The anchor must be a code line whose run of comments and blank lines
 * leads straight up to the comment start delimiter.
 */
export function locateComment(lines: string[], target: LocateTarget): EditSite {
  const anchor = target.lineNumber - 1;
  if (anchor < 0 || anchor >= lines.length || isBlank(lines[anchor]) || isComment(lines[anchor])) {
    throw new TargetNotFoundError(`Line ${target.lineNumber} is no longer a code line`);
  }

  let j = anchor - 1;
  while (j >= 0 && (isBlank(lines[j]) || (isComment(lines[j]) && !parseMarkerLine(lines[j])))) j--;
  const marker = j >= 0 ? parseMarkerLine(lines[j]) : null;
  const markerIndent = extractIndent(target.markerText);
  if (!marker || marker.category !== 'comment' || marker.edge !== 'start' || marker.indent !== markerIndent) {
    throw new TargetNotFoundError(`Line ${target.lineNumber} is not directly under ${MARKER_TOKENS.comment.start}`);
  }

  const indent = extractIndent(lines[anchor]);
  const run = findCommentRun(lines, anchor, j + 1);
  if (run) return { start: run.start, deleteCount: run.end - run.start + 1, indent };
  return { start: anchor, deleteCount: 0, indent };
}
