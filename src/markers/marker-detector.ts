/**
 * Marker Detector
 *
 * Pairs start/end delimiter comments into blocks with 1-indexed coordinates.
 * Pairing follows a single stack: a block must close before anything opened
 * after it, and both delimiters must carry the same indentation.
 *
 * The detector exposes documentation facts (absent, placeholder, present);
 * it does not decide what work follows from them.
 */

import { basename, extname } from 'path';
import { MarkerImbalanceError, MissingDefinitionError } from '../errors.js';
import { MARKER_TOKENS, parseMarkerLine, type MarkerCategory } from './tokens.js';
import {
  classifyDoc,
  commentText,
  findCommentRun,
  findDocLiteral,
  findFirstStatement,
  findHeaderEnd,
  isBlank,
  isComment,
  parseDefinition,
  type DocState,
} from './doc-literal.js';

export interface MarkerBlock {
  filePath: string;
  category: MarkerCategory;
  startLine: number;    // line of the start delimiter
  endLine: number;      // line of the end delimiter
  indent: string;       // shared by both delimiters
  text: string;         // lines strictly between the delimiters
  name: string;
  anchorLine: number;   // definition line, annotated code line, or start delimiter for modules
  doc: DocState;
}

export interface DetectionResult {
  blocks: MarkerBlock[];
  issues: Array<MarkerImbalanceError | MissingDefinitionError>;
}

interface OpenMarker {
  category: MarkerCategory;
  indent: string;
  index: number;  // 0-based line index of the start delimiter
}

/**
 * Detect every well-formed block and report the rest as issues.
 */
export function detectMarkers(content: string, filePath: string): DetectionResult {
  const lines = content.split('\n');
  const blocks: MarkerBlock[] = [];
  const issues: DetectionResult['issues'] = [];
  const stack: OpenMarker[] = [];

  const unclosed = (open: OpenMarker, reason: string) => {
    issues.push(new MarkerImbalanceError(
      `${MARKER_TOKENS[open.category].start} ${reason}`,
      filePath,
      open.index + 1,
    ));
  };

  for (let i = 0; i < lines.length; i++) {
    const marker = parseMarkerLine(lines[i]);
    if (!marker) continue;

    if (marker.edge === 'start') {
      const duplicate = stack.findIndex(
        open => open.category === marker.category && open.indent === marker.indent,
      );
      if (duplicate !== -1) {
        unclosed(stack[duplicate], `is reopened at line ${i + 1} before being closed`);
        stack.splice(duplicate, 1);
      }
      stack.push({ category: marker.category, indent: marker.indent, index: i });
      continue;
    }

    let matchIdx = -1;
    for (let s = stack.length - 1; s >= 0; s--) {
      if (stack[s].category === marker.category && stack[s].indent === marker.indent) {
        matchIdx = s;
        break;
      }
    }

    if (matchIdx === -1) {
      const top = stack[stack.length - 1];
      if (top && top.category === marker.category) {
        stack.pop();
        issues.push(new MarkerImbalanceError(
          `${MARKER_TOKENS[marker.category].end} indentation does not match its start at line ${top.index + 1}`,
          filePath,
          i + 1,
        ));
      } else {
        issues.push(new MarkerImbalanceError(
          `${MARKER_TOKENS[marker.category].end} has no matching start`,
          filePath,
          i + 1,
        ));
      }
      continue;
    }

    for (const open of stack.splice(matchIdx + 1)) {
      unclosed(open, `is not closed before line ${i + 1}`);
    }
    const open = stack.pop();
    if (!open) continue;

    const built = buildBlock(lines, filePath, open, i);
    if (built instanceof MissingDefinitionError) issues.push(built);
    else blocks.push(built);
  }

  for (const open of stack) {
    unclosed(open, 'is never closed');
  }

  blocks.sort((a, b) => a.startLine - b.startLine);
  issues.sort((a, b) => a.line - b.line);
  return { blocks, issues };
}

/**
 * Strict form: throws the first issue found.
 */
export function detectBlocks(content: string, filePath: string): MarkerBlock[] {
  const { blocks, issues } = detectMarkers(content, filePath);
  if (issues.length > 0) throw issues[0];
  return blocks;
}

/**
 * Rebuild the block's source lines, delimiters included.
 */
export function serializeBlock(block: MarkerBlock): string {
  const tokens = MARKER_TOKENS[block.category];
  const parts = [`${block.indent}${tokens.start}`];
  if (block.endLine - block.startLine > 1) parts.push(block.text);
  parts.push(`${block.indent}${tokens.end}`);
  return parts.join('\n');
}

function buildBlock(
  lines: string[],
  filePath: string,
  open: OpenMarker,
  endIdx: number,
): MarkerBlock | MissingDefinitionError {
  const base = {
    filePath,
    category: open.category,
    startLine: open.index + 1,
    endLine: endIdx + 1,
    indent: open.indent,
    text: lines.slice(open.index + 1, endIdx).join('\n'),
  };

  switch (open.category) {
    case 'module': {
      const first = findFirstStatement(lines);
      const literal = first === -1 ? null : findDocLiteral(lines, first);
      return {
        ...base,
        name: basename(filePath, extname(filePath)),
        anchorLine: open.index + 1,
        doc: classifyDoc(literal ? literal.content : null),
      };
    }

    case 'class':
    case 'function': {
      for (let i = open.index + 1; i < endIdx; i++) {
        const def = parseDefinition(lines[i]);
        if (!def) continue;
        if (def.kind !== open.category) break;
        const headerEnd = findHeaderEnd(lines, i, endIdx);
        const literal = findDocLiteral(lines, headerEnd + 1, endIdx);
        return {
          ...base,
          name: def.name,
          anchorLine: i + 1,
          doc: classifyDoc(literal ? literal.content : null),
        };
      }
      const expected = open.category === 'class' ? 'class' : 'def';
      return new MissingDefinitionError(
        `${MARKER_TOKENS[open.category].start} block has no ${expected} definition`,
        filePath,
        open.index + 1,
      );
    }

    case 'comment': {
      for (let i = open.index + 1; i < endIdx; i++) {
        if (isBlank(lines[i]) || isComment(lines[i])) continue;
        const run = findCommentRun(lines, i, open.index + 1);
        return {
          ...base,
          name: `block_${open.index + 1}`,
          anchorLine: i + 1,
          doc: classifyDoc(run ? commentText(lines, run) : null),
        };
      }
      return new MissingDefinitionError(
        `${MARKER_TOKENS.comment.start} block has no code line`,
        filePath,
        open.index + 1,
      );
    }
  }
}
