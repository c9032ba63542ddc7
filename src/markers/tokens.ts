export type MarkerCategory = 'module' | 'class' | 'function' | 'comment';

export const MARKER_CATEGORIES: readonly MarkerCategory[] = ['module', 'class', 'function', 'comment'];

export const MARKER_TOKENS: Record<MarkerCategory, { start: string; end: string }> = {
  module: { start: '# @llm-module-start', end: '# @llm-module-end' },
  class: { start: '# @llm-class-start', end: '# @llm-class-end' },
  function: { start: '# @llm-doc-start', end: '# @llm-doc-end' },
  comment: { start: '# @llm-comm-start', end: '# @llm-comm-end' },
};

export type MarkerLine = { category: MarkerCategory; edge: 'start' | 'end'; indent: string };

/**
 * Match a delimiter line. Only leading whitespace and one trailing CR may
 * surround the token.
 */
export function parseMarkerLine(line: string): MarkerLine | null {
  const body = line.endsWith('\r') ? line.slice(0, -1) : line;
  const stripped = body.trimStart();
  if (!stripped.startsWith('# @llm-')) return null;
  const indent = body.slice(0, body.length - stripped.length);
  if (/[^ \t]/.test(indent)) return null;

  for (const category of MARKER_CATEGORIES) {
    const tokens = MARKER_TOKENS[category];
    if (stripped === tokens.start) return { category, edge: 'start', indent };
    if (stripped === tokens.end) return { category, edge: 'end', indent };
  }
  return null;
}

export function isMarkerLine(line: string): boolean {
  return parseMarkerLine(line) !== null;
}
