/**
 * Suggestion Formatter
 *
 * Turns the suggestion string stored on a task into a tagged variant, and the
 * variant into source lines. Suggestions are either JSON matching the task's
 * schema or free text.
 */

import { z } from 'zod';
import { InvalidSuggestionError } from '../errors.js';
import type { MarkerCategory } from '../markers/tokens.js';
import { categoryOf, modeOf, type TaskKind } from '../state/task.js';
import { MAX_LINE_LENGTH, nestIndent, wrapLine, wrapWords } from './indentation.js';

const entrySchema = z.object({
  name: z.string().min(1),
  type: z.string().optional(),
  description: z.string(),
});

const raisesSchema = z.object({
  exception: z.string().min(1),
  description: z.string(),
});

const moduleSchema = z.object({
  summary: z.string().min(1),
  description: z.string().optional(),
  usage: z.string().optional(),
  notes: z.string().optional(),
});

const classSchema = z.object({
  summary: z.string().min(1),
  description: z.string().optional(),
  attributes: z.array(entrySchema).default([]),
  example: z.string().optional(),
  notes: z.string().optional(),
});

const functionSchema = z.object({
  summary: z.string().min(1),
  description: z.string().optional(),
  args: z.array(entrySchema).default([]),
  returns: z.object({ type: z.string().optional(), description: z.string() }).optional(),
  raises: z.array(raisesSchema).default([]),
  example: z.string().optional(),
});

const commentSchema = z.object({
  comment: z.string().min(1),
});

const validationSchema = z.object({
  valid: z.boolean(),
  issues: z.array(z.string()).default([]),
  improvedContent: z.string().optional(),
});

export type DocEntry = z.infer<typeof entrySchema>;

export type DocSuggestion =
  | ({ kind: 'module' } & z.infer<typeof moduleSchema>)
  | ({ kind: 'class' } & z.infer<typeof classSchema>)
  | ({ kind: 'function' } & z.infer<typeof functionSchema>)
  | { kind: 'comment'; text: string }
  | { kind: 'text'; category: Exclude<MarkerCategory, 'comment'>; text: string };

/** One docstring line; depth 1 sits one level under its section header. */
interface DocLine {
  depth: number;
  text: string;
}

const SECTION_HEADERS = [
  'Args:',
  'Arguments:',
  'Attributes:',
  'Returns:',
  'Return:',
  'Yields:',
  'Raises:',
  'Note:',
  'Notes:',
  'Example:',
  'Examples:',
  'Typical usage example:',
  'See Also:',
  'Warning:',
  'Warnings:',
  'Todo:',
];

/**
 * Parse the stored suggestion for a task of `kind`.
 * Returns null for a validation that found nothing to change.
 */
export function parseSuggestion(kind: TaskKind, raw: string): DocSuggestion | null {
  const text = raw.trim();
  if (text === '') throw new InvalidSuggestionError('Suggestion is empty');

  const category = categoryOf(kind);
  const json = parseJsonObject(text);
  if (json === undefined) return freeText(category, text);

  if (modeOf(kind) === 'validate') {
    const result = validationSchema.safeParse(json);
    if (result.success) {
      const improved = result.data.improvedContent?.trim();
      if (improved) return freeText(category, improved);
      if (result.data.valid) return null;
      const issues = result.data.issues.length > 0 ? `: ${result.data.issues.join('; ')}` : '';
      throw new InvalidSuggestionError(`Validation reported problems but no improved content${issues}`);
    }
  }

  switch (category) {
    case 'module':
      return { kind: 'module', ...validate(moduleSchema, json, kind) };
    case 'class':
      return { kind: 'class', ...validate(classSchema, json, kind) };
    case 'function':
      return { kind: 'function', ...validate(functionSchema, json, kind) };
    case 'comment':
      return { kind: 'comment', text: validate(commentSchema, json, kind).comment };
  }
}

/**
 * Docstring lines at `indent`, quotes on their own lines. Lines longer than
 * 79 columns wrap at the same depth.
 */
export function renderDocstring(suggestion: Exclude<DocSuggestion, { kind: 'comment' }>, indent: string): string[] {
  const levels = [indent, nestIndent(indent)];
  const body = docLines(suggestion).flatMap(line => {
    if (line.text === '') return [''];
    return wrapLine(`${levels[Math.min(line.depth, levels.length - 1)]}${line.text}`);
  });
  return [`${indent}"""`, ...body, `${indent}"""`];
}

/**
 * `#` comment lines at `indent`, wrapped at 79 columns. Blank lines become
 * a bare `#`.
 */
export function renderComment(text: string, indent: string): string[] {
  const width = MAX_LINE_LENGTH - indent.length - 2;
  return trimBlankEdges(text.split(/\r?\n/).map(line => line.trim().replace(/^#\s?/, '').trimEnd())).flatMap(line =>
    line === '' ? [`${indent}#`] : wrapWords(line, width).map(part => `${indent}# ${part}`),
  );
}

function docLines(suggestion: Exclude<DocSuggestion, { kind: 'comment' }>): DocLine[] {
  switch (suggestion.kind) {
    case 'text':
      return sectionLines(suggestion.text);

    case 'module':
      return [
        ...paragraph(suggestion.summary),
        ...optionalParagraph(suggestion.description),
        ...section('Typical usage example:', suggestion.usage),
        ...section('Note:', suggestion.notes),
      ];

    case 'class':
      return [
        ...paragraph(suggestion.summary),
        ...optionalParagraph(suggestion.description),
        ...entries('Attributes:', suggestion.attributes.map(formatEntry)),
        ...section('Example:', suggestion.example),
        ...section('Note:', suggestion.notes),
      ];

    case 'function': {
      const returns = suggestion.returns;
      return [
        ...paragraph(suggestion.summary),
        ...optionalParagraph(suggestion.description),
        ...entries('Args:', suggestion.args.map(formatEntry)),
        ...entries('Returns:', returns ? [returns.type ? `${returns.type}: ${returns.description}` : returns.description] : []),
        ...entries('Raises:', suggestion.raises.map(r => `${r.exception}: ${r.description}`)),
        ...section('Example:', suggestion.example),
      ];
    }
  }
}

/**
 * Free text: every line loses its own indentation, and lines after a
 * section header are nested under it.
 */
function sectionLines(text: string): DocLine[] {
  let inSection = false;
  const lines = trimBlankEdges(stripQuotes(text).split(/\r?\n/).map(line => line.trim()));
  return lines.map(line => {
    if (line === '') return { depth: 0, text: '' };
    if (SECTION_HEADERS.some(header => line.startsWith(header))) {
      inSection = true;
      return { depth: 0, text: line };
    }
    return { depth: inSection ? 1 : 0, text: line };
  });
}

function paragraph(text: string): DocLine[] {
  return text
    .trim()
    .split(/\r?\n/)
    .map(line => ({ depth: 0, text: line.trim() }));
}

function optionalParagraph(text: string | undefined): DocLine[] {
  return text?.trim() ? [{ depth: 0, text: '' }, ...paragraph(text)] : [];
}

function section(header: string, text: string | undefined): DocLine[] {
  if (!text?.trim()) return [];
  return entries(header, [text.trim()]);
}

function entries(header: string, items: string[]): DocLine[] {
  if (items.length === 0) return [];
  const lines: DocLine[] = [{ depth: 0, text: '' }, { depth: 0, text: header }];
  for (const item of items) {
    for (const line of item.split(/\r?\n/)) {
      lines.push({ depth: 1, text: line.trim() });
    }
  }
  return lines;
}

function formatEntry(entry: DocEntry): string {
  return entry.type ? `${entry.name} (${entry.type}): ${entry.description}` : `${entry.name}: ${entry.description}`;
}

function freeText(category: MarkerCategory, text: string): DocSuggestion {
  const bare = category === 'comment' ? text.replace(/#/g, '') : stripQuotes(text);
  if (bare.trim() === '') throw new InvalidSuggestionError('Suggestion has no content');
  if (category === 'comment') return { kind: 'comment', text };
  return { kind: 'text', category, text };
}

function stripQuotes(text: string): string {
  return text
    .trim()
    .replace(/^[rRuU]?("""|''')/, '')
    .replace(/("""|''')$/, '');
}

function trimBlankEdges(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start] === '') start++;
  while (end > start && lines[end - 1] === '') end--;
  return lines.slice(start, end);
}

function parseJsonObject(text: string): unknown {
  if (!text.startsWith('{')) return undefined;
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InvalidSuggestionError('Suggestion looks like JSON but does not parse', { cause: error });
  }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, json: unknown, kind: TaskKind): T {
  const result = schema.safeParse(json);
  if (result.success) return result.data;
  const issue = result.error.issues[0];
  const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  throw new InvalidSuggestionError(`Suggestion does not fit ${kind}: ${where}${issue.message}`, {
    cause: result.error,
  });
}
