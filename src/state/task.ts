import { z } from 'zod';
import type { MarkerCategory } from '../markers/tokens.js';

export const TASK_KINDS = [
  'generate-module-doc',
  'validate-module-doc',
  'generate-class-doc',
  'validate-class-doc',
  'generate-function-doc',
  'validate-function-doc',
  'generate-inline-comment',
  'validate-inline-comment',
] as const;

export type TaskKind = (typeof TASK_KINDS)[number];

export const TASK_STATUSES = ['pending', 'processing', 'completed', 'failed'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

/** generate: nothing usable is there yet. validate: review what is there. */
export type TaskMode = 'generate' | 'validate';

const KIND_INFO: Record<TaskKind, { category: MarkerCategory; mode: TaskMode }> = {
  'generate-module-doc': { category: 'module', mode: 'generate' },
  'validate-module-doc': { category: 'module', mode: 'validate' },
  'generate-class-doc': { category: 'class', mode: 'generate' },
  'validate-class-doc': { category: 'class', mode: 'validate' },
  'generate-function-doc': { category: 'function', mode: 'generate' },
  'validate-function-doc': { category: 'function', mode: 'validate' },
  'generate-inline-comment': { category: 'comment', mode: 'generate' },
  'validate-inline-comment': { category: 'comment', mode: 'validate' },
};

const KIND_BY_CATEGORY: Record<MarkerCategory, Record<TaskMode, TaskKind>> = {
  module: { generate: 'generate-module-doc', validate: 'validate-module-doc' },
  class: { generate: 'generate-class-doc', validate: 'validate-class-doc' },
  function: { generate: 'generate-function-doc', validate: 'validate-function-doc' },
  comment: { generate: 'generate-inline-comment', validate: 'validate-inline-comment' },
};

export function kindFor(category: MarkerCategory, mode: TaskMode): TaskKind {
  return KIND_BY_CATEGORY[category][mode];
}

export function categoryOf(kind: TaskKind): MarkerCategory {
  return KIND_INFO[kind].category;
}

export function modeOf(kind: TaskKind): TaskMode {
  return KIND_INFO[kind].mode;
}

/** Lower runs first: filling gaps before reviewing what exists. */
export function priorityOf(kind: TaskKind): number {
  return modeOf(kind) === 'generate' ? 1 : 2;
}

export function isTaskKind(value: string): value is TaskKind {
  return TASK_KINDS.some(kind => kind === value);
}

export const taskSchema = z.object({
  id: z.number().int().positive(),
  filePath: z.string(),
  lineNumber: z.number().int().positive(),
  kind: z.enum(TASK_KINDS),
  markerText: z.string(),
  context: z.string(),
  scopeName: z.string(),
  priority: z.number().int(),
  status: z.enum(TASK_STATUSES),
  createdAt: z.string(),
  updatedAt: z.string(),
  error: z.string().nullable(),
  suggestion: z.string().nullable(),
  accepted: z.boolean(),
  /** Set when a scan no longer finds the block this task was made for. */
  detached: z.boolean().default(false),
});

export type Task = z.infer<typeof taskSchema>;

/** Fields the Scanner derives from a marker block. */
export type TaskInput = Pick<Task, 'filePath' | 'lineNumber' | 'kind' | 'markerText' | 'context' | 'scopeName'>;

/** Payload handed to the documentation generator. */
export function taskPayload(task: Task) {
  return {
    id: task.id,
    kind: task.kind,
    filePath: task.filePath,
    lineNumber: task.lineNumber,
    markerText: task.markerText,
    context: task.context,
    scopeName: task.scopeName,
  };
}
