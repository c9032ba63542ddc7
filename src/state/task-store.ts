/**
 * Task Store
 *
 * Durable queue of documentation tasks. One task per (file, line, category):
 * the generate and validate kinds of a category share that slot.
 *
 * Status machine:
 *   pending -> processing -> completed
 *   processing | completed | failed -> failed
 *   failed -> pending
 *
 * A task whose block disappears is detached: failed, unaccepted and out of
 * the queue until a scan finds a block in its slot again.
 */

import { join } from 'path';
import { z } from 'zod';
import {
  InvalidTransitionError,
  TaskNotFoundError,
  UniquenessViolation,
} from '../errors.js';
import { MARKER_CATEGORIES, type MarkerCategory } from '../markers/tokens.js';
import { JsonStore } from './json-store.js';
import {
  categoryOf,
  priorityOf,
  taskSchema,
  type Task,
  type TaskInput,
  type TaskKind,
  type TaskStatus,
} from './task.js';

export type UpsertOutcome = 'created' | 'updated' | 'unchanged';

export interface UpsertResult {
  task: Task;
  outcome: UpsertOutcome;
}

export interface PendingQuery {
  kinds?: TaskKind[];
  limit?: number;
}

/** Move anchors of one file at or after `fromLine` by `delta` lines. */
export interface LineShift {
  filePath: string;
  fromLine: number;
  delta: number;
}

export interface TaskSlot {
  lineNumber: number;
  category: MarkerCategory;
}

/** A block that moved from one anchor line to another between scans. */
export interface SlotMove {
  category: MarkerCategory;
  from: number;
  to: number;
}

export interface Reconciliation {
  moved: number;
  detached: number;
}

export interface TaskStats {
  total: number;
  accepted: number;
  detached: number;
  byStatus: Record<TaskStatus, number>;
}

export const DETACHED_ERROR = 'Marked block no longer present';

export interface TaskStore {
  createOrUpdate(input: TaskInput): Promise<UpsertResult>;
  get(id: number): Promise<Task | null>;
  listAll(): Promise<Task[]>;
  listPending(query?: PendingQuery): Promise<Task[]>;
  listAccepted(): Promise<Task[]>;
  markProcessing(id: number): Promise<Task>;
  markCompleted(id: number): Promise<Task>;
  markFailed(id: number, error: string): Promise<Task>;
  markPending(id: number): Promise<Task>;
  requeueFailed(): Promise<number>;
  setSuggestion(id: number, suggestion: string): Promise<Task>;
  setAccepted(id: number, accepted: boolean): Promise<Task>;
  delete(id: number, options?: { shift?: LineShift }): Promise<void>;
  reconcile(filePath: string, moves: SlotMove[], live: TaskSlot[]): Promise<Reconciliation>;
  clearAll(): Promise<number>;
  stats(): Promise<TaskStats>;
}

const taskFileSchema = z.object({
  nextId: z.number().int().positive(),
  tasks: z.array(taskSchema),
});

type TaskFile = z.infer<typeof taskFileSchema>;

const TRANSITIONS: Record<'processing' | 'completed' | 'failed' | 'pending', readonly TaskStatus[]> = {
  processing: ['pending'],
  completed: ['processing'],
  failed: ['processing', 'completed', 'failed'],
  pending: ['failed'],
};

const CATEGORY_RANK = new Map(MARKER_CATEGORIES.map((category, i) => [category, i]));

function rank(task: Task): number {
  return CATEGORY_RANK.get(categoryOf(task.kind)) ?? MARKER_CATEGORIES.length;
}

function sameSlot(task: Task, filePath: string, lineNumber: number, category: MarkerCategory): boolean {
  return task.filePath === filePath && task.lineNumber === lineNumber && categoryOf(task.kind) === category;
}

function slotKey(category: MarkerCategory, lineNumber: number): string {
  return `${category}:${lineNumber}`;
}

export class JsonTaskStore implements TaskStore {
  private store: JsonStore<TaskFile>;

  constructor(stateDir: string, private readonly now: () => Date = () => new Date()) {
    this.store = new JsonStore(join(stateDir, 'tasks.json'), taskFileSchema, () => ({ nextId: 1, tasks: [] }));
  }

  createOrUpdate(input: TaskInput): Promise<UpsertResult> {
    return this.store.mutate<UpsertResult>(data => {
      const category = categoryOf(input.kind);
      const inSlot = data.tasks.filter(t => sameSlot(t, input.filePath, input.lineNumber, category));
      const occupants = inSlot.filter(t => !t.detached);
      if (occupants.length > 1) {
        throw new UniquenessViolation(
          `${occupants.length} tasks occupy ${input.filePath}:${input.lineNumber} (${category}): ` +
            occupants.map(t => `#${t.id}`).join(', '),
        );
      }

      const stamp = this.now().toISOString();
      const existing = occupants[0] ?? inSlot[0];
      if (!existing) {
        const task: Task = {
          id: data.nextId++,
          ...input,
          priority: priorityOf(input.kind),
          status: 'pending',
          createdAt: stamp,
          updatedAt: stamp,
          error: null,
          suggestion: null,
          accepted: false,
          detached: false,
        };
        data.tasks.push(task);
        return { task: { ...task }, outcome: 'created' };
      }

      if (
        !existing.detached &&
        existing.kind === input.kind &&
        existing.markerText === input.markerText &&
        existing.context === input.context &&
        existing.scopeName === input.scopeName
      ) {
        return { task: { ...existing }, outcome: 'unchanged' };
      }

      existing.kind = input.kind;
      existing.markerText = input.markerText;
      existing.context = input.context;
      existing.scopeName = input.scopeName;
      existing.priority = priorityOf(input.kind);
      existing.status = 'pending';
      existing.updatedAt = stamp;
      existing.error = null;
      existing.suggestion = null;
      existing.accepted = false;
      existing.detached = false;
      return { task: { ...existing }, outcome: 'updated' };
    });
  }

  async get(id: number): Promise<Task | null> {
    const data = await this.store.read();
    return data.tasks.find(t => t.id === id) ?? null;
  }

  async listAll(): Promise<Task[]> {
    const data = await this.store.read();
    return [...data.tasks].sort((a, b) => a.id - b.id);
  }

  async listPending(query: PendingQuery = {}): Promise<Task[]> {
    const data = await this.store.read();
    const pending = data.tasks
      .filter(t => t.status === 'pending')
      .filter(t => !query.kinds || query.kinds.includes(t.kind))
      .sort(
        (a, b) =>
          rank(a) - rank(b) ||
          a.priority - b.priority ||
          a.createdAt.localeCompare(b.createdAt) ||
          a.id - b.id,
      );
    return query.limit === undefined ? pending : pending.slice(0, query.limit);
  }

  /** Accepted tasks with a suggestion, bottom-up within each file. */
  async listAccepted(): Promise<Task[]> {
    const data = await this.store.read();
    return data.tasks
      .filter(t => t.accepted && t.suggestion !== null)
      .sort((a, b) => (a.filePath < b.filePath ? -1 : a.filePath > b.filePath ? 1 : b.lineNumber - a.lineNumber));
  }

  markProcessing(id: number): Promise<Task> {
    return this.transition(id, 'processing');
  }

  markCompleted(id: number): Promise<Task> {
    return this.transition(id, 'completed');
  }

  markFailed(id: number, error: string): Promise<Task> {
    return this.transition(id, 'failed', error);
  }

  markPending(id: number): Promise<Task> {
    return this.transition(id, 'pending');
  }

  /** Failed tasks that never received a suggestion go back to the queue. */
  requeueFailed(): Promise<number> {
    return this.store.mutate(data => {
      const stamp = this.now().toISOString();
      let count = 0;
      for (const task of data.tasks) {
        if (task.status !== 'failed' || task.suggestion !== null || task.detached) continue;
        task.status = 'pending';
        task.error = null;
        task.updatedAt = stamp;
        count++;
      }
      return count;
    });
  }

  setSuggestion(id: number, suggestion: string): Promise<Task> {
    return this.update(id, task => {
      task.suggestion = suggestion;
    });
  }

  setAccepted(id: number, accepted: boolean): Promise<Task> {
    return this.update(id, task => {
      task.accepted = accepted;
    });
  }

  delete(id: number, options: { shift?: LineShift } = {}): Promise<void> {
    return this.store.mutate(data => {
      const index = data.tasks.findIndex(t => t.id === id);
      if (index === -1) throw new TaskNotFoundError(id);
      const task = data.tasks[index];
      if (task.status === 'pending' || task.status === 'processing') {
        throw new InvalidTransitionError(`Task ${id} is ${task.status} and cannot be deleted`);
      }
      data.tasks.splice(index, 1);

      const shift = options.shift;
      if (!shift || shift.delta === 0) return;
      for (const other of data.tasks) {
        if (other.filePath === shift.filePath && other.lineNumber >= shift.fromLine) {
          other.lineNumber += shift.delta;
        }
      }
    });
  }

  /**
   * Follow blocks of `filePath` that moved, then detach tasks left on a slot
   * that holds no block or that a moved task now occupies. Moves apply all
   * at once, so two blocks may swap lines.
   */
  reconcile(filePath: string, moves: SlotMove[], live: TaskSlot[]): Promise<Reconciliation> {
    return this.store.mutate(data => {
      const stamp = this.now().toISOString();
      const attached = data.tasks.filter(t => t.filePath === filePath && !t.detached);

      const targets = new Map<Task, number>();
      for (const move of moves) {
        const task = attached.find(t => sameSlot(t, filePath, move.from, move.category));
        if (task) targets.set(task, move.to);
      }
      const claimed = new Set<string>();
      for (const [task, to] of targets) {
        task.lineNumber = to;
        task.updatedAt = stamp;
        claimed.add(slotKey(categoryOf(task.kind), to));
      }

      const liveSlots = new Set(live.map(slot => slotKey(slot.category, slot.lineNumber)));
      let detached = 0;
      for (const task of attached) {
        if (targets.has(task)) continue;
        const key = slotKey(categoryOf(task.kind), task.lineNumber);
        if (liveSlots.has(key) && !claimed.has(key)) continue;
        task.status = 'failed';
        task.error = DETACHED_ERROR;
        task.accepted = false;
        task.detached = true;
        task.updatedAt = stamp;
        detached++;
      }
      return { moved: targets.size, detached };
    });
  }

  clearAll(): Promise<number> {
    return this.store.mutate(data => {
      const count = data.tasks.length;
      data.tasks = [];
      return count;
    });
  }

  async stats(): Promise<TaskStats> {
    const data = await this.store.read();
    const byStatus: Record<TaskStatus, number> = { pending: 0, processing: 0, completed: 0, failed: 0 };
    for (const task of data.tasks) byStatus[task.status]++;
    return {
      total: data.tasks.length,
      accepted: data.tasks.filter(t => t.accepted).length,
      detached: data.tasks.filter(t => t.detached).length,
      byStatus,
    };
  }

  private transition(id: number, to: keyof typeof TRANSITIONS, error?: string): Promise<Task> {
    return this.update(id, task => {
      if (!TRANSITIONS[to].includes(task.status)) {
        throw new InvalidTransitionError(`Task ${id} cannot move from ${task.status} to ${to}`);
      }
      if (to === 'pending' && task.detached) {
        throw new InvalidTransitionError(`Task ${id} has no marked block to document`);
      }
      task.status = to;
      task.error = to === 'failed' ? error ?? null : null;
    });
  }

  private update(id: number, change: (task: Task) => void): Promise<Task> {
    return this.store.mutate(data => {
      const task = data.tasks.find(t => t.id === id);
      if (!task) throw new TaskNotFoundError(id);
      change(task);
      task.updatedAt = this.now().toISOString();
      return { ...task };
    });
  }
}
