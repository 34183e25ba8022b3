/**
 * Checklist Types
 *
 * Shapes shared by the task record, the persistence adapter and the store.
 * Callers only ever see detached TaskView snapshots.
 */

import type { ChecklistIOError } from './errors';

export interface TaskView {
  id: number;
  text: string;
  completed: boolean;
}

/** One decoded line of the checklist file */
export interface TaskRecord {
  id: number;
  completed: boolean;
  text: string;
}

export interface ChecklistSummary {
  total: number;
  completed: number;
  allDone: boolean;
}

export type SaveResult =
  | { ok: true; path: string; count: number }
  | { ok: false; error: ChecklistIOError };
