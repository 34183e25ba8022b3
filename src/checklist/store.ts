/**
 * ChecklistStore: in-memory task collection with a file-backed lifecycle
 *
 * Loads the checklist file once at construction and writes it back once on
 * close(). Everything in between is an in-memory mutation.
 *
 * Ids are assigned from a counter seeded with max(loaded ids) + 1 and only
 * ever incremented, so an id is never handed out twice in one process, even
 * after the task that held it is removed.
 */

import type { Logger } from 'pino';
import { getLogger } from '../logger';
import { ChecklistClosedError } from './errors';
import { ChecklistPersistence } from './persistence';
import { Task } from './task';
import type { ChecklistSummary, SaveResult, TaskView } from './types';

export interface ChecklistStoreOptions {
  filePath: string;
  logger?: Logger;
}

export class ChecklistStore {
  private readonly tasks: Task[];
  private readonly persistence: ChecklistPersistence;
  private readonly log: Logger;
  private nextId: number;
  private closeResult: SaveResult | null = null;

  constructor(options: string | ChecklistStoreOptions) {
    const { filePath, logger } = typeof options === 'string' ? { filePath: options, logger: undefined } : options;
    this.log = logger ?? getLogger('ChecklistStore');
    this.persistence = new ChecklistPersistence(filePath, logger);
    this.tasks = this.persistence.load();
    this.nextId = this.tasks.reduce((max, t) => Math.max(max, t.id), 0) + 1;
  }

  get filePath(): string {
    return this.persistence.filePath;
  }

  get closed(): boolean {
    return this.closeResult !== null;
  }

  /** Append a task with the next id. Always succeeds. */
  addTask(text: string): TaskView {
    this.assertOpen('add task');
    const task = new Task(this.nextId++, text);
    this.tasks.push(task);
    return task.toView();
  }

  /** Returns false if no task has this id */
  removeTask(id: number): boolean {
    this.assertOpen('remove task');
    const index = this.tasks.findIndex(t => t.id === id);
    if (index === -1) return false;
    this.tasks.splice(index, 1);
    return true;
  }

  /** Returns false if no task has this id */
  toggleTask(id: number): boolean {
    this.assertOpen('toggle task');
    const task = this.find(id);
    if (!task) return false;
    task.toggleComplete();
    return true;
  }

  /** Replace a task's text. Returns false if no task has this id. */
  editTask(id: number, text: string): boolean {
    this.assertOpen('edit task');
    const task = this.find(id);
    if (!task) return false;
    task.setText(text);
    return true;
  }

  /** Snapshot in display order; mutating it does not affect the store */
  listTasks(): TaskView[] {
    return this.tasks.map(t => t.toView());
  }

  isEmpty(): boolean {
    return this.tasks.length === 0;
  }

  getSummary(): ChecklistSummary {
    const completed = this.tasks.filter(t => t.completed).length;
    return {
      total: this.tasks.length,
      completed,
      allDone: completed === this.tasks.length && this.tasks.length > 0,
    };
  }

  /**
   * Persist the collection. A failed save is logged and returned, not thrown,
   * so shutdown always completes. Only the first call writes.
   */
  close(): SaveResult {
    if (this.closeResult) return this.closeResult;

    const result = this.persistence.save(this.tasks);
    if (result.ok) {
      this.log.info({ path: result.path, count: result.count }, 'Checklist saved');
    } else {
      this.log.error({ path: this.filePath, error: result.error.message }, 'Error saving tasks');
    }
    this.closeResult = result;
    return result;
  }

  private find(id: number): Task | undefined {
    return this.tasks.find(t => t.id === id);
  }

  private assertOpen(operation: string): void {
    if (this.closeResult) throw new ChecklistClosedError(operation);
  }
}
