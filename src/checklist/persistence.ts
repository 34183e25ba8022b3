/**
 * Checklist Persistence
 *
 * Reads and writes the task collection as a flat text file, one record per
 * line. The file is opened and closed inside each load/save call.
 */

import * as fs from 'fs';
import type { Logger } from 'pino';
import { getLogger } from '../logger';
import { ChecklistIOError, errorMessage } from './errors';
import { parseRecords, serializeRecords } from './record-format';
import { Task } from './task';
import type { SaveResult } from './types';

export class ChecklistPersistence {
  readonly filePath: string;
  private log: Logger;

  constructor(filePath: string, logger?: Logger) {
    this.filePath = filePath;
    this.log = logger ?? getLogger('ChecklistPersistence');
  }

  /**
   * Load tasks in file order. A missing or unreadable file means there is no
   * saved data yet and yields an empty list.
   */
  load(): Task[] {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      this.log.debug({ path: this.filePath, error: errorMessage(err) }, 'No readable checklist file, starting empty');
      return [];
    }

    const tasks = parseRecords(raw).map((record) => {
      const task = new Task(record.id, record.text);
      if (record.completed) task.toggleComplete();
      return task;
    });

    this.log.debug({ path: this.filePath, count: tasks.length }, 'Loaded checklist');
    return tasks;
  }

  /** Overwrite the file with the given tasks. Never throws on I/O failure. */
  save(tasks: readonly Task[]): SaveResult {
    try {
      fs.writeFileSync(this.filePath, serializeRecords(tasks), 'utf-8');
    } catch (err) {
      return {
        ok: false,
        error: new ChecklistIOError(`Unable to write ${this.filePath}: ${errorMessage(err)}`, this.filePath, err),
      };
    }

    this.log.debug({ path: this.filePath, count: tasks.length }, 'Saved checklist');
    return { ok: true, path: this.filePath, count: tasks.length };
  }
}
