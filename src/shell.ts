/**
 * Interactive Shell
 *
 * Numeric menu over a line-oriented input stream:
 *   1 add, 2 remove, 3 toggle, 4 list, 5 exit
 *
 * handleLine() is a synchronous state machine, one input line per call, so
 * the menu can be driven without a terminal. run() feeds it from readline.
 */

import * as readline from 'readline';
import type { Readable } from 'stream';
import type { ChecklistStore, ChecklistSummary, TaskView } from './checklist';

export interface ShellOutput {
  write(chunk: string): unknown;
}

type ShellState = 'menu' | 'add' | 'remove' | 'toggle' | 'done';

const MENU = [
  '',
  '--- Checklist Manager ---',
  '1. Add Task',
  '2. Remove Task',
  '3. Toggle Task',
  '4. List Tasks',
  '5. Exit',
  'Choice: ',
].join('\n');

const INTEGER = /^[+-]?\d+$/;

/** Parse a whole-line integer; null for anything else */
export function parseInteger(input: string): number | null {
  const trimmed = input.trim();
  if (!INTEGER.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : null;
}

/** Render the task list block shown for menu choice 4 */
export function formatTaskList(tasks: readonly TaskView[], summary: ChecklistSummary): string {
  if (tasks.length === 0) {
    return '\nNo tasks in the checklist.\n';
  }

  const lines = ['', '=== CHECKLIST ==='];
  for (const task of tasks) {
    lines.push(`[${task.id}] ${task.completed ? '[X]' : '[ ]'} ${task.text}`);
  }
  lines.push(`${summary.completed}/${summary.total} completed`);
  lines.push('=================');
  return lines.join('\n') + '\n';
}

export class ChecklistShell {
  private state: ShellState = 'menu';

  constructor(
    private readonly store: ChecklistStore,
    private readonly output: ShellOutput,
  ) {}

  get running(): boolean {
    return this.state !== 'done';
  }

  /** Print the menu for the first time */
  start(): void {
    this.output.write(MENU);
  }

  /**
   * Handle one line of input. Returns false once the user has chosen to exit.
   */
  handleLine(line: string): boolean {
    switch (this.state) {
      case 'menu':
        this.handleChoice(line);
        break;
      case 'add':
        this.store.addTask(line);
        this.print('Task added successfully!');
        this.showMenu();
        break;
      case 'remove':
        this.handleId(line, id => this.store.removeTask(id), 'Task removed successfully!');
        break;
      case 'toggle':
        this.handleId(line, id => this.store.toggleTask(id), 'Task status toggled!');
        break;
      case 'done':
        break;
    }
    return this.running;
  }

  /** Drive the shell from a stream until the user exits or input ends */
  async run(input: Readable): Promise<void> {
    const rl = readline.createInterface({ input, terminal: false, crlfDelay: Infinity });
    this.start();
    try {
      for await (const line of rl) {
        if (!this.handleLine(line)) break;
      }
    } finally {
      rl.close();
    }

    // End of input means exit
    if (this.running) {
      this.output.write('\n');
      this.exit();
    }
  }

  private handleChoice(line: string): void {
    switch (parseInteger(line)) {
      case 1:
        this.prompt('add', 'Enter task description: ');
        break;
      case 2:
        this.prompt('remove', 'Enter task ID to remove: ');
        break;
      case 3:
        this.prompt('toggle', 'Enter task ID to toggle: ');
        break;
      case 4:
        this.output.write(formatTaskList(this.store.listTasks(), this.store.getSummary()));
        this.showMenu();
        break;
      case 5:
        this.exit();
        break;
      default:
        this.print('Invalid choice!');
        this.showMenu();
    }
  }

  private handleId(line: string, apply: (id: number) => boolean, successMessage: string): void {
    const id = parseInteger(line);
    if (id === null) {
      this.print('Invalid task ID!');
    } else {
      this.print(apply(id) ? successMessage : 'Task not found!');
    }
    this.showMenu();
  }

  private prompt(next: ShellState, message: string): void {
    this.state = next;
    this.output.write(message);
  }

  private showMenu(): void {
    this.state = 'menu';
    this.output.write(MENU);
  }

  private exit(): void {
    this.print('Saving and exiting...');
    this.state = 'done';
  }

  private print(message: string): void {
    this.output.write(message + '\n');
  }
}
