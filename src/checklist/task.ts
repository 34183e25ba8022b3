import type { TaskView } from './types';

/**
 * A single checklist entry.
 *
 * No validation is done on id or text: empty text, negative or duplicate ids
 * are accepted as given. Uniqueness is the store's job.
 */
export class Task {
  private _text: string;
  private _completed = false;

  constructor(readonly id: number, text: string) {
    this._text = text;
  }

  get text(): string {
    return this._text;
  }

  get completed(): boolean {
    return this._completed;
  }

  toggleComplete(): void {
    this._completed = !this._completed;
  }

  setText(text: string): void {
    this._text = text;
  }

  /** Detached snapshot for display */
  toView(): TaskView {
    return { id: this.id, text: this._text, completed: this._completed };
  }
}
