/**
 * Checklist Record Format
 *
 * One task per line:
 *
 *   <id> <completed:0|1> <text-to-end-of-line>
 *
 * Decoding stops at the first line that does not start with two integers;
 * everything after it is dropped. Blank lines are skipped.
 */

import type { TaskRecord } from './types';

const RECORD_PATTERN = /^\s*([+-]?\d+)\s+([+-]?\d+)([\s\S]*)$/;
const LINE_BREAK = /\r\n|\r|\n/g;

interface RecordSource {
  id: number;
  completed: boolean;
  text: string;
}

/** Encode one task as a single line (without the trailing newline) */
export function formatRecord(task: RecordSource): string {
  const text = task.text.replace(LINE_BREAK, ' ');
  return `${task.id} ${task.completed ? 1 : 0} ${text}`;
}

/** Encode a whole collection as file content */
export function serializeRecords(tasks: readonly RecordSource[]): string {
  return tasks.map(t => formatRecord(t) + '\n').join('');
}

/**
 * Decode one line. Returns null when the line does not begin with two
 * integers in the safe range.
 */
export function parseRecord(line: string): TaskRecord | null {
  const match = RECORD_PATTERN.exec(line);
  if (!match) return null;

  const id = Number(match[1]);
  const flag = Number(match[2]);
  if (!Number.isSafeInteger(id) || !Number.isSafeInteger(flag)) return null;

  // One separator character follows the flag; the rest is the text verbatim.
  const rest = match[3];
  return {
    id,
    completed: flag !== 0,
    text: rest.length > 0 ? rest.slice(1) : '',
  };
}

/** Decode file content into records, in file order */
export function parseRecords(raw: string): TaskRecord[] {
  const records: TaskRecord[] = [];

  for (const rawLine of raw.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.trim().length === 0) continue;

    const record = parseRecord(line);
    if (!record) break;
    records.push(record);
  }

  return records;
}
