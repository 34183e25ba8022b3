export { ChecklistStore } from './store';
export type { ChecklistStoreOptions } from './store';
export { ChecklistPersistence } from './persistence';
export { Task } from './task';
export { ChecklistIOError, ChecklistClosedError, errorMessage } from './errors';
export { formatRecord, parseRecord, parseRecords, serializeRecords } from './record-format';
export type { TaskView, TaskRecord, ChecklistSummary, SaveResult } from './types';
