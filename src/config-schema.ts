/**
 * Config Schema Validation
 *
 * Zod schema for the optional checklist.yml configuration file.
 */

import { z } from 'zod';
import { LOG_LEVELS } from './logger';

const logLevelSchema = z.enum(LOG_LEVELS);

const loggingConfigSchema = z.object({
  level: logLevelSchema.optional(),
  pretty: z.boolean().optional(),
}).strict();

export const checklistConfigSchema = z.object({
  file: z.string().min(1, 'file must not be empty').optional(),
  logging: loggingConfigSchema.optional(),
}).strict();

export type ChecklistConfigInput = z.input<typeof checklistConfigSchema>;
export type ChecklistConfigOutput = z.output<typeof checklistConfigSchema>;

export function validateChecklistConfig(data: unknown): ChecklistConfigOutput {
  return checklistConfigSchema.parse(data);
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
