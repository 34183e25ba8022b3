/**
 * Configuration loader
 *
 * Reads the optional checklist.yml file. Without one, the checklist lives in
 * checklist.txt in the current directory and logging uses its defaults.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { validateChecklistConfig, formatZodError, ChecklistConfigOutput } from './config-schema';
import { errorMessage } from './checklist';
import type { LoggerConfig } from './logger';

export const DEFAULT_CONFIG_FILE = 'checklist.yml';
export const DEFAULT_CHECKLIST_FILE = 'checklist.txt';

/** Runtime config used by the checklist shell */
export interface Config {
  /** Absolute path of the checklist file */
  filePath: string;
  logging: LoggerConfig;
  /** Config file the values came from, if any */
  source?: string;
}

export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** Config file path; when given it must exist */
  configPath?: string;
  cwd?: string;
}

/**
 * Load and normalize config from YAML.
 * Relative `file` entries resolve against the config file's directory.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.configPath !== undefined;
  const resolvedPath = path.resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    if (explicit) {
      throw new ConfigError(`Config file not found: ${resolvedPath}`);
    }
    return {
      filePath: path.resolve(cwd, DEFAULT_CHECKLIST_FILE),
      logging: {},
    };
  }

  let parsed: unknown;
  try {
    parsed = parse(fs.readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read config ${resolvedPath}: ${errorMessage(error)}`, error);
  }

  let validated: ChecklistConfigOutput;
  try {
    // An empty YAML document parses to null
    validated = validateChecklistConfig(parsed ?? {});
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(`Invalid config ${resolvedPath}:\n${formatZodError(error)}`, error);
    }
    throw error;
  }

  return {
    filePath: path.resolve(path.dirname(resolvedPath), validated.file ?? DEFAULT_CHECKLIST_FILE),
    logging: {
      level: validated.logging?.level,
      pretty: validated.logging?.pretty,
    },
    source: resolvedPath,
  };
}
