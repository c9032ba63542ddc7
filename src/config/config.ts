/**
 * Configuration
 *
 * `.docmark/config.yaml`, read with js-yaml and checked with zod.
 * Every key has a default, so a missing file means the defaults.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage, hasErrorCode } from '../errors.js';

export const STATE_DIR = '.docmark';
export const CONFIG_FILE = 'config.yaml';

export const DEFAULT_EXCLUDES = [
  '**/.git/**',
  '**/__pycache__/**',
  '**/venv/**',
  '**/.venv/**',
  '**/env/**',
  '**/.tox/**',
  '**/.mypy_cache/**',
  '**/.pytest_cache/**',
  '**/*.egg-info/**',
  '**/build/**',
  '**/dist/**',
  '**/node_modules/**',
  `**/${STATE_DIR}/**`,
];

const configSchema = z
  .object({
    scanning: z
      .object({
        paths: z.array(z.string().min(1)).min(1).default(['.']),
        extensions: z
          .array(z.string().regex(/^\.\w+$/, 'must look like ".py"'))
          .min(1)
          .default(['.py']),
        exclude: z.array(z.string()).default(DEFAULT_EXCLUDES),
        maxFileSizeKb: z.number().positive().default(1024),
      })
      .strict()
      .default({}),
    output: z
      .object({
        backupDir: z.string().min(1).default(`${STATE_DIR}/backups`),
      })
      .strict()
      .default({}),
  })
  .strict();

export type DocmarkConfig = z.infer<typeof configSchema>;

export function defaultConfig(): DocmarkConfig {
  return configSchema.parse({});
}

export function parseConfig(text: string, source = CONFIG_FILE): DocmarkConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new ConfigError(`${source}: ${errorMessage(error)}`, { cause: error });
  }

  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`${source}: ${details}`, { cause: result.error });
  }
  return result.data;
}

export async function loadConfig(root: string): Promise<DocmarkConfig> {
  const path = join(root, STATE_DIR, CONFIG_FILE);
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return defaultConfig();
    throw new ConfigError(`Cannot read ${path}: ${errorMessage(error)}`, { cause: error });
  }
  return parseConfig(text, path);
}

export function dumpConfig(config: DocmarkConfig): string {
  return yaml.dump(config, {
    indent: 2,
    lineWidth: 100,
    noRefs: true,
  });
}
