import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Result, ok, err } from 'neverthrow';
import { parse } from 'yaml';
import { z } from 'zod';
import { OUTPUT_STYLES, type CmdbenchConfig } from '../types/config.js';

export const CONFIG_FILE_NAME = '.cmdbench.yaml';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// --- Zod Schemas ---

const outputStyleSchema = z.enum(OUTPUT_STYLES, {
  errorMap: () => ({ message: `style must be one of: ${OUTPUT_STYLES.join(', ')}` }),
});

const outputConfigSchema = z.object({
  style: outputStyleSchema,
});

const resultsConfigSchema = z.object({
  files: z.array(z.string().min(1, 'Result file path must not be empty')),
});

const cmdbenchConfigSchema = z.object({
  version: z.string().min(1, 'Version must not be empty'),
  output: outputConfigSchema,
  results: resultsConfigSchema,
});

// --- Defaults ---

export const DEFAULT_CONFIG: CmdbenchConfig = {
  version: '1',
  output: {
    style: 'full',
  },
  results: {
    files: ['benchmark-results.json'],
  },
};

// --- Helpers ---

/** Flatten zod issues into `path: message` pairs. */
export function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

function section(partial: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = partial[key];
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? { ...value }
    : {};
}

function applyDefaults(partial: Record<string, unknown>): Record<string, unknown> {
  return {
    version: partial['version'] ?? DEFAULT_CONFIG.version,
    output: {
      ...DEFAULT_CONFIG.output,
      ...section(partial, 'output'),
    },
    results: {
      ...DEFAULT_CONFIG.results,
      ...section(partial, 'results'),
    },
  };
}

/** Validate an already-parsed config object, filling in defaults. */
export function parseConfig(raw: unknown): Result<CmdbenchConfig, ConfigError> {
  if (raw === null || raw === undefined || typeof raw !== 'object' || Array.isArray(raw)) {
    return err(new ConfigError('Config file is empty or not a valid YAML object'));
  }

  const withDefaults = applyDefaults({ ...raw });

  const validationResult = cmdbenchConfigSchema.safeParse(withDefaults);
  if (!validationResult.success) {
    return err(new ConfigError(`Config validation failed: ${formatZodErrors(validationResult.error)}`));
  }

  return ok(validationResult.data);
}

// --- Main ---

export async function loadConfig(rootDir: string): Promise<Result<CmdbenchConfig, ConfigError>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch {
    return err(new ConfigError(`Config file not found: ${configPath}`));
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new ConfigError(`Invalid YAML in config file: ${message}`));
  }

  return parseConfig(parsed);
}
