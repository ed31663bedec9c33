import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { z } from 'zod';
import {
  loadConfig,
  parseConfig,
  formatZodErrors,
  ConfigError,
  DEFAULT_CONFIG,
} from './config-parser.js';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'cmdbench-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load a valid config file', async () => {
    const configContent = `
version: "1"
output:
  style: nocolor
results:
  files:
    - before.json
    - after.json
`;
    writeFileSync(join(tempDir, '.cmdbench.yaml'), configContent);

    const result = await loadConfig(tempDir);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.output.style).toBe('nocolor');
      expect(result.value.results.files).toEqual(['before.json', 'after.json']);
    }
  });

  it('should apply defaults for missing sections', async () => {
    writeFileSync(join(tempDir, '.cmdbench.yaml'), 'version: "1"\n');

    const result = await loadConfig(tempDir);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual(DEFAULT_CONFIG);
    }
  });

  it('should return an error when the file does not exist', async () => {
    const result = await loadConfig(tempDir);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.message).toBe(`Config file not found: ${join(tempDir, '.cmdbench.yaml')}`);
    }
  });

  it('should return an error for invalid YAML', async () => {
    writeFileSync(join(tempDir, '.cmdbench.yaml'), 'output: [unclosed\n');

    const result = await loadConfig(tempDir);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toMatch(/^Invalid YAML in config file: /);
    }
  });

  it('should return an error for an empty file', async () => {
    writeFileSync(join(tempDir, '.cmdbench.yaml'), '');

    const result = await loadConfig(tempDir);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Config file is empty or not a valid YAML object');
    }
  });
});

describe('parseConfig', () => {
  it('should reject an unknown output style', () => {
    const result = parseConfig({ output: { style: 'fancy' } });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(
        'Config validation failed: output.style: style must be one of: basic, full, nocolor, color, none',
      );
    }
  });

  it('should reject an empty result file path', () => {
    const result = parseConfig({ results: { files: [''] } });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(
        'Config validation failed: results.files.0: Result file path must not be empty',
      );
    }
  });

  it('should ignore a section that is not an object', () => {
    const result = parseConfig({ output: 'full' });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.output).toEqual(DEFAULT_CONFIG.output);
    }
  });

  it('should reject a top-level array', () => {
    expect(parseConfig(['full']).isErr()).toBe(true);
  });
});

describe('formatZodErrors', () => {
  it('should join issues as path and message pairs', () => {
    const result = z
      .object({ name: z.string(), count: z.number() })
      .safeParse({ name: 1, count: 'two' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toBe(
        'name: Expected string, received number; count: Expected number, received string',
      );
    }
  });

  it('should label issues without a path as root', () => {
    const result = z.string().safeParse(1);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toBe('root: Expected string, received number');
    }
  });
});
