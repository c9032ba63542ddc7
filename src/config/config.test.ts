import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { DEFAULT_EXCLUDES, defaultConfig, dumpConfig, loadConfig, parseConfig } from './config.js';
import { ConfigError } from '../errors.js';

describe('parseConfig', () => {
  it('should fill defaults for an empty document', () => {
    expect(parseConfig('')).toEqual({
      scanning: { paths: ['.'], extensions: ['.py'], exclude: DEFAULT_EXCLUDES, maxFileSizeKb: 1024 },
      output: { backupDir: '.docmark/backups' },
    });
  });

  it('should keep given values and default the rest', () => {
    const config = parseConfig('scanning:\n  paths: [src, tools]\n  maxFileSizeKb: 64\n');
    expect(config.scanning.paths).toEqual(['src', 'tools']);
    expect(config.scanning.maxFileSizeKb).toBe(64);
    expect(config.scanning.extensions).toEqual(['.py']);
  });

  it('should reject unknown keys and wrong types', () => {
    expect(() => parseConfig('scanning:\n  maxFileSizeKb: lots\n')).toThrow(ConfigError);
    expect(() => parseConfig('scaning:\n  paths: [src]\n')).toThrow(ConfigError);
    expect(() => parseConfig('scanning:\n  extensions: [py]\n')).toThrow(
      'config.yaml: scanning.extensions.0: must look like ".py"',
    );
  });

  it('should reject invalid YAML', () => {
    expect(() => parseConfig('scanning: [unclosed')).toThrow(ConfigError);
  });

  it('should read back what it dumps', () => {
    expect(parseConfig(dumpConfig(defaultConfig()))).toEqual(defaultConfig());
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'docmark-config-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true });
  });

  it('should return defaults when no config file exists', async () => {
    expect(await loadConfig(tempDir)).toEqual(defaultConfig());
  });

  it('should load the project config file', async () => {
    await mkdir(join(tempDir, '.docmark'));
    await writeFile(join(tempDir, '.docmark', 'config.yaml'), 'output:\n  backupDir: backups\n');
    expect((await loadConfig(tempDir)).output.backupDir).toBe('backups');
  });
});
