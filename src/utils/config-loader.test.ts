import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { defaultConfig } from '../parser/config-schema.ts';
import { ConfigLoader } from './config-loader.ts';
import { MemoryLogger } from './logger.ts';

describe('ConfigLoader', () => {
  let tempDir: string;
  const originalEnv = { ...process.env };

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'stepdeck-config-'));
    process.env.XDG_CONFIG_HOME = join(tempDir, 'xdg');
    delete process.env.STEPDECK_CONFIG;
    ConfigLoader.clear();
  });

  afterEach(() => {
    ConfigLoader.clear();
    process.env = { ...originalEnv };
    rmSync(tempDir, { recursive: true, force: true });
  });

  function writeProjectConfig(content: string): void {
    const dir = join(tempDir, '.stepdeck');
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, 'config.yaml'), content);
  }

  it('returns defaults when no config file exists', () => {
    const config = ConfigLoader.load(new MemoryLogger(), tempDir);
    expect(config).toEqual(defaultConfig());
    expect(config.shell).toBe('/bin/sh');
    expect(config.max_depth).toBe(10);
    expect(config.prompts.timeout_ms).toBeNull();
  });

  it('allows setting and clearing config', () => {
    const custom = { ...defaultConfig(), max_depth: 3 };
    ConfigLoader.setConfig(custom);
    expect(ConfigLoader.load(new MemoryLogger(), tempDir)).toBe(custom);

    ConfigLoader.clear();
    expect(ConfigLoader.load(new MemoryLogger(), tempDir).max_depth).toBe(10);
  });

  it('interpolates environment variables', () => {
    process.env.TEST_SHELL = '/bin/bash';
    process.env.TEST_DIR = 'flows';
    writeProjectConfig('shell: ${TEST_SHELL}\nworkflow_dirs:\n  - $TEST_DIR\n');

    const config = ConfigLoader.load(new MemoryLogger(), tempDir);
    expect(config.shell).toBe('/bin/bash');
    expect(config.workflow_dirs).toEqual(['flows']);
  });

  it('deep merges project config over user config', () => {
    const userDir = join(tempDir, 'xdg', 'stepdeck');
    mkdirSync(userDir, { recursive: true });
    writeFileSync(join(userDir, 'config.yaml'), 'retry:\n  base_delay_ms: 50\nmax_depth: 4\n');
    writeProjectConfig('max_depth: 6\n');

    const config = ConfigLoader.load(new MemoryLogger(), tempDir);
    expect(config.max_depth).toBe(6);
    expect(config.retry.base_delay_ms).toBe(50);
  });

  it('gives STEPDECK_CONFIG the highest precedence', () => {
    writeProjectConfig('max_depth: 6\n');
    const explicit = join(tempDir, 'explicit.yaml');
    writeFileSync(explicit, 'max_depth: 2\n');
    process.env.STEPDECK_CONFIG = explicit;

    expect(ConfigLoader.load(new MemoryLogger(), tempDir).max_depth).toBe(2);
  });

  it('falls back to defaults and warns on invalid config', () => {
    writeProjectConfig('max_depth: -1\n');
    const logger = new MemoryLogger();

    const config = ConfigLoader.load(logger, tempDir);
    expect(config.max_depth).toBe(10);
    expect(logger.messages('warn')[0]).toContain('Invalid configuration, using defaults');
  });

  it('keeps an explicit prompt timeout', () => {
    writeProjectConfig('prompts:\n  timeout_ms: 30000\n');
    expect(ConfigLoader.load(new MemoryLogger(), tempDir).prompts.timeout_ms).toBe(30000);
  });
});

describe('ConfigLoader.deepMerge', () => {
  it('replaces arrays instead of merging them', () => {
    expect(ConfigLoader.deepMerge({ a: [1], b: { c: 1 } }, { a: [2], b: { d: 2 } })).toEqual({
      a: [2],
      b: { c: 1, d: 2 },
    });
  });
});
