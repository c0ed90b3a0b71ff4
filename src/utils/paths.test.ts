import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PathResolver } from './paths.ts';

describe('PathResolver', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('returns the project directory under the given cwd', () => {
    expect(PathResolver.getProjectDir('/work')).toBe('/work/.stepdeck');
  });

  it('respects XDG_CONFIG_HOME', () => {
    process.env.XDG_CONFIG_HOME = '/custom/config';
    expect(PathResolver.getUserConfigDir()).toBe('/custom/config/stepdeck');
  });

  it('falls back to ~/.config without XDG_CONFIG_HOME', () => {
    delete process.env.XDG_CONFIG_HOME;
    expect(PathResolver.getUserConfigDir()).toBe(join(homedir(), '.config', 'stepdeck'));
  });

  it('puts STEPDECK_CONFIG first', () => {
    process.env.STEPDECK_CONFIG = '/absolute/path/to/config.yaml';
    delete process.env.XDG_CONFIG_HOME;
    const paths = PathResolver.getConfigPaths('/work');
    expect(paths[0]).toBe('/absolute/path/to/config.yaml');
    expect(paths[1]).toBe('/work/.stepdeck/config.yaml');
    expect(paths).toHaveLength(5);
  });

  it('resolves a relative STEPDECK_CONFIG against cwd', () => {
    process.env.STEPDECK_CONFIG = 'conf/stepdeck.yaml';
    expect(PathResolver.getConfigPaths('/work')[0]).toBe(resolve('/work', 'conf/stepdeck.yaml'));
  });
});
