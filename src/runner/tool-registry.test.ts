import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { ProcessExitError, ToolNotFoundError } from '../utils/errors.ts';
import type { ProcessRunner } from './executors/types.ts';
import { defineTool, ToolRegistry } from './tool-registry.ts';

describe('ToolRegistry', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'stepdeck-tools-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('registers the standard tools', () => {
    const names = new ToolRegistry({ cwd: tempDir }).list().map((tool) => tool.name);
    expect(names).toEqual(['list_files', 'read_file', 'write_file', 'execute_command', 'change_directory']);
  });

  it('fails on an unknown tool', async () => {
    await expect(new ToolRegistry().invoke('teleport', {})).rejects.toThrow(ToolNotFoundError);
  });

  it('writes, lists and reads files relative to its directory', async () => {
    const registry = new ToolRegistry({ cwd: tempDir });
    mkdirSync(join(tempDir, 'sub'));

    await expect(registry.invoke('write_file', { path: 'notes.txt', content: 'hello' })).resolves.toBe(
      'Wrote 5 bytes to notes.txt'
    );
    await expect(registry.invoke('list_files', {})).resolves.toBe('notes.txt\nsub/');
    await expect(registry.invoke('read_file', { path: 'notes.txt' })).resolves.toBe('hello');
  });

  it('changes the directory for later calls', async () => {
    const registry = new ToolRegistry({ cwd: tempDir });
    mkdirSync(join(tempDir, 'nested'));
    writeFileSync(join(tempDir, 'nested', 'inner.txt'), 'inside');

    await registry.invoke('change_directory', { path: 'nested' });
    expect(registry.workingDirectory).toBe(join(tempDir, 'nested'));
    await expect(registry.invoke('read_file', { path: 'inner.txt' })).resolves.toBe('inside');
  });

  it('validates tool arguments', async () => {
    const registry = new ToolRegistry({ cwd: tempDir });
    await expect(registry.invoke('write_file', { path: 'x.txt' })).rejects.toThrow(
      'Invalid arguments for tool write_file: content: Required'
    );
  });

  it('runs commands through the process runner', async () => {
    const processRunner: ProcessRunner = {
      run: vi.fn(async () => ({ output: 'built\n', exitCode: 0, truncated: false })),
    };
    const registry = new ToolRegistry({ cwd: tempDir, processRunner, shell: '/bin/bash' });

    await expect(registry.invoke('execute_command', { command: 'make' })).resolves.toBe('built\n');
    expect(processRunner.run).toHaveBeenCalledWith({
      executable: 'make',
      args: [],
      shell: '/bin/bash',
      cwd: tempDir,
      env: {},
      signal: undefined,
    });
  });

  it('fails execute_command on a non-zero exit', async () => {
    const processRunner: ProcessRunner = {
      run: async () => ({ output: 'boom', exitCode: 2, truncated: false }),
    };
    const registry = new ToolRegistry({ cwd: tempDir, processRunner });
    await expect(registry.invoke('execute_command', { command: 'false' })).rejects.toThrow(ProcessExitError);
  });

  it('accepts custom tools', async () => {
    const registry = new ToolRegistry({ standardTools: false });
    registry.register(
      defineTool({
        name: 'shout',
        description: 'Upper-case text',
        parameters: z.object({ text: z.string() }),
        execute: async ({ text }) => text.toUpperCase(),
      })
    );

    expect(registry.has('read_file')).toBe(false);
    await expect(registry.invoke('shout', { text: 'hi' })).resolves.toBe('HI');
  });

  it('leaves files it did not touch alone', async () => {
    writeFileSync(join(tempDir, 'keep.txt'), 'original');
    const registry = new ToolRegistry({ cwd: tempDir });
    await registry.invoke('write_file', { path: 'other/new.txt', content: 'x' });
    expect(readFileSync(join(tempDir, 'keep.txt'), 'utf-8')).toBe('original');
    expect(readFileSync(join(tempDir, 'other', 'new.txt'), 'utf-8')).toBe('x');
  });
});
