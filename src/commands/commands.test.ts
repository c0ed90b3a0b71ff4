import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { defaultConfig } from '../parser/config-schema.ts';
import { WorkflowNotFoundError } from '../utils/errors.ts';
import { MemoryLogger } from '../utils/logger.ts';
import { listWorkflows } from './list.ts';
import { showWorkflow } from './show.ts';
import { createWorkflowRegistry, parseBreakpoints, parseInputs } from './utils.ts';
import { validateWorkflows } from './validate.ts';

const WORKFLOWS_DIR = fileURLToPath(new URL('../../workflows', import.meta.url));

function exampleRegistry(logger: MemoryLogger) {
  return createWorkflowRegistry({ ...defaultConfig(), workflow_dirs: [WORKFLOWS_DIR] }, logger);
}

describe('parseInputs', () => {
  it('keeps JSON types and falls back to text', () => {
    const logger = new MemoryLogger();
    const inputs = parseInputs(
      ['count=3', 'flags={"a":true}', 'name=ada', 'bad', '9x=1', '__proto__=1', 'broken={oops', 'quoted="x=y"'],
      logger
    );

    expect(inputs).toEqual({ count: 3, flags: { a: true }, name: 'ada', broken: '{oops', quoted: 'x=y' });
    expect(logger.messages('warn')).toEqual([
      '⚠️  Invalid input format: "bad" (expected key=value)',
      '⚠️  Invalid input key: "9x" (use alphanumeric and underscores only)',
      '⚠️  Invalid input key: "__proto__" (reserved keyword)',
      '⚠️  Input "broken" looks like JSON but failed to parse. Check for syntax errors.',
      '   Value: {oops',
    ]);
  });

  it('returns an empty context without pairs', () => {
    expect(parseInputs(undefined, new MemoryLogger())).toEqual({});
  });
});

describe('parseBreakpoints', () => {
  it('sorts and deduplicates step indexes', () => {
    const logger = new MemoryLogger();
    expect(parseBreakpoints(['2', '0', '2', 'x'], logger)).toEqual([0, 2]);
    expect(logger.messages('warn')).toEqual(['⚠️  Invalid breakpoint: "x" (expected a step index)']);
  });
});

describe('validateWorkflows', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stepdeck-validate-'));
    writeFileSync(join(dir, 'good.yaml'), 'id: good\nname: Good\nsteps:\n  - id: a\n    name: A\n    command: echo a\n');
    writeFileSync(join(dir, 'bad.yml'), 'id: bad\nname: Bad\n');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reports each file and every issue', () => {
    const logger = new MemoryLogger();
    const missing = join(dir, 'missing.yaml');

    const report = validateWorkflows([dir, missing], logger);

    expect(report).toEqual({ passed: 1, failed: 2 });
    expect(logger.messages('error')).toEqual([
      `✗ Path not found: ${missing}`,
      `  ✗ ${join(dir, 'bad.yml')}`,
      '      - steps: Required',
    ]);
    expect(logger.messages('log').at(-1)).toBe('\nSummary: 1 passed, 2 failed.');
  });

  it('passes the bundled example workflows', () => {
    const report = validateWorkflows([WORKFLOWS_DIR], new MemoryLogger());
    expect(report).toEqual({ passed: 3, failed: 0 });
  });
});

describe('listWorkflows', () => {
  it('groups workflows by category', () => {
    const logger = new MemoryLogger();

    expect(listWorkflows(exampleRegistry(logger), '', logger)).toBe(3);
    expect(logger.messages('log')).toEqual([
      '\n📚 Available Workflows:',
      '\n  Docker',
      '    Docker Cleanup (docker-cleanup)',
      '      Remove unused Docker containers and images',
      '\n  File System',
      '    Project Snapshot (project-snapshot)',
      '      Record the files and current git branch of a directory',
      '\n  Other',
      '    Greet (greet)',
      '      Print a greeting and ask how the day is going',
      '',
    ]);
  });

  it('prints only matches for a query', () => {
    const logger = new MemoryLogger();
    const registry = exampleRegistry(logger);

    expect(listWorkflows(registry, 'prune', logger)).toBe(0);
    expect(listWorkflows(registry, 'docker', logger)).toBe(1);
    expect(logger.messages('log')[0]).toBe('No workflows match "prune".');
  });
});

describe('showWorkflow', () => {
  it('prints the definition and its placeholders', () => {
    const logger = new MemoryLogger();

    showWorkflow(exampleRegistry(logger), 'greet', logger);

    const lines = logger.messages('log');
    expect(lines[0]).toBe(`# Greet [Other] (${join(WORKFLOWS_DIR, 'greet.yaml')})`);
    expect(lines[1]).toContain('id: greet');
    expect(lines.slice(-3)).toEqual(['\nPlaceholders:', '  {{name}}', '  {{mood}} (set by a step or input)']);
  });

  it('fails for an unknown workflow', () => {
    const logger = new MemoryLogger();
    expect(() => showWorkflow(exampleRegistry(logger), 'nope', logger)).toThrow(WorkflowNotFoundError);
  });
});
