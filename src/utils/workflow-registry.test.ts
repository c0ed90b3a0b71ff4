import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import { WorkflowNotFoundError } from './errors.ts';
import { MemoryLogger } from './logger.ts';
import { WorkflowRegistry } from './workflow-registry.ts';

const dockerCleanup = WorkflowParser.parse(
  `
id: docker-cleanup
name: Docker Cleanup
description: Remove stopped containers and dangling images
author: ops
tags: [docker, cleanup]
steps:
  - id: prune
    name: Prune containers
    command: docker container prune -f
`,
  'docker-cleanup.yaml'
);

const gitSync = WorkflowParser.parse(
  `
id: git-sync
name: Git Sync
tags: [git]
steps:
  - id: pull
    name: Pull
    type: command
    command: git pull --rebase
`,
  'git-sync.yaml'
);

describe('WorkflowRegistry', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'stepdeck-registry-'));
    mkdirSync(join(dir, 'workflows'));
    writeFileSync(
      join(dir, 'workflows', 'hello.yaml'),
      'id: hello\nname: Hello\nsteps:\n  - id: s1\n    name: Say hi\n    command: echo hi\n'
    );
    writeFileSync(join(dir, 'workflows', 'broken.yml'), 'name: Broken\nsteps:\n  - id: s1\n    type: teleport\n');
    writeFileSync(join(dir, 'workflows', 'notes.txt'), 'not a workflow');
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load workflows from directories and skip invalid files', () => {
    const logger = new MemoryLogger();
    const registry = new WorkflowRegistry({ directories: [join(dir, 'workflows')], logger });

    expect(registry.list().map((workflow) => workflow.id)).toEqual(['hello']);
    expect(logger.messages('warn')).toHaveLength(1);
    expect(logger.messages('warn')[0]).toContain('broken.yml');
  });

  it('should resolve by id, by name and case-insensitively by name', () => {
    const registry = new WorkflowRegistry();
    registry.register(gitSync);

    expect(registry.get('git-sync')).toBe(gitSync);
    expect(registry.get('Git Sync')).toBe(gitSync);
    expect(registry.get('git sync')).toBe(gitSync);
    expect(registry.get('missing')).toBeUndefined();
  });

  it('should resolve a file path and remember where it came from', () => {
    const registry = new WorkflowRegistry();
    const path = join(dir, 'workflows', 'hello.yaml');

    const workflow = registry.resolve(path);
    expect(workflow.id).toBe('hello');
    expect(registry.pathOf('hello')).toBe(path);
  });

  it('should throw for an unknown workflow', () => {
    const registry = new WorkflowRegistry();
    expect(() => registry.resolve('nope')).toThrow(WorkflowNotFoundError);
  });

  it('should ignore missing directories', () => {
    const registry = new WorkflowRegistry({ directories: [join(dir, 'absent')] });
    expect(registry.list()).toEqual([]);
  });

  describe('search', () => {
    it('should score name, tag, description, command and author matches', () => {
      // name 10 + 20 exact; tag "docker" 8 + 12 exact; description misses; command 3
      expect(WorkflowRegistry.score(dockerCleanup, 'docker')).toBe(10 + 8 + 12 + 3);
      expect(WorkflowRegistry.score(dockerCleanup, 'Docker Cleanup')).toBe(30);
      expect(WorkflowRegistry.score(dockerCleanup, 'dangling')).toBe(5);
      expect(WorkflowRegistry.score(dockerCleanup, 'ops')).toBe(2);
      expect(WorkflowRegistry.score(dockerCleanup, 'kubectl')).toBe(0);
    });

    it('should add log10 of the usage count', () => {
      expect(WorkflowRegistry.score(gitSync, 'git', 100)).toBe(10 + 20 + 3 + 2);
      expect(WorkflowRegistry.score(gitSync, 'git', 0)).toBe(10 + 20 + 3);
    });

    it('should return matches best first and drop non-matches', () => {
      const registry = new WorkflowRegistry();
      registry.register(dockerCleanup);
      registry.register(gitSync);

      const results = registry.search('git');
      expect(results.map((result) => result.workflow.id)).toEqual(['git-sync']);
    });

    it('should rank frequently used workflows higher on ties', () => {
      const registry = new WorkflowRegistry();
      const a = WorkflowParser.parse('id: a\nname: Build A\nsteps:\n  - id: s\n    name: s\n    command: make\n');
      const b = WorkflowParser.parse('id: b\nname: Build B\nsteps:\n  - id: s\n    name: s\n    command: make\n');
      registry.register(a);
      registry.register(b);
      for (let i = 0; i < 10; i++) registry.recordUsage('b');

      expect(registry.usageCount('b')).toBe(10);
      expect(registry.search('build').map((result) => result.workflow.id)).toEqual(['b', 'a']);
    });
  });

  describe('categorize', () => {
    it('should map the first recognised tag to a category', () => {
      expect(WorkflowRegistry.categorize(dockerCleanup)).toBe('Docker');
      expect(WorkflowRegistry.categorize(gitSync)).toBe('Git');
      expect(WorkflowRegistry.categorize({ ...gitSync, tags: ['misc', 'K8s'] })).toBe('Kubernetes');
      expect(WorkflowRegistry.categorize({ ...gitSync, tags: [] })).toBe('Other');
    });
  });
});
