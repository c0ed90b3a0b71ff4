import { existsSync, statSync } from 'node:fs';
import { extname, resolve } from 'node:path';
import { globSync } from 'glob';
import type { Workflow } from '../parser/schema.ts';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import type { WorkflowSource } from '../runner/executors/types.ts';
import { WorkflowNotFoundError } from './errors.ts';
import { errorMessage } from './guards.ts';
import { ConsoleLogger, type Logger } from './logger.ts';

export const WORKFLOW_CATEGORIES = [
  'Git',
  'Docker',
  'Kubernetes',
  'AWS',
  'Database',
  'Network',
  'File System',
  'System',
  'Other',
] as const;

export type WorkflowCategory = (typeof WORKFLOW_CATEGORIES)[number];

const TAG_CATEGORIES: Record<string, WorkflowCategory> = {
  git: 'Git',
  docker: 'Docker',
  kubernetes: 'Kubernetes',
  k8s: 'Kubernetes',
  aws: 'AWS',
  database: 'Database',
  db: 'Database',
  network: 'Network',
  file: 'File System',
  filesystem: 'File System',
  system: 'System',
};

export interface WorkflowRegistryOptions {
  /** Directories scanned for *.yaml / *.yml definitions */
  directories?: string[];
  logger?: Logger;
}

export interface SearchResult {
  workflow: Workflow;
  score: number;
}

function isWorkflowFile(path: string): boolean {
  const ext = extname(path);
  return ext === '.yaml' || ext === '.yml';
}

/**
 * Workflows known by id or name, loaded from YAML directories or registered in memory
 */
export class WorkflowRegistry implements WorkflowSource {
  private entries = new Map<string, { workflow: Workflow; path?: string }>();
  private usage = new Map<string, number>();
  private loaded = false;
  private readonly directories: string[];
  private readonly logger: Logger;

  constructor(options: WorkflowRegistryOptions = {}) {
    this.directories = (options.directories ?? []).map((dir) => resolve(dir));
    this.logger = options.logger ?? new ConsoleLogger();
  }

  get searchPaths(): string[] {
    return [...this.directories];
  }

  register(workflow: Workflow, path?: string): void {
    this.entries.set(workflow.id, { workflow, path });
  }

  /**
   * Scan the configured directories. Invalid files are skipped with a warning,
   * the first definition of an id wins.
   */
  load(): void {
    this.loaded = true;
    for (const dir of this.directories) {
      if (!existsSync(dir)) continue;
      const files = globSync('*.{yaml,yml}', { cwd: dir, absolute: true, nodir: true }).sort();
      for (const file of files) {
        try {
          const workflow = WorkflowParser.loadWorkflow(file);
          if (this.entries.has(workflow.id)) continue;
          this.entries.set(workflow.id, { workflow, path: file });
        } catch (error) {
          this.logger.warn(`Skipping invalid workflow ${file}: ${errorMessage(error)}`);
        }
      }
    }
  }

  get(name: string): Workflow | undefined {
    this.ensureLoaded();
    const byId = this.entries.get(name);
    if (byId) return byId.workflow;

    const all = [...this.entries.values()].map((entry) => entry.workflow);
    return (
      all.find((workflow) => workflow.name === name) ??
      all.find((workflow) => workflow.name.toLowerCase() === name.toLowerCase())
    );
  }

  /**
   * Resolve a file path, an id or a name to a workflow
   *
   * @throws WorkflowNotFoundError
   */
  resolve(nameOrPath: string): Workflow {
    if (isWorkflowFile(nameOrPath) && existsSync(nameOrPath) && statSync(nameOrPath).isFile()) {
      const workflow = WorkflowParser.loadWorkflow(nameOrPath);
      this.register(workflow, resolve(nameOrPath));
      return workflow;
    }
    const workflow = this.get(nameOrPath);
    if (!workflow) {
      throw new WorkflowNotFoundError(nameOrPath);
    }
    return workflow;
  }

  pathOf(name: string): string | undefined {
    const workflow = this.get(name);
    return workflow ? this.entries.get(workflow.id)?.path : undefined;
  }

  list(): Workflow[] {
    this.ensureLoaded();
    return [...this.entries.values()].map((entry) => entry.workflow).sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Matching workflows, best first
   */
  search(query: string): SearchResult[] {
    const trimmed = query.trim();
    if (trimmed === '') {
      return this.list().map((workflow) => ({ workflow, score: 0 }));
    }
    return this.list()
      .map((workflow) => ({ workflow, score: WorkflowRegistry.score(workflow, trimmed, this.usageCount(workflow.id)) }))
      .filter((result) => result.score > 0)
      .sort((a, b) => b.score - a.score || a.workflow.name.localeCompare(b.workflow.name));
  }

  recordUsage(name: string): number {
    const workflow = this.get(name);
    const key = workflow?.id ?? name;
    const count = (this.usage.get(key) ?? 0) + 1;
    this.usage.set(key, count);
    return count;
  }

  usageCount(id: string): number {
    return this.usage.get(id) ?? 0;
  }

  /**
   * Weighted relevance of a workflow for a query
   */
  static score(workflow: Workflow, query: string, usageCount = 0): number {
    const needle = query.toLowerCase();
    let score = 0;

    const name = workflow.name.toLowerCase();
    if (name.includes(needle)) {
      score += 10;
      if (name === needle) score += 20;
    }

    for (const tag of workflow.tags) {
      const lower = tag.toLowerCase();
      if (lower.includes(needle)) {
        score += 8;
        if (lower === needle) score += 12;
      }
    }

    if (workflow.description?.toLowerCase().includes(needle)) score += 5;

    for (const step of workflow.steps) {
      if (step.type === 'command' && step.command.toLowerCase().includes(needle)) score += 3;
    }

    if (workflow.author?.toLowerCase().includes(needle)) score += 2;

    // Unused workflows get no bonus rather than log10(0)
    if (score > 0 && usageCount > 0) score += Math.log10(usageCount);
    return score;
  }

  /**
   * Category from the first recognised tag
   */
  static categorize(workflow: Workflow): WorkflowCategory {
    for (const tag of workflow.tags) {
      const category = TAG_CATEGORIES[tag.toLowerCase()];
      if (category) return category;
    }
    return 'Other';
  }

  private ensureLoaded(): void {
    if (!this.loaded) this.load();
  }
}
