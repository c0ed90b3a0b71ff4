/**
 * stepdeck list command
 * List or search available workflows
 */

import type { Command } from 'commander';
import { ConfigLoader } from '../utils/config-loader.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { type WorkflowCategory, WORKFLOW_CATEGORIES, WorkflowRegistry } from '../utils/workflow-registry.ts';
import { createWorkflowRegistry } from './utils.ts';

/**
 * Print matching workflows grouped by category. Returns the number printed.
 */
export function listWorkflows(registry: WorkflowRegistry, query: string, logger: Logger): number {
  const results = registry.search(query);
  if (results.length === 0) {
    if (query.trim() === '') {
      logger.log('No workflows found. Add definitions to .stepdeck/workflows/ or set workflow_dirs.');
    } else {
      logger.log(`No workflows match "${query}".`);
    }
    return 0;
  }

  const groups = new Map<WorkflowCategory, typeof results>();
  for (const result of results) {
    const category = WorkflowRegistry.categorize(result.workflow);
    groups.set(category, [...(groups.get(category) ?? []), result]);
  }

  logger.log('\n📚 Available Workflows:');
  for (const category of WORKFLOW_CATEGORIES) {
    const group = groups.get(category);
    if (!group) continue;
    logger.log(`\n  ${category}`);
    for (const { workflow } of group) {
      logger.log(`    ${workflow.name} (${workflow.id})`);
      if (workflow.description) {
        logger.log(`      ${workflow.description}`);
      }
    }
  }
  logger.log('');
  return results.length;
}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List available workflows, best matches first when a query is given')
    .argument('[query]', 'Search text matched against names, tags, descriptions and commands')
    .action((query: string | undefined) => {
      const logger = new ConsoleLogger();
      const registry = createWorkflowRegistry(ConfigLoader.load(logger), logger);
      listWorkflows(registry, query ?? '', logger);
    });
}
