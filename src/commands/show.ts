/**
 * stepdeck show command
 * Print a workflow definition and the variables it references
 */

import type { Command } from 'commander';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import { ConfigLoader } from '../utils/config-loader.ts';
import { errorMessage } from '../utils/guards.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { WorkflowRegistry } from '../utils/workflow-registry.ts';
import { createWorkflowRegistry } from './utils.ts';

export function showWorkflow(registry: WorkflowRegistry, nameOrPath: string, logger: Logger): void {
  const workflow = registry.resolve(nameOrPath);
  const path = registry.pathOf(workflow.id);

  logger.log(`# ${workflow.name} [${WorkflowRegistry.categorize(workflow)}]${path ? ` (${path})` : ''}`);
  logger.log(WorkflowParser.toYaml(workflow).trimEnd());

  const placeholders = WorkflowParser.extractPlaceholders(workflow);
  const declared = new Set(workflow.arguments.map((argument) => argument.name));
  logger.log('\nPlaceholders:');
  if (placeholders.length === 0) {
    logger.log('  (none)');
  }
  for (const name of placeholders) {
    logger.log(`  {{${name}}}${declared.has(name) ? '' : ' (set by a step or input)'}`);
  }
}

export function registerShowCommand(program: Command): void {
  program
    .command('show')
    .description('Show a workflow definition and its placeholders')
    .argument('<workflow>', 'Workflow name, id or path to workflow file')
    .action((workflowArg: string) => {
      const logger = new ConsoleLogger();
      try {
        showWorkflow(createWorkflowRegistry(ConfigLoader.load(logger), logger), workflowArg, logger);
      } catch (error) {
        logger.error(`✗ ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
