/**
 * stepdeck validate command
 * Validate workflow files
 */

import { existsSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { Command } from 'commander';
import { globSync } from 'glob';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import { WorkflowValidationError } from '../utils/errors.ts';
import { errorMessage } from '../utils/guards.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';

export interface ValidationReport {
  passed: number;
  failed: number;
}

/**
 * Expand files and directories into the workflow files to check
 */
export function collectWorkflowFiles(paths: string[], logger: Logger): string[] {
  const files: string[] = [];
  for (const path of paths) {
    if (!existsSync(path)) {
      logger.error(`✗ Path not found: ${path}`);
      continue;
    }
    if (statSync(path).isDirectory()) {
      const found = globSync('**/*.{yaml,yml}', { cwd: path, nodir: true }).sort();
      files.push(...found.map((file) => join(path, file)));
    } else {
      files.push(path);
    }
  }
  return files;
}

/**
 * Load every file and report each definition's issues
 */
export function validateWorkflows(paths: string[], logger: Logger = new ConsoleLogger()): ValidationReport {
  const report: ValidationReport = { passed: 0, failed: 0 };
  const files = collectWorkflowFiles(paths, logger);
  report.failed = paths.filter((path) => !existsSync(path)).length;

  if (files.length === 0) {
    logger.log('⊘ No workflow files found to validate.');
    return report;
  }

  logger.log(`🔍 Validating ${files.length} workflow(s)...\n`);

  for (const file of files) {
    try {
      const workflow = WorkflowParser.loadWorkflow(file);
      logger.log(`  ✓ ${file.padEnd(40)} ${workflow.name} (${workflow.steps.length} steps)`);
      report.passed++;
    } catch (error) {
      if (error instanceof WorkflowValidationError) {
        logger.error(`  ✗ ${file}`);
        for (const issue of error.issues) {
          logger.error(`      - ${issue}`);
        }
      } else {
        logger.error(`  ✗ ${file.padEnd(40)} ${errorMessage(error)}`);
      }
      report.failed++;
    }
  }

  logger.log(`\nSummary: ${report.passed} passed, ${report.failed} failed.`);
  return report;
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate workflow files')
    .argument('<paths...>', 'Workflow files or directories to validate')
    .action((paths: string[]) => {
      const report = validateWorkflows(paths);
      if (report.failed > 0) {
        process.exit(1);
      }
    });
}
