/**
 * stepdeck run command
 * Execute a workflow
 */

import type { Command } from 'commander';
import type { WorkflowEvent } from '../runner/events.ts';
import { createTerminalResponder, PromptBroker } from '../runner/human-input.ts';
import { WorkflowRunner } from '../runner/workflow-runner.ts';
import { formatRunSummary, formatTimingSummary } from '../runner/workflow-summary.ts';
import { ConfigLoader } from '../utils/config-loader.ts';
import { errorMessage } from '../utils/guards.ts';
import { ConsoleLogger, SilentLogger } from '../utils/logger.ts';
import { createWorkflowRegistry, parseInputs } from './utils.ts';

interface RunCommandOptions {
  input?: string[];
  events?: boolean;
  timing?: boolean;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Execute a workflow')
    .argument('<workflow>', 'Workflow name, id or path to workflow file')
    .option('-i, --input <key=value...>', 'Input values')
    .option('--events', 'Emit structured JSON events (NDJSON) to stdout')
    .option('--timing', 'Print per-step timings after the run')
    .action(async (workflowArg: string, options: RunCommandOptions) => {
      const eventsEnabled = !!options.events;
      // stdout carries only NDJSON in events mode
      const logger = eventsEnabled ? new SilentLogger() : new ConsoleLogger();
      const cli = new ConsoleLogger();

      try {
        const config = ConfigLoader.load(cli);
        const registry = createWorkflowRegistry(config, cli);
        const workflow = registry.resolve(workflowArg);
        registry.recordUsage(workflow.id);

        const humanInput = new PromptBroker();
        const runner = new WorkflowRunner(workflow, {
          config,
          logger,
          services: { humanInput, workflows: registry },
        });

        const events: WorkflowEvent[] = [];
        runner.subscribe((event) => {
          events.push(event);
          if (eventsEnabled) {
            process.stdout.write(`${JSON.stringify(event)}\n`);
          }
        });
        runner.subscribe(
          createTerminalResponder(humanInput, {
            logger,
            output: eventsEnabled ? process.stderr : process.stdout,
          })
        );

        const onInterrupt = (): void => runner.stop();
        process.once('SIGINT', onInterrupt);
        const outcome = await runner.run(parseInputs(options.input, cli));
        process.off('SIGINT', onInterrupt);

        if (!eventsEnabled) {
          cli.log(`\n${formatRunSummary(outcome)}`);
          const timing = options.timing ? formatTimingSummary(events) : null;
          if (timing) cli.log(timing);
        }
        process.exit(outcome.status === 'success' ? 0 : 1);
      } catch (error) {
        cli.error(`✗ Failed to execute workflow: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
