/**
 * stepdeck debug command
 * Step through a workflow with breakpoints
 */

import type { Command } from 'commander';
import { DebugManager } from '../runner/debug-manager.ts';
import { DebugRepl } from '../runner/debug-repl.ts';
import { PromptBroker } from '../runner/human-input.ts';
import { ConfigLoader } from '../utils/config-loader.ts';
import { errorMessage } from '../utils/guards.ts';
import { ConsoleLogger } from '../utils/logger.ts';
import { createWorkflowRegistry, parseBreakpoints, parseInputs } from './utils.ts';

interface DebugCommandOptions {
  input?: string[];
  break?: string[];
}

export function registerDebugCommand(program: Command): void {
  program
    .command('debug')
    .description('Run a workflow under the interactive step debugger')
    .argument('<workflow>', 'Workflow name, id or path to workflow file')
    .option('-i, --input <key=value...>', 'Input values')
    .option('-b, --break <index...>', 'Pause before these step indexes')
    .action(async (workflowArg: string, options: DebugCommandOptions) => {
      const logger = new ConsoleLogger();

      try {
        const config = ConfigLoader.load(logger);
        const registry = createWorkflowRegistry(config, logger);
        const workflow = registry.resolve(workflowArg);
        registry.recordUsage(workflow.id);

        const broker = new PromptBroker();
        const manager = new DebugManager({ config, logger, services: { humanInput: broker, workflows: registry } });
        const session = await manager.createSession(workflow, parseInputs(options.input, logger), {
          breakpoints: parseBreakpoints(options.break, logger),
        });

        const state = await new DebugRepl(session, { logger, broker }).start();
        await manager.dispose();
        process.exit(state.kind === 'failed' ? 1 : 0);
      } catch (error) {
        logger.error(`✗ Failed to debug workflow: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
