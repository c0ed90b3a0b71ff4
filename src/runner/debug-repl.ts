import * as readline from 'node:readline';
import { type ContextValue, ContextValueSchema } from '../parser/schema.ts';
import { errorMessage } from '../utils/guards.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import type { DebugEvent, DebugSession, ExecutionState } from './debug-session.ts';
import type { PromptBroker } from './human-input.ts';

export interface DebugReplOptions {
  logger?: Logger;
  /** Answers agent prompts with the reply command */
  broker?: PromptBroker;
  inputStream?: NodeJS.ReadableStream;
  outputStream?: NodeJS.WritableStream;
}

const HELP_LINES = [
  '  > break <n>      (pause before step n)',
  '  > delete <n>     (remove the breakpoint at step n)',
  '  > breakpoints    (list breakpoints)',
  '  > continue       (run to the next breakpoint)',
  '  > step           (run one step, aliases: next, s, n)',
  '  > into / out     (same as step for now)',
  '  > pause          (pause before the next step)',
  '  > vars [name]    (show the live variables)',
  '  > set <name> <v> (set a variable, v is JSON or plain text)',
  '  > history        (list executed steps)',
  '  > at <n>         (variables as they were before step n)',
  '  > reply <text>   (answer the pending prompt)',
  '  > restart        (run again from step 0, keeping breakpoints)',
  '  > status         (one-line summary)',
  '  > stop           (stop the session and exit)',
];

/**
 * Parse a set value: JSON when it parses to a context value, the raw text otherwise
 */
export function parseVariableValue(text: string): ContextValue {
  try {
    const parsed = ContextValueSchema.safeParse(JSON.parse(text));
    if (parsed.success) return parsed.data;
  } catch {
    return text;
  }
  return text;
}

function parseIndex(arg: string | undefined): number | undefined {
  if (arg === undefined || !/^\d+$/.test(arg)) return undefined;
  return Number(arg);
}

/**
 * Line-oriented operator console over one debug session
 */
export class DebugRepl {
  private readonly logger: Logger;
  private readonly inputStream: NodeJS.ReadableStream;
  private readonly outputStream: NodeJS.WritableStream;
  private readonly broker?: PromptBroker;
  private closed = false;

  constructor(
    private readonly session: DebugSession,
    options: DebugReplOptions = {}
  ) {
    this.logger = options.logger ?? new ConsoleLogger();
    this.inputStream = options.inputStream ?? process.stdin;
    this.outputStream = options.outputStream ?? process.stdout;
    this.broker = options.broker;
  }

  /**
   * Run the console until the operator stops the session or input ends.
   * Starts the session if it has not started yet.
   */
  public async start(): Promise<ExecutionState> {
    this.logger.log('\nEntering Debug Mode. Available commands:');
    for (const line of HELP_LINES) this.logger.log(line);

    const rl = readline.createInterface({
      input: this.inputStream,
      output: this.outputStream,
      prompt: 'debug> ',
      terminal: false,
    });

    const unsubscribe = this.session.subscribe((event) => this.onEvent(event, rl));

    return new Promise<ExecutionState>((resolve) => {
      const finish = (): void => {
        unsubscribe();
        this.logger.log(this.session.summary());
        resolve(this.session.state);
      };

      rl.on('line', (line) => {
        if (this.handle(line)) {
          rl.prompt();
        } else {
          rl.close();
        }
      });

      rl.on('close', () => {
        this.closed = true;
        const { kind } = this.session.state;
        if (this.session.active || kind === 'not_started') {
          this.session.stop();
        }
        this.session.done().then(finish, finish);
      });

      if (this.session.state.kind === 'not_started') {
        this.session.start();
      }
      rl.prompt();
    });
  }

  /**
   * Apply one console line. Returns false when the console should close.
   */
  public handle(line: string): boolean {
    const trimmed = line.trim();
    const [cmd = '', ...args] = trimmed.split(/\s+/);

    switch (cmd) {
      case '':
        return true;

      case 'help':
      case 'h':
        for (const helpLine of HELP_LINES) this.logger.log(helpLine);
        return true;

      case 'status':
        this.logger.log(this.session.summary());
        return true;

      case 'break':
      case 'b': {
        const index = parseIndex(args[0]);
        if (index === undefined) {
          this.logger.log('Usage: break <step index>');
        } else if (index >= this.session.totalSteps) {
          this.logger.log(`No step at index ${index} (workflow has ${this.session.totalSteps} steps)`);
        } else {
          this.session.setBreakpoint(index);
          this.logger.log(`✓ Breakpoint set before step ${index}`);
        }
        return true;
      }

      case 'delete':
      case 'd': {
        const index = parseIndex(args[0]);
        if (index === undefined) {
          this.logger.log('Usage: delete <step index>');
        } else {
          this.session.removeBreakpoint(index);
          this.logger.log(`✓ Breakpoint removed from step ${index}`);
        }
        return true;
      }

      case 'breakpoints': {
        const { breakpoints } = this.session.snapshot();
        this.logger.log(breakpoints.length > 0 ? `Breakpoints: ${breakpoints.join(', ')}` : 'No breakpoints');
        return true;
      }

      case 'continue':
      case 'c':
      case 'resume':
        this.session.resume();
        return true;

      case 'step':
      case 'next':
      case 's':
      case 'n':
        this.session.stepOver();
        return true;

      case 'into':
        this.session.send({ type: 'step_into' });
        return true;

      case 'out':
        this.session.send({ type: 'step_out' });
        return true;

      case 'pause':
        this.session.pause();
        return true;

      case 'vars': {
        const variables = this.session.currentVariables();
        const name = args[0];
        if (name === undefined) {
          this.logger.log(JSON.stringify(variables, null, 2));
        } else if (Object.hasOwn(variables, name)) {
          this.logger.log(JSON.stringify(variables[name], null, 2));
        } else {
          this.logger.log(`Variable not set: ${name}`);
        }
        return true;
      }

      case 'set': {
        const [name, ...rest] = args;
        if (name === undefined || rest.length === 0) {
          this.logger.log('Usage: set <name> <value>');
          return true;
        }
        const rawValue = trimmed.slice(trimmed.indexOf(name, cmd.length) + name.length).trim();
        const value = parseVariableValue(rawValue);
        this.session.setVariable(name, value);
        this.logger.log(`✓ ${name} = ${JSON.stringify(value)}`);
        return true;
      }

      case 'history': {
        const history = this.session.history();
        if (history.length === 0) {
          this.logger.log('No steps executed yet');
        }
        history.forEach((record, position) => {
          const detail = record.error ? `: ${record.error}` : '';
          this.logger.log(`  ${position}. step ${record.index} ${record.stepId} ${record.status}${detail}`);
        });
        return true;
      }

      case 'at': {
        const index = parseIndex(args[0]);
        if (index === undefined) {
          this.logger.log('Usage: at <step index>');
          return true;
        }
        const variables = this.session.variablesAt(index);
        this.logger.log(variables ? JSON.stringify(variables, null, 2) : `No record for step ${index}`);
        return true;
      }

      case 'reply': {
        const pending = this.broker?.pending() ?? [];
        const [prompt] = pending;
        if (!this.broker || !prompt) {
          this.logger.log('No pending prompt');
          return true;
        }
        try {
          this.broker.respond(prompt.promptId, trimmed.slice(cmd.length).trim());
        } catch (error) {
          this.logger.error(`Reply failed: ${errorMessage(error)}`);
        }
        return true;
      }

      case 'restart':
        this.session.restart();
        return true;

      case 'stop':
      case 'quit':
      case 'exit':
        this.session.stop();
        return false;

      default:
        this.logger.log(`Unknown command: ${cmd}`);
        return true;
    }
  }

  private onEvent(event: DebugEvent, rl: readline.Interface): void {
    if (this.closed) return;
    switch (event.type) {
      case 'prompt.request':
        this.logger.log(`❓ ${event.message}\n   (answer with: reply <text>)`);
        rl.prompt();
        break;
      case 'debug.breakpoint_hit':
      case 'debug.paused':
        rl.prompt();
        break;
      case 'debug.completed':
        this.logger.log('Session completed. Use "restart" to run again or "stop" to exit.');
        rl.prompt();
        break;
      case 'debug.failed':
        this.logger.error(`✗ Step ${event.stepId} failed: ${event.reason}`);
        this.logger.log('Use "history" or "at <n>" to inspect, "restart" to run again.');
        rl.prompt();
        break;
      default:
        break;
    }
  }
}
