/**
 * In-process stand-ins for the executor collaborators
 */
import type { ContextValue } from '../../parser/schema.ts';
import { ToolNotFoundError } from '../../utils/errors.ts';
import type { EventHandler } from '../events.ts';
import type { ExecutorServices, ProcessRequest, ProcessResult, ProcessRunner, ToolInvoker } from '../executors/types.ts';
import { PromptBroker } from '../human-input.ts';
import { PluginRegistry } from '../plugin-registry.ts';
import { WorkflowRegistry } from '../../utils/workflow-registry.ts';

export type ProcessHandler = (request: ProcessRequest) => ProcessResult | Promise<ProcessResult>;

/**
 * "echo a b" prints "a b\n", "exit n" exits with n, anything else prints nothing
 */
export const echoHandler: ProcessHandler = (request) => {
  const text = [request.executable, ...request.args].join(' ');
  const exit = /^exit (\d+)$/.exec(text);
  if (exit) {
    return { output: `exit ${exit[1]}\n`, exitCode: Number(exit[1]), truncated: false };
  }
  const output = text.startsWith('echo ') ? `${text.slice('echo '.length)}\n` : '';
  return { output, exitCode: 0, truncated: false };
};

/**
 * Never settles until the request's signal aborts
 */
export const hangingHandler: ProcessHandler = (request) =>
  new Promise<ProcessResult>((_resolve, reject) => {
    request.signal?.addEventListener('abort', () => reject(new Error('killed')), { once: true });
  });

export class FakeProcessRunner implements ProcessRunner {
  readonly requests: ProcessRequest[] = [];

  constructor(private readonly handler: ProcessHandler = echoHandler) {}

  async run(request: ProcessRequest): Promise<ProcessResult> {
    this.requests.push(request);
    return this.handler(request);
  }

  /** Command lines in the order they ran */
  get commands(): string[] {
    return this.requests.map((request) => [request.executable, ...request.args].join(' '));
  }
}

export class FakeToolInvoker implements ToolInvoker {
  readonly calls: Array<{ name: string; args: Record<string, ContextValue> }> = [];

  constructor(private readonly results: Record<string, (args: Record<string, ContextValue>) => string> = {}) {}

  async invoke(name: string, args: Record<string, ContextValue>): Promise<string> {
    const tool = this.results[name];
    if (!tool) {
      throw new ToolNotFoundError(name);
    }
    this.calls.push({ name, args });
    return tool(args);
  }
}

export interface FakeServices extends ExecutorServices {
  processRunner: FakeProcessRunner;
  tools: FakeToolInvoker;
  plugins: PluginRegistry;
  humanInput: PromptBroker;
  workflows: WorkflowRegistry;
}

export function fakeServices(
  options: { handler?: ProcessHandler; tools?: ConstructorParameters<typeof FakeToolInvoker>[0] } = {}
): FakeServices {
  return {
    processRunner: new FakeProcessRunner(options.handler),
    tools: new FakeToolInvoker(options.tools),
    plugins: new PluginRegistry(),
    humanInput: new PromptBroker(),
    workflows: new WorkflowRegistry(),
  };
}

/**
 * Resolve with the first event of a given type
 */
export function nextEvent<E extends { type: string }, T extends E['type']>(
  source: { subscribe(handler: EventHandler<E>): () => void },
  type: T
): Promise<Extract<E, { type: T }>> {
  return new Promise((resolve) => {
    const unsubscribe = source.subscribe((event) => {
      if (isEventOfType(event, type)) {
        unsubscribe();
        resolve(event);
      }
    });
  });
}

function isEventOfType<E extends { type: string }, T extends E['type']>(
  event: E,
  type: T
): event is Extract<E, { type: T }> {
  return event.type === type;
}

/**
 * Collect every event into an array
 */
export function recordEvents<E>(source: { subscribe(handler: EventHandler<E>): () => void }): E[] {
  const events: E[] = [];
  source.subscribe((event) => {
    events.push(event);
  });
  return events;
}
