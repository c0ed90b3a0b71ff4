import * as readlinePromises from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';
import { PromptCanceledError, PromptNotPendingError, PromptTimeoutError } from '../utils/errors.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import type { WorkflowEvent } from './events.ts';
import type { HumanInputBridge, PromptOptions, PromptRequest } from './executors/types.ts';

interface PendingPrompt {
  prompt: PromptRequest;
  settle: (outcome: { ok: true; text: string } | { ok: false; error: Error }) => void;
}

/**
 * In-process human-input bridge. Each request is settled by exactly one
 * respond(), cancel(), timeout or abort.
 */
export class PromptBroker implements HumanInputBridge {
  private prompts = new Map<string, PendingPrompt>();

  request(prompt: PromptRequest, options: PromptOptions): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      if (options.signal?.aborted) {
        reject(new PromptCanceledError(prompt.promptId));
        return;
      }

      let timer: NodeJS.Timeout | undefined;
      const onAbort = (): void => settle({ ok: false, error: new PromptCanceledError(prompt.promptId) });

      const settle: PendingPrompt['settle'] = (outcome) => {
        if (!this.prompts.has(prompt.promptId)) return;
        this.prompts.delete(prompt.promptId);
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
        if (outcome.ok) {
          resolve(outcome.text);
        } else {
          reject(outcome.error);
        }
      };

      this.prompts.set(prompt.promptId, { prompt, settle });

      if (options.timeoutMs !== null) {
        const timeoutMs = options.timeoutMs;
        timer = setTimeout(() => settle({ ok: false, error: new PromptTimeoutError(prompt.promptId, timeoutMs) }), timeoutMs);
      }
      options.signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * @throws PromptNotPendingError for unknown or already answered ids
   */
  respond(promptId: string, text: string): void {
    const entry = this.prompts.get(promptId);
    if (!entry) {
      throw new PromptNotPendingError(promptId);
    }
    entry.settle({ ok: true, text });
  }

  cancel(promptId: string): void {
    const entry = this.prompts.get(promptId);
    if (!entry) {
      throw new PromptNotPendingError(promptId);
    }
    entry.settle({ ok: false, error: new PromptCanceledError(promptId) });
  }

  pending(): PromptRequest[] {
    return [...this.prompts.values()].map((entry) => entry.prompt);
  }
}

export interface TerminalResponderOptions {
  input?: Readable;
  output?: Writable;
  logger?: Logger;
}

/**
 * Event handler that answers prompt.request events from a terminal
 */
export function createTerminalResponder(
  broker: PromptBroker,
  options: TerminalResponderOptions = {}
): (event: WorkflowEvent) => Promise<void> {
  const logger = options.logger ?? new ConsoleLogger();
  return async (event) => {
    if (event.type !== 'prompt.request') return;
    const rl = readlinePromises.createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
    });
    try {
      const answer = await rl.question(`  ❓ ${event.message} `);
      broker.respond(event.promptId, answer);
      logger.log(`  ✓ Received human input: ${answer}`);
    } finally {
      rl.close();
    }
  };
}
