import { type ContextValue, ContextValueSchema, isContextObject } from '../../parser/schema.ts';
import { ToolCallAssemblyError } from '../../utils/errors.ts';

// Upper bound on the accumulated argument text of one call (1MB)
const MAX_ARGUMENT_SIZE = 1024 * 1024;

/**
 * One streamed fragment of a tool call, shaped like an OpenAI-style delta
 */
export type ToolCallDelta = {
  index: number;
  id?: string;
  function?: {
    name?: string;
    arguments?: string;
  };
};

export type ToolCallState = 'open' | 'complete' | 'failed';

export interface AssembledToolCall {
  index: number;
  id: string;
  name: string;
  arguments: Record<string, ContextValue>;
}

interface PendingToolCall {
  index: number;
  id: string;
  name: string;
  argumentText: string;
  state: ToolCallState;
}

/**
 * Accumulates streamed tool-call fragments per provider index. Arguments are
 * parsed only when a call is completed, so partial JSON never reaches a tool.
 */
export class ToolCallAssembler {
  private calls = new Map<number, PendingToolCall>();
  private ready: AssembledToolCall[] = [];

  constructor(private readonly maxArgumentSize = MAX_ARGUMENT_SIZE) {}

  append(delta: ToolCallDelta): void {
    let call = this.calls.get(delta.index);
    if (!call) {
      call = { index: delta.index, id: '', name: '', argumentText: '', state: 'open' };
      this.calls.set(delta.index, call);
    }
    if (call.state !== 'open') {
      throw new ToolCallAssemblyError(String(delta.index), `received a fragment after it was ${call.state}`);
    }

    if (delta.id && !call.id) call.id = delta.id;
    if (delta.function?.name) call.name += delta.function.name;
    if (delta.function?.arguments) {
      if (call.argumentText.length + delta.function.arguments.length > this.maxArgumentSize) {
        call.state = 'failed';
        throw new ToolCallAssemblyError(
          String(delta.index),
          `arguments exceed maximum size of ${this.maxArgumentSize} bytes`
        );
      }
      call.argumentText += delta.function.arguments;
    }
  }

  /**
   * Finalize one call and parse its arguments.
   *
   * @throws ToolCallAssemblyError when the call is unknown, has no name or its arguments are not a JSON object.
   *   Other calls are unaffected.
   */
  complete(index: number): AssembledToolCall {
    const call = this.calls.get(index);
    const key = String(index);
    if (!call) {
      throw new ToolCallAssemblyError(key, 'no fragments received');
    }
    if (call.state !== 'open') {
      throw new ToolCallAssemblyError(key, `already ${call.state}`);
    }

    call.state = 'failed';
    if (call.name === '') {
      throw new ToolCallAssemblyError(key, 'missing function name');
    }

    let parsed: unknown;
    try {
      parsed = call.argumentText.trim() === '' ? {} : JSON.parse(call.argumentText);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ToolCallAssemblyError(key, `malformed arguments (${detail})`);
    }

    const result = ContextValueSchema.safeParse(parsed);
    if (!result.success || !isContextObject(result.data)) {
      throw new ToolCallAssemblyError(key, 'arguments must be a JSON object');
    }

    call.state = 'complete';
    const assembled: AssembledToolCall = {
      index,
      id: call.id || `call_${index}`,
      name: call.name,
      arguments: result.data,
    };
    this.ready.push(assembled);
    return assembled;
  }

  /**
   * Complete every open call. Failures are collected per call.
   */
  completeAll(): { calls: AssembledToolCall[]; errors: ToolCallAssemblyError[] } {
    const calls: AssembledToolCall[] = [];
    const errors: ToolCallAssemblyError[] = [];
    const open = [...this.calls.values()].filter((call) => call.state === 'open').sort((a, b) => a.index - b.index);
    for (const call of open) {
      try {
        calls.push(this.complete(call.index));
      } catch (error) {
        if (!(error instanceof ToolCallAssemblyError)) throw error;
        errors.push(error);
      }
    }
    return { calls, errors };
  }

  /**
   * Completed calls in completion order, removed from the assembler
   */
  drain(): AssembledToolCall[] {
    const drained = this.ready;
    this.ready = [];
    for (const call of drained) {
      this.calls.delete(call.index);
    }
    return drained;
  }

  state(index: number): ToolCallState | undefined {
    return this.calls.get(index)?.state;
  }

  get openCount(): number {
    return [...this.calls.values()].filter((call) => call.state === 'open').length;
  }
}
