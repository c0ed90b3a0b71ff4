import { mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import type { ContextValue } from '../parser/schema.ts';
import { LIMITS } from '../utils/constants.ts';
import { ProcessExitError, ToolNotFoundError } from '../utils/errors.ts';
import type { ProcessRunner, ToolInvoker } from './executors/types.ts';
import { NodeProcessRunner } from './process-runner.ts';

export interface ToolContext {
  cwd: string;
  shell: string;
  processRunner: ProcessRunner;
  signal?: AbortSignal;
  changeDirectory: (path: string) => void;
}

export interface RegisteredTool {
  name: string;
  description: string;
  run(args: unknown, context: ToolContext): Promise<string>;
}

/**
 * Bind a zod parameter schema to a tool implementation
 */
export function defineTool<T>(spec: {
  name: string;
  description: string;
  parameters: z.ZodType<T, z.ZodTypeDef, unknown>;
  execute: (args: T, context: ToolContext) => Promise<string>;
}): RegisteredTool {
  return {
    name: spec.name,
    description: spec.description,
    run: async (args, context) => {
      const parsed = spec.parameters.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
        throw new Error(`Invalid arguments for tool ${spec.name}: ${issues.join('; ')}`);
      }
      return spec.execute(parsed.data, context);
    },
  };
}

export const STANDARD_TOOLS: RegisteredTool[] = [
  defineTool({
    name: 'list_files',
    description: 'List the entries of a directory, directories suffixed with /',
    parameters: z.object({ path: z.string().default('.') }),
    execute: async ({ path }, context) => {
      const entries = await readdir(resolve(context.cwd, path), { withFileTypes: true });
      return entries
        .map((entry) => (entry.isDirectory() ? `${entry.name}/` : entry.name))
        .sort()
        .join('\n');
    },
  }),
  defineTool({
    name: 'read_file',
    description: 'Read the contents of a file',
    parameters: z.object({ path: z.string().min(1) }),
    execute: async ({ path }, context) => {
      const target = resolve(context.cwd, path);
      const info = await stat(target);
      if (info.size > LIMITS.MAX_FILE_READ_BYTES) {
        throw new Error(`File ${path} is larger than ${LIMITS.MAX_FILE_READ_BYTES} bytes`);
      }
      return readFile(target, 'utf-8');
    },
  }),
  defineTool({
    name: 'write_file',
    description: 'Write or overwrite a file with content',
    parameters: z.object({ path: z.string().min(1), content: z.string() }),
    execute: async ({ path, content }, context) => {
      const target = resolve(context.cwd, path);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, 'utf-8');
      return `Wrote ${Buffer.byteLength(content)} bytes to ${path}`;
    },
  }),
  defineTool({
    name: 'execute_command',
    description: 'Run a command and return its merged output',
    parameters: z.object({ command: z.string().min(1), args: z.array(z.string()).default([]) }),
    execute: async ({ command, args }, context) => {
      const result = await context.processRunner.run({
        executable: command,
        args,
        shell: context.shell,
        cwd: context.cwd,
        env: {},
        signal: context.signal,
      });
      if (result.exitCode !== 0) {
        throw new ProcessExitError(result.exitCode, result.output);
      }
      return result.output;
    },
  }),
  defineTool({
    name: 'change_directory',
    description: 'Change the working directory used by later tool calls',
    parameters: z.object({ path: z.string().min(1) }),
    execute: async ({ path }, context) => {
      const target = resolve(context.cwd, path);
      const info = await stat(target);
      if (!info.isDirectory()) {
        throw new Error(`Not a directory: ${path}`);
      }
      context.changeDirectory(target);
      return `Changed directory to ${target}`;
    },
  }),
];

export interface ToolRegistryOptions {
  cwd?: string;
  shell?: string;
  processRunner?: ProcessRunner;
  /** Register STANDARD_TOOLS (default true) */
  standardTools?: boolean;
}

/**
 * Named tools invoked by tool_call steps
 */
export class ToolRegistry implements ToolInvoker {
  private tools = new Map<string, RegisteredTool>();
  private cwd: string;
  private readonly shell: string;
  private readonly processRunner: ProcessRunner;

  constructor(options: ToolRegistryOptions = {}) {
    this.cwd = resolve(options.cwd ?? process.cwd());
    this.shell = options.shell ?? '/bin/sh';
    this.processRunner = options.processRunner ?? new NodeProcessRunner();
    if (options.standardTools ?? true) {
      for (const tool of STANDARD_TOOLS) this.register(tool);
    }
  }

  register(tool: RegisteredTool): void {
    this.tools.set(tool.name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): Array<{ name: string; description: string }> {
    return [...this.tools.values()].map(({ name, description }) => ({ name, description }));
  }

  get workingDirectory(): string {
    return this.cwd;
  }

  async invoke(name: string, args: Record<string, ContextValue>, signal?: AbortSignal): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }
    return tool.run(args, {
      cwd: this.cwd,
      shell: this.shell,
      processRunner: this.processRunner,
      signal,
      changeDirectory: (path) => {
        this.cwd = path;
      },
    });
  }
}
