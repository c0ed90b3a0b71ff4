import { spawn } from 'node:child_process';
import { TextDecoder } from 'node:util';
import { LIMITS, TIMEOUTS, TRUNCATION_SUFFIX } from '../utils/constants.ts';
import type { ProcessRequest, ProcessResult, ProcessRunner } from './executors/types.ts';

export const SENSITIVE_ENV_PATTERNS = [
  /^.*_(API_KEY|SECRET|TOKEN|PASSWORD|CREDENTIAL|PRIVATE_KEY)(_.*)?$/i,
  /^(API_KEY|AUTH_TOKEN|SECRET_KEY|PRIVATE_KEY|PASSWORD|CREDENTIALS?)(_.*)?$/i,
  /^.*_AUTH_(TOKEN|KEY|SECRET)(_.*)?$/i,
];

/**
 * Copy of the host environment without variables that look like credentials
 */
export function filterSensitiveEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const filtered: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue;
    if (!SENSITIVE_ENV_PATTERNS.some((pattern) => pattern.test(key))) {
      filtered[key] = value;
    }
  }
  return filtered;
}

export interface NodeProcessRunnerOptions {
  maxOutputBytes?: number;
  /** Pass credential-like host variables through to children */
  inheritSensitiveEnv?: boolean;
  killGraceMs?: number;
}

/**
 * Spawns commands with node:child_process. stdout and stderr are merged into
 * one capped text stream.
 */
export class NodeProcessRunner implements ProcessRunner {
  private readonly maxOutputBytes: number;
  private readonly inheritSensitiveEnv: boolean;
  private readonly killGraceMs: number;

  constructor(options: NodeProcessRunnerOptions = {}) {
    this.maxOutputBytes = options.maxOutputBytes ?? LIMITS.MAX_PROCESS_OUTPUT_BYTES;
    this.inheritSensitiveEnv = options.inheritSensitiveEnv ?? false;
    this.killGraceMs = options.killGraceMs ?? TIMEOUTS.PROCESS_KILL_GRACE_MS;
  }

  run(request: ProcessRequest): Promise<ProcessResult> {
    const hostEnv = this.inheritSensitiveEnv ? { ...process.env } : filterSensitiveEnv(process.env);
    const [file, argv]: [string, string[]] =
      request.args.length > 0 ? [request.executable, request.args] : [request.shell, ['-c', request.executable]];

    return new Promise<ProcessResult>((resolve, reject) => {
      if (request.signal?.aborted) {
        reject(abortReason(request.signal));
        return;
      }

      const child = spawn(file, argv, {
        cwd: request.cwd,
        env: { ...hostEnv, ...request.env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let output = '';
      let bytes = 0;
      let truncated = false;
      let killTimer: NodeJS.Timeout | undefined;

      // one streaming decoder per pipe
      const collect =
        (decoder: TextDecoder) =>
        (chunk: Buffer): void => {
          if (truncated) return;
          const remaining = this.maxOutputBytes - bytes;
          const kept = chunk.length > remaining ? chunk.subarray(0, remaining) : chunk;
          // a character cut by the cap stays buffered in the decoder and is dropped
          const text = decoder.decode(kept, { stream: true });
          output += text;
          bytes += kept.length;
          if (text) request.onOutput?.(text);
          if (kept !== chunk) {
            output += TRUNCATION_SUFFIX;
            truncated = true;
          }
        };
      const stdoutDecoder = new TextDecoder();
      const stderrDecoder = new TextDecoder();

      const onAbort = (): void => {
        child.kill('SIGTERM');
        killTimer = setTimeout(() => child.kill('SIGKILL'), this.killGraceMs);
        killTimer.unref();
      };

      child.stdout.on('data', collect(stdoutDecoder));
      child.stderr.on('data', collect(stderrDecoder));
      request.signal?.addEventListener('abort', onAbort, { once: true });

      child.on('error', (error) => {
        request.signal?.removeEventListener('abort', onAbort);
        clearTimeout(killTimer);
        reject(error);
      });

      child.on('close', (code, signal) => {
        request.signal?.removeEventListener('abort', onAbort);
        clearTimeout(killTimer);
        if (request.signal?.aborted) {
          reject(abortReason(request.signal));
          return;
        }
        if (!truncated) {
          output += stdoutDecoder.decode() + stderrDecoder.decode();
        }
        resolve({ output, exitCode: code ?? (signal ? 1 : 0), truncated });
      });
    });
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Command aborted');
}
