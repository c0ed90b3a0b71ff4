import { z } from 'zod';
import { LIMITS, TIMEOUTS } from '../utils/constants.ts';

export const ConfigSchema = z.object({
  /** Directories scanned for *.yaml / *.yml workflow definitions */
  workflow_dirs: z.array(z.string()).default([]),
  /** Shell used for command steps without an argument list */
  shell: z.string().default('/bin/sh'),
  max_output_bytes: z.number().int().positive().default(LIMITS.MAX_PROCESS_OUTPUT_BYTES),
  /** Sub-workflow recursion limit */
  max_depth: z.number().int().positive().default(LIMITS.MAX_WORKFLOW_DEPTH),
  retry: z
    .object({
      base_delay_ms: z.number().int().nonnegative().default(TIMEOUTS.DEFAULT_RETRY_BASE_DELAY_MS),
    })
    .default({}),
  prompts: z
    .object({
      // null waits for a reply without bound
      timeout_ms: z.number().int().positive().max(LIMITS.MAX_TIMER_MS).nullable().default(null),
    })
    .default({}),
  debug: z
    .object({
      history_limit: z.number().int().positive().default(LIMITS.MAX_DEBUG_HISTORY),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}
