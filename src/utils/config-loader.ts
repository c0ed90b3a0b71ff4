import { existsSync, readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { type Config, ConfigSchema } from '../parser/config-schema.ts';
import { isRecord } from './guards.ts';
import { ConsoleLogger, type Logger } from './logger.ts';
import { PathResolver } from './paths.ts';

export class ConfigLoader {
  private static instance: Config | undefined;
  private static logger: Logger = new ConsoleLogger();

  static deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const output = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = output[key];
      if (isRecord(incoming) && isRecord(existing)) {
        output[key] = ConfigLoader.deepMerge(existing, incoming);
      } else {
        output[key] = incoming;
      }
    }
    return output;
  }

  /**
   * Replace ${VAR} and $VAR with values from the environment
   */
  static interpolateEnv(content: string, env: NodeJS.ProcessEnv = process.env): string {
    return content.replace(/\$\{([^}]+)\}|\$([a-zA-Z_][a-zA-Z0-9_]*)/g, (_match, braced?: string, bare?: string) => {
      const name = braced ?? bare ?? '';
      return env[name] ?? '';
    });
  }

  /**
   * Load and cache the merged configuration.
   * Later entries of PathResolver.getConfigPaths() are overridden by earlier ones.
   */
  static load(logger: Logger = ConfigLoader.logger, cwd = process.cwd()): Config {
    if (ConfigLoader.instance) return ConfigLoader.instance;

    let merged: Record<string, unknown> = {};
    for (const path of [...PathResolver.getConfigPaths(cwd)].reverse()) {
      if (!existsSync(path)) continue;
      try {
        const content = ConfigLoader.interpolateEnv(readFileSync(path, 'utf-8'));
        const parsed: unknown = yaml.load(content);
        if (isRecord(parsed)) {
          merged = ConfigLoader.deepMerge(merged, parsed);
        }
      } catch (error) {
        logger.warn(`Warning: Failed to load config from ${path}: ${String(error)}`);
      }
    }

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      logger.warn(`Warning: Invalid configuration, using defaults: ${result.error.message}`);
      ConfigLoader.instance = ConfigSchema.parse({});
    } else {
      ConfigLoader.instance = result.data;
    }
    return ConfigLoader.instance;
  }

  /**
   * For testing purposes, manually set the configuration
   */
  static setConfig(config: Config): void {
    ConfigLoader.instance = config;
  }

  static setLogger(logger: Logger): void {
    ConfigLoader.logger = logger;
  }

  /**
   * For testing purposes, clear the cached configuration
   */
  static clear(): void {
    ConfigLoader.instance = undefined;
  }
}
