import type { ContextValue } from '../parser/schema.ts';
import { PluginActionNotFoundError, PluginNotFoundError } from '../utils/errors.ts';
import type { PluginHost } from './executors/types.ts';

export type PluginAction = (args: Record<string, ContextValue>, signal?: AbortSignal) => Promise<string>;

export interface Plugin {
  name: string;
  description?: string;
  actions: Record<string, PluginAction>;
}

/**
 * Hosts plugins registered at startup and dispatches plugin_action steps to them
 */
export class PluginRegistry implements PluginHost {
  private plugins = new Map<string, Plugin>();

  constructor(plugins: Plugin[] = []) {
    for (const plugin of plugins) this.register(plugin);
  }

  register(plugin: Plugin): void {
    this.plugins.set(plugin.name, plugin);
  }

  unregister(name: string): boolean {
    return this.plugins.delete(name);
  }

  list(): Array<{ name: string; actions: string[] }> {
    return [...this.plugins.values()].map((plugin) => ({ name: plugin.name, actions: Object.keys(plugin.actions) }));
  }

  async invoke(
    pluginName: string,
    actionName: string,
    args: Record<string, ContextValue>,
    signal?: AbortSignal
  ): Promise<string> {
    const plugin = this.plugins.get(pluginName);
    if (!plugin) {
      throw new PluginNotFoundError(pluginName);
    }
    if (!Object.hasOwn(plugin.actions, actionName)) {
      throw new PluginActionNotFoundError(pluginName, actionName);
    }
    return plugin.actions[actionName](args, signal);
  }
}
