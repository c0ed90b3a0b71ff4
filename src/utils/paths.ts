import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export class PathResolver {
  /**
   * Project-local .stepdeck directory
   */
  static getProjectDir(cwd = process.cwd()): string {
    return resolve(cwd, '.stepdeck');
  }

  /**
   * $XDG_CONFIG_HOME/stepdeck or ~/.config/stepdeck
   */
  static getUserConfigDir(): string {
    const xdgConfigHome = process.env.XDG_CONFIG_HOME;
    if (xdgConfigHome) {
      return join(xdgConfigHome, 'stepdeck');
    }
    return join(homedir(), '.config', 'stepdeck');
  }

  /**
   * Configuration file candidates, highest precedence first
   */
  static getConfigPaths(cwd = process.cwd()): string[] {
    const paths: string[] = [];

    if (process.env.STEPDECK_CONFIG) {
      paths.push(resolve(cwd, process.env.STEPDECK_CONFIG));
    }

    const projectDir = PathResolver.getProjectDir(cwd);
    paths.push(join(projectDir, 'config.yaml'));
    paths.push(join(projectDir, 'config.yml'));

    const userConfigDir = PathResolver.getUserConfigDir();
    paths.push(join(userConfigDir, 'config.yaml'));
    paths.push(join(userConfigDir, 'config.yml'));

    return paths;
  }

  /**
   * Workflow directories searched when none are configured
   */
  static getDefaultWorkflowDirs(cwd = process.cwd()): string[] {
    return [join(PathResolver.getProjectDir(cwd), 'workflows'), join(PathResolver.getUserConfigDir(), 'workflows')];
  }
}
