#!/usr/bin/env -S node --import tsx
import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import {
  registerDebugCommand,
  registerListCommand,
  registerRunCommand,
  registerShowCommand,
  registerValidateCommand,
} from './commands/index.ts';
import { isRecord } from './utils/guards.ts';

function packageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  return isRecord(pkg) && typeof pkg.version === 'string' ? pkg.version : '0.0.0';
}

const program = new Command();

program
  .name('stepdeck')
  .description('Declarative workflow runner with an interactive step debugger')
  .version(packageVersion());

registerRunCommand(program);
registerDebugCommand(program);
registerValidateCommand(program);
registerListCommand(program);
registerShowCommand(program);

await program.parseAsync(process.argv);
