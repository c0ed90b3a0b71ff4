/**
 * Command module exports
 */

export { registerDebugCommand } from './debug.ts';
export { registerListCommand } from './list.ts';
export { registerRunCommand } from './run.ts';
export { registerShowCommand } from './show.ts';
export { registerValidateCommand } from './validate.ts';
export { parseBreakpoints, parseInputs } from './utils.ts';
