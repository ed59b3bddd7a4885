import { Command } from 'commander';
import type { ManagerFactory } from './context.js';
import { defaultManagerFactory } from './context.js';
import { registerSaveCommand } from './commands/save.js';
import { registerSearchCommand } from './commands/search.js';
import { registerRemoveCommand } from './commands/remove.js';
import { registerDeleteCommand } from './commands/delete.js';
import { registerInfoCommand } from './commands/info.js';
import { registerExportCommand } from './commands/export.js';

export interface ProgramInfo {
  version: string;
  description: string;
}

export function createProgram(
  info: ProgramInfo,
  createManager: ManagerFactory = defaultManagerFactory,
): Command {
  const program = new Command();

  program
    .name('microvec')
    .description(info.description)
    .version(info.version);

  registerSaveCommand(program, createManager);
  registerSearchCommand(program, createManager);
  registerRemoveCommand(program, createManager);
  registerDeleteCommand(program, createManager);
  registerInfoCommand(program, createManager);
  registerExportCommand(program, createManager);

  return program;
}
