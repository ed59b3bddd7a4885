import type { Command } from 'commander';
import type { ManagerFactory } from '../context.js';
import { defaultManagerFactory } from '../context.js';

export function registerDeleteCommand(program: Command, createManager: ManagerFactory = defaultManagerFactory): void {
  program
    .command('delete <partition>')
    .description("Delete a partition's cache file")
    .action((partition: string) => {
      const deleted = createManager().delete(partition);
      process.stdout.write(
        deleted ? `Deleted partition '${partition}'\n` : `Partition '${partition}' does not exist\n`,
      );
    });
}
