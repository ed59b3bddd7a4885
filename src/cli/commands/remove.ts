import type { Command } from 'commander';
import type { ManagerFactory } from '../context.js';
import { defaultManagerFactory, parseCount } from '../context.js';

export function registerRemoveCommand(program: Command, createManager: ManagerFactory = defaultManagerFactory): void {
  program
    .command('remove <partition> <index>')
    .description('Remove the document at an index from a saved partition')
    .action((partition: string, index: string) => {
      const store = createManager().open(partition);
      const removed = store.remove(parseCount(index, 'index'), { cache: true });
      process.stdout.write(`Removed ${JSON.stringify(removed)}; ${store.size} documents remain\n`);
    });
}
