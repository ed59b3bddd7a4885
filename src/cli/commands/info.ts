import type { Command } from 'commander';
import type { ManagerFactory } from '../context.js';
import { defaultManagerFactory } from '../context.js';

export function registerInfoCommand(program: Command, createManager: ManagerFactory = defaultManagerFactory): void {
  program
    .command('info <partition>')
    .description('Show size, dimension, metric and key of a saved partition')
    .action((partition: string) => {
      const store = createManager().open(partition);
      process.stdout.write(
        [
          `partition: ${store.partition}`,
          `path:      ${store.path ?? '(memory)'}`,
          `documents: ${store.size}`,
          `dimension: ${store.dim}`,
          `metric:    ${store.metric}`,
          `key:       ${store.key}`,
        ].join('\n') + '\n',
      );
    });
}
