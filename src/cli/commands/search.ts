import type { Command } from 'commander';
import type { ManagerFactory } from '../context.js';
import { defaultManagerFactory, parseCount } from '../context.js';

export function registerSearchCommand(program: Command, createManager: ManagerFactory = defaultManagerFactory): void {
  program
    .command('search <partition> <term>')
    .description('Search a saved partition')
    .option('--top <n>', 'Max results (default: defaultTopK from config)')
    .action(async (partition: string, term: string, opts: { top?: string }) => {
      const manager = createManager();
      const topK = opts.top === undefined ? undefined : parseCount(opts.top, '--top');
      const results = await manager.search(term, partition, topK);
      if (results.length === 0) {
        process.stdout.write(`No results found for: ${term}\n`);
        return;
      }
      process.stdout.write(`${JSON.stringify(results, null, 2)}\n`);
    });
}
