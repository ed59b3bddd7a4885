import type { Command } from 'commander';
import type { ManagerFactory } from '../context.js';
import { defaultManagerFactory } from '../context.js';

export function registerExportCommand(program: Command, createManager: ManagerFactory = defaultManagerFactory): void {
  program
    .command('export <partition>')
    .description('Print the documents of a saved partition as JSON')
    .option('--vectors', 'Include the stored vectors')
    .action((partition: string, opts: { vectors?: boolean }) => {
      const records = createManager().open(partition).toRecords({ vectors: opts.vectors ?? false });
      process.stdout.write(`${JSON.stringify(records, null, 2)}\n`);
    });
}
