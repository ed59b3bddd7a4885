import type { Command } from 'commander';
import { readFileSync } from 'node:fs';
import type { Document } from '../../types/store.types.js';
import { documentListSchema } from '../../store/documents.js';
import { InvalidArgumentError } from '../../errors/store.js';
import type { ManagerFactory } from '../context.js';
import { defaultManagerFactory } from '../context.js';

function readDocuments(file: string): Document[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new InvalidArgumentError(`Cannot read documents from ${file}: ${String(err)}`);
  }
  const parsed = documentListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidArgumentError(`${file} must hold a JSON array of objects: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function registerSaveCommand(program: Command, createManager: ManagerFactory = defaultManagerFactory): void {
  program
    .command('save <partition> <file>')
    .description('Embed the documents in a JSON file and store them in a partition')
    .option('--key <path>', 'Dot-separated field to embed')
    .option('--append', 'Add to the existing partition instead of replacing it')
    .option('--memory', 'Do not write the partition to disk')
    .action(async (partition: string, file: string, opts: { key?: string; append?: boolean; memory?: boolean }) => {
      const documents = readDocuments(file);
      const manager = createManager();
      const store = await manager.save(partition, documents, {
        ...(opts.key ? { key: opts.key } : {}),
        mode: opts.append ? 'append' : 'replace',
        cache: !opts.memory,
      });
      process.stdout.write(
        `Saved ${documents.length} documents to partition '${partition}' (${store.size} total)\n`,
      );
    });
}
