import { createHash } from 'node:crypto';
import { join } from 'node:path';

export const PARTITION_FILE_SUFFIX = '.mvec.gz';

/**
 * File stem for a partition name. Names that are already a clean slug map to
 * themselves; any other name gets a `~` and a hash suffix. Slugs never contain
 * `~`, so two names never share a file.
 */
export function partitionFileStem(partition: string): string {
  const slug = partition
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_')
    .replace(/[^a-z0-9_-]/g, '');
  if (slug === partition && slug !== '') return slug;
  const digest = createHash('sha256').update(partition, 'utf8').digest('hex').slice(0, 12);
  return `${slug}~${digest}`;
}

export function partitionFilePath(cacheDir: string, partition: string): string {
  return join(cacheDir, `${partitionFileStem(partition)}${PARTITION_FILE_SUFFIX}`);
}
