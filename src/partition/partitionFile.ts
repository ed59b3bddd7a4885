import { mkdirSync, readFileSync, renameSync, rmSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import { IOFailureError } from '../errors/io.js';
import { decode, encode } from '../store/codec.js';
import type { VectorStore } from '../store/vectorStore.js';

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Loads a partition file, or returns null when there is none. */
export function readPartitionFile(path: string): VectorStore | null {
  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return null;
    throw new IOFailureError(`Failed to read partition file ${path}`, path, err);
  }
  return decode(bytes);
}

/**
 * Replaces the partition file in one step: the blob goes to a sibling temp file
 * that is then renamed over the target, so a failed write leaves the old file.
 */
export function writePartitionFile(path: string, store: VectorStore): void {
  const blob = encode(store);
  const tmp = `${path}.${process.pid}.${randomUUID()}.tmp`;
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(tmp, blob);
    renameSync(tmp, path);
  } catch (err) {
    rmSync(tmp, { force: true });
    throw new IOFailureError(`Failed to write partition file ${path}`, path, err);
  }
}

/** Returns false when there was no file to delete. */
export function deletePartitionFile(path: string): boolean {
  try {
    unlinkSync(path);
    return true;
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return false;
    throw new IOFailureError(`Failed to delete partition file ${path}`, path, err);
  }
}
