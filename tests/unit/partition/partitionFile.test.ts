import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  deletePartitionFile,
  readPartitionFile,
  writePartitionFile,
} from '../../../src/partition/partitionFile.js';
import { VectorStore } from '../../../src/store/vectorStore.js';
import { IOFailureError } from '../../../src/errors/io.js';
import { CorruptDataError } from '../../../src/errors/codec.js';

function makeStore(): VectorStore {
  const store = new VectorStore({ dim: 2, metric: 'euclidean', keyPath: 'text' });
  store.insertBatch([[1, 2], [3, 4]], [{ text: 'a' }, { text: 'b' }]);
  return store;
}

describe('partition files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'microvec-file-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads back what was written', () => {
    const path = join(dir, 'nested', 'p.mvec.gz');
    writePartitionFile(path, makeStore());
    const restored = readPartitionFile(path);
    expect(restored?.size).toBe(2);
    expect(restored?.documentAt(1)).toEqual({ text: 'b' });
  });

  it('returns null for a missing file', () => {
    expect(readPartitionFile(join(dir, 'missing.mvec.gz'))).toBeNull();
  });

  it('reports a corrupt file as CorruptDataError', () => {
    const path = join(dir, 'bad.mvec.gz');
    writeFileSync(path, 'not a partition');
    expect(() => readPartitionFile(path)).toThrow(CorruptDataError);
  });

  it('reports an unreadable path as IOFailureError', () => {
    expect(() => readPartitionFile(dir)).toThrow(IOFailureError);
  });

  it('overwrites an existing file', () => {
    const path = join(dir, 'p.mvec.gz');
    writePartitionFile(path, makeStore());
    const smaller = new VectorStore({ dim: 2, metric: 'euclidean', keyPath: 'text' });
    smaller.insertOne([9, 9], { text: 'only' });
    writePartitionFile(path, smaller);
    expect(readPartitionFile(path)?.size).toBe(1);
    expect(readdirSync(dir)).toEqual(['p.mvec.gz']);
  });

  it('fails with IOFailureError and leaves no temp file when the rename fails', () => {
    const path = join(dir, 'p.mvec.gz');
    mkdirSync(path);
    writeFileSync(join(path, 'keep'), 'x');
    expect(() => writePartitionFile(path, makeStore())).toThrow(IOFailureError);
    expect(readdirSync(dir)).toEqual(['p.mvec.gz']);
    expect(readdirSync(path)).toEqual(['keep']);
  });

  it('carries the target path on IOFailureError', () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'x');
    const path = join(blocker, 'sub', 'p.mvec.gz');
    try {
      writePartitionFile(path, makeStore());
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(IOFailureError);
      expect(err instanceof IOFailureError && err.path).toBe(path);
    }
  });

  it('delete reports whether a file was removed', () => {
    const path = join(dir, 'p.mvec.gz');
    writePartitionFile(path, makeStore());
    expect(deletePartitionFile(path)).toBe(true);
    expect(deletePartitionFile(path)).toBe(false);
    expect(readPartitionFile(path)).toBeNull();
  });
});
