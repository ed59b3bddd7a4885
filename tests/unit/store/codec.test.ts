import { describe, it, expect } from 'vitest';
import { gunzipSync, gzipSync } from 'node:zlib';
import { decode, encode, FORMAT_VERSION } from '../../../src/store/codec.js';
import { VectorStore } from '../../../src/store/vectorStore.js';
import { CorruptDataError } from '../../../src/errors/codec.js';

// Offsets into the uncompressed payload of a store with key path "text".
const VERSION_OFFSET = 4;
const METRIC_OFFSET = 10;
const FLAGS_OFFSET = 11;
const COUNT_OFFSET = 20;

function sampleStore(): VectorStore {
  const store = new VectorStore({ dim: 3, metric: 'dot', keyPath: 'text' });
  store.insertBatch(
    [[0.1, -3.25, 1e-7], [42, 0, -0.5]],
    [{ text: 'a' }, { text: 'b', meta: { tags: ['x', 'y'], n: 2, ok: true, none: null } }],
  );
  return store;
}

function rewrite(blob: Buffer, edit: (payload: Buffer) => Buffer): Buffer {
  return gzipSync(edit(Buffer.from(gunzipSync(blob))));
}

describe('codec', () => {
  it('round-trips vectors bit-exactly along with documents and settings', () => {
    const original = sampleStore();
    const restored = decode(encode(original));
    expect(restored.size).toBe(2);
    expect(restored.dim).toBe(3);
    expect(restored.metric).toBe('dot');
    expect(restored.keyPath).toBe('text');
    expect(restored.normalized).toBe(false);
    expect(restored.vectorAt(0)).toEqual(original.vectorAt(0));
    expect(restored.vectorAt(1)).toEqual(original.vectorAt(1));
    expect(restored.documentAt(1)).toEqual({
      text: 'b',
      meta: { tags: ['x', 'y'], n: 2, ok: true, none: null },
    });
  });

  it('keeps cosine vectors normalized and the flag set', () => {
    const store = new VectorStore({ dim: 2, metric: 'cosine', keyPath: 'product.name' });
    store.insertOne([3, 4], { product: { name: 'lamp' } });
    const restored = decode(encode(store));
    expect(restored.normalized).toBe(true);
    expect(restored.keyPath).toBe('product.name');
    expect(restored.vectorAt(0)).toEqual(store.vectorAt(0));
  });

  it('round-trips an empty store with its dimension', () => {
    const restored = decode(encode(new VectorStore({ dim: 5, metric: 'derrida', keyPath: 'text' })));
    expect(restored.size).toBe(0);
    expect(restored.dim).toBe(5);
    expect(restored.metric).toBe('derrida');
  });

  it('writes a gzip payload starting with the magic and version', () => {
    const payload = gunzipSync(encode(sampleStore()));
    expect(payload.subarray(0, 4).toString('ascii')).toBe('MVEC');
    expect(payload.readUInt16LE(VERSION_OFFSET)).toBe(FORMAT_VERSION);
    expect(payload.readUInt32LE(COUNT_OFFSET)).toBe(2);
  });

  it('rejects data that is not gzip', () => {
    expect(() => decode(Buffer.from('plain bytes'))).toThrow(CorruptDataError);
  });

  it('rejects a foreign magic', () => {
    expect(() => decode(gzipSync(Buffer.from('XXXXXXXXXXXXXXXXXXXXXXXX')))).toThrow(
      'Not a microvec partition file',
    );
  });

  it('rejects an unknown version', () => {
    const blob = rewrite(encode(sampleStore()), (p) => {
      p.writeUInt16LE(2, VERSION_OFFSET);
      return p;
    });
    expect(() => decode(blob)).toThrow('Unsupported format version 2');
  });

  it('rejects an unknown metric code', () => {
    const blob = rewrite(encode(sampleStore()), (p) => {
      p.writeUInt8(9, METRIC_OFFSET);
      return p;
    });
    expect(() => decode(blob)).toThrow('Unknown metric code');
  });

  it('rejects a pair count larger than the data', () => {
    const blob = rewrite(encode(sampleStore()), (p) => {
      p.writeUInt32LE(1000, COUNT_OFFSET);
      return p;
    });
    expect(() => decode(blob)).toThrow(CorruptDataError);
  });

  it('rejects a truncated payload', () => {
    const blob = rewrite(encode(sampleStore()), (p) => p.subarray(0, p.length - 1));
    expect(() => decode(blob)).toThrow(CorruptDataError);
  });

  it('rejects trailing bytes', () => {
    const blob = rewrite(encode(sampleStore()), (p) => Buffer.concat([p, Buffer.from([0])]));
    expect(() => decode(blob)).toThrow('1 trailing bytes after 2 pairs');
  });

  it('rejects a document that is not JSON', () => {
    const blob = rewrite(encode(sampleStore()), (p) => {
      p.write('[', p.indexOf('{"text":"a"}'));
      return p;
    });
    expect(() => decode(blob)).toThrow('Document 0 is not valid JSON');
  });

  it('rejects JSON that is not a document', () => {
    const blob = rewrite(encode(sampleStore()), (p) => {
      p.write('[1,2,3,4,56]', p.indexOf('{"text":"a"}'));
      return p;
    });
    expect(() => decode(blob)).toThrow(CorruptDataError);
  });

  it('rejects rows flagged as normalized that are not unit length', () => {
    const store = new VectorStore({ dim: 2, metric: 'dot', keyPath: 'text' });
    store.insertOne([3, 4], { text: 'a' });
    const blob = rewrite(encode(store), (p) => {
      p.writeUInt8(0, METRIC_OFFSET);
      p.writeUInt8(1, FLAGS_OFFSET);
      return p;
    });
    expect(() => decode(blob)).toThrow(
      'Partition data failed validation: Row 0 is not unit length under the cosine metric',
    );
    expect(() => decode(blob)).toThrow(CorruptDataError);
  });

  it('normalizes cosine rows that are not flagged as normalized', () => {
    const store = new VectorStore({ dim: 2, metric: 'dot', keyPath: 'text' });
    store.insertOne([3, 4], { text: 'a' });
    const blob = rewrite(encode(store), (p) => {
      p.writeUInt8(0, METRIC_OFFSET);
      return p;
    });
    const restored = decode(blob);
    expect(restored.metric).toBe('cosine');
    expect(Array.from(restored.vectorAt(0))).toEqual([Math.fround(0.6), Math.fround(0.8)]);
  });
});
