import { gunzipSync, gzipSync } from 'node:zlib';
import type { Document, Metric, StoreSnapshot } from '../types/store.types.js';
import { CorruptDataError } from '../errors/codec.js';
import { MicrovecError } from '../errors/base.js';
import { documentSchema } from './documents.js';
import { VectorStore } from './vectorStore.js';

export const FORMAT_VERSION = 1;

const MAGIC = Buffer.from('MVEC', 'ascii');

const METRIC_CODES: Record<Metric, number> = {
  cosine: 0,
  dot: 1,
  euclidean: 2,
  derrida: 3,
};

const METRIC_BY_CODE: readonly Metric[] = ['cosine', 'dot', 'euclidean', 'derrida'];

const FLAG_NORMALIZED = 0b1;

class BlobWriter {
  private readonly chunks: Buffer[] = [];

  bytes(value: Buffer): void {
    this.chunks.push(value);
  }

  u8(value: number): void {
    const buf = Buffer.alloc(1);
    buf.writeUInt8(value);
    this.chunks.push(buf);
  }

  u16(value: number): void {
    const buf = Buffer.alloc(2);
    buf.writeUInt16LE(value);
    this.chunks.push(buf);
  }

  u32(value: number): void {
    const buf = Buffer.alloc(4);
    buf.writeUInt32LE(value);
    this.chunks.push(buf);
  }

  string(value: string): void {
    const encoded = Buffer.from(value, 'utf8');
    this.u32(encoded.length);
    this.chunks.push(encoded);
  }

  floats(values: Float32Array): void {
    const buf = Buffer.alloc(values.length * 4);
    values.forEach((v, i) => buf.writeFloatLE(v, i * 4));
    this.chunks.push(buf);
  }

  finish(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

class BlobReader {
  private offset = 0;

  constructor(private readonly buf: Buffer) {}

  get remaining(): number {
    return this.buf.length - this.offset;
  }

  private take(length: number, what: string): Buffer {
    if (length > this.remaining) {
      throw new CorruptDataError(`Unexpected end of data while reading ${what}`);
    }
    const slice = this.buf.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  u8(what: string): number {
    return this.take(1, what).readUInt8();
  }

  u16(what: string): number {
    return this.take(2, what).readUInt16LE();
  }

  u32(what: string): number {
    return this.take(4, what).readUInt32LE();
  }

  bytes(length: number, what: string): Buffer {
    return this.take(length, what);
  }

  string(what: string): string {
    const length = this.u32(`${what} length`);
    return this.take(length, what).toString('utf8');
  }

  floats(count: number, what: string): Float32Array {
    const raw = this.take(count * 4, what);
    const out = new Float32Array(count);
    for (let i = 0; i < count; i++) {
      out[i] = raw.readFloatLE(i * 4);
    }
    return out;
  }
}

/** Serializes a store into a gzip-compressed, versioned blob. */
export function encode(store: VectorStore): Buffer {
  const snapshot = store.toSnapshot();
  const writer = new BlobWriter();
  writer.bytes(MAGIC);
  writer.u16(FORMAT_VERSION);
  writer.u32(snapshot.dim);
  writer.u8(METRIC_CODES[snapshot.metric]);
  writer.u8(snapshot.normalized ? FLAG_NORMALIZED : 0);
  writer.string(snapshot.keyPath);
  writer.u32(snapshot.documents.length);
  snapshot.vectors.forEach((vector, i) => {
    writer.floats(vector);
    writer.string(JSON.stringify(snapshot.documents[i]));
  });
  return gzipSync(writer.finish());
}

function parseDocument(json: string, index: number): Document {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new CorruptDataError(`Document ${index} is not valid JSON`, err);
  }
  const parsed = documentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CorruptDataError(`Document ${index} is not a document: ${parsed.error.message}`);
  }
  return parsed.data;
}

function readSnapshot(payload: Buffer): StoreSnapshot {
  const reader = new BlobReader(payload);
  if (!reader.bytes(MAGIC.length, 'magic').equals(MAGIC)) {
    throw new CorruptDataError('Not a microvec partition file');
  }
  const version = reader.u16('version');
  if (version !== FORMAT_VERSION) {
    throw new CorruptDataError(`Unsupported format version ${version}`);
  }
  const dim = reader.u32('dimension');
  const metric = METRIC_BY_CODE[reader.u8('metric')];
  if (metric === undefined) {
    throw new CorruptDataError('Unknown metric code');
  }
  const normalized = (reader.u8('flags') & FLAG_NORMALIZED) !== 0;
  const keyPath = reader.string('key path');
  const count = reader.u32('pair count');

  // Every pair carries at least its vector and a 4-byte document length.
  if (count * (dim * 4 + 4) > reader.remaining) {
    throw new CorruptDataError(`Declared ${count} pairs of dimension ${dim} exceed the data size`);
  }

  const vectors: Float32Array[] = [];
  const documents: Document[] = [];
  for (let i = 0; i < count; i++) {
    vectors.push(reader.floats(dim, `vector ${i}`));
    documents.push(parseDocument(reader.string(`document ${i}`), i));
  }
  if (reader.remaining !== 0) {
    throw new CorruptDataError(`${reader.remaining} trailing bytes after ${count} pairs`);
  }
  return { dim, metric, keyPath, normalized, vectors, documents };
}

/** Rebuilds a store from `encode` output. Never returns a partial store. */
export function decode(bytes: Uint8Array): VectorStore {
  let payload: Buffer;
  try {
    payload = gunzipSync(bytes);
  } catch (err) {
    throw new CorruptDataError('Partition data is not gzip-compressed', err);
  }
  const snapshot = readSnapshot(payload);
  try {
    return VectorStore.fromSnapshot(snapshot);
  } catch (err) {
    if (err instanceof MicrovecError) {
      throw new CorruptDataError(`Partition data failed validation: ${err.message}`, err);
    }
    throw err;
  }
}
