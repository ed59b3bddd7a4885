import type { Document, Metric, SearchHit, StoreSnapshot, Vector } from '../types/store.types.js';
import {
  DimensionMismatchError,
  IndexOutOfRangeError,
  InvalidArgumentError,
  NotFoundError,
} from '../errors/store.js';
import { getMetric, norm, normalize, scoreMatrix } from './metrics.js';
import type { MetricSpec } from './metrics.js';
import { cloneDocument, documentsEqual } from './documents.js';

export interface VectorStoreOptions {
  dim: number;
  metric: Metric;
  keyPath: string;
}

const MIN_CAPACITY = 16;

/** Stored cosine rows must have a norm within this distance of 1. */
const UNIT_NORM_TOLERANCE = 1e-3;

function assertDim(dim: number): void {
  if (!Number.isInteger(dim) || dim < 1) {
    throw new InvalidArgumentError(`Dimension must be a positive integer, got ${dim}`);
  }
}

/**
 * Exact brute-force vector store.
 *
 * Pairs live in one row-major Float32Array plus a parallel document array and are
 * addressed by their current position: removing a pair shifts every later pair down.
 * Under the cosine metric every stored row is unit length.
 */
export class VectorStore {
  private readonly spec: MetricSpec;
  private _dim: number;
  private matrix: Float32Array;
  private documents: Document[] = [];

  readonly keyPath: string;

  constructor(options: VectorStoreOptions) {
    assertDim(options.dim);
    this.spec = getMetric(options.metric);
    this._dim = options.dim;
    this.keyPath = options.keyPath;
    this.matrix = new Float32Array(MIN_CAPACITY * options.dim);
  }

  static fromSnapshot(snapshot: StoreSnapshot): VectorStore {
    if (snapshot.vectors.length !== snapshot.documents.length) {
      throw new InvalidArgumentError(
        `Snapshot has ${snapshot.vectors.length} vectors but ${snapshot.documents.length} documents`,
      );
    }
    const store = new VectorStore(snapshot);
    if (snapshot.normalized || !store.spec.requiresNormalization) {
      store.load(snapshot.vectors, snapshot.documents);
    } else {
      store.insertBatch(snapshot.vectors, snapshot.documents);
    }
    return store;
  }

  get size(): number {
    return this.documents.length;
  }

  get dim(): number {
    return this._dim;
  }

  get metric(): Metric {
    return this.spec.name;
  }

  /** Whether stored rows are unit length. */
  get normalized(): boolean {
    return this.spec.requiresNormalization;
  }

  insertOne(vector: Vector, document: Document): void {
    this.insertBatch([vector], [document]);
  }

  /** Inserts every pair or none of them. */
  insertBatch(vectors: readonly Vector[], documents: readonly Document[]): void {
    const rows = this.prepare(vectors, documents, this._dim);
    this.ensureCapacity(this.size + vectors.length);
    this.matrix.set(rows, this.size * this._dim);
    for (const document of documents) {
      this.documents.push(cloneDocument(document));
    }
  }

  /**
   * Swaps in a new set of pairs. An empty store takes its dimension from the
   * first new vector.
   */
  replaceAll(vectors: readonly Vector[], documents: readonly Document[]): void {
    const first = vectors[0];
    const dim = this.size === 0 && first !== undefined ? first.length : this._dim;
    assertDim(dim);
    const rows = this.prepare(vectors, documents, dim);
    this._dim = dim;
    this.matrix = new Float32Array(Math.max(vectors.length, MIN_CAPACITY) * dim);
    this.matrix.set(rows);
    this.documents = documents.map(cloneDocument);
  }

  removeAt(index: number): Document {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new IndexOutOfRangeError(index, this.size);
    }
    const dim = this._dim;
    this.matrix.copyWithin(index * dim, (index + 1) * dim, this.size * dim);
    const [removed] = this.documents.splice(index, 1);
    if (removed === undefined) throw new IndexOutOfRangeError(index, this.size);
    return removed;
  }

  /** Index of the first stored document equal to `document`. */
  findMatching(document: Document): number {
    const index = this.documents.findIndex((candidate) => documentsEqual(candidate, document));
    if (index === -1) {
      throw new NotFoundError('No stored document matches the given document');
    }
    return index;
  }

  /** Removes the first pair whose document equals `document`; returns its index. */
  removeMatching(document: Document): number {
    const index = this.findMatching(document);
    this.removeAt(index);
    return index;
  }

  search(query: Vector, topK: number): SearchHit[] {
    if (!Number.isInteger(topK) || topK < 0) {
      throw new InvalidArgumentError(`topK must be a non-negative integer, got ${topK}`);
    }
    if (this.size === 0) return [];
    if (query.length !== this._dim) throw new DimensionMismatchError(this._dim, query.length);

    // Rows are unit length already under cosine, so the score reduces to a dot product.
    const unit = this.spec.requiresNormalization ? normalize(query) : null;
    if (topK === 0) return [];
    const scores = unit
      ? scoreMatrix(getMetric('dot'), unit, this.matrix, this._dim, this.size)
      : scoreMatrix(this.spec, query, this.matrix, this._dim, this.size);

    const order = Array.from({ length: this.size }, (_, i) => i);
    // Array.prototype.sort is stable, so equal scores keep insertion order.
    order.sort((a, b) => this.spec.compare(scores[a] ?? 0, scores[b] ?? 0));

    return order.slice(0, topK).map((index) => ({
      document: cloneDocument(this.documentAt(index)),
      score: scores[index] ?? 0,
      index,
    }));
  }

  documentAt(index: number): Document {
    const document = this.documents[index];
    if (!Number.isInteger(index) || document === undefined) {
      throw new IndexOutOfRangeError(index, this.size);
    }
    return document;
  }

  vectorAt(index: number): Float32Array {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new IndexOutOfRangeError(index, this.size);
    }
    return this.matrix.slice(index * this._dim, (index + 1) * this._dim);
  }

  *entries(): IterableIterator<[Float32Array, Document]> {
    for (let i = 0; i < this.size; i++) {
      yield [this.vectorAt(i), this.documentAt(i)];
    }
  }

  toSnapshot(): StoreSnapshot {
    const vectors: Float32Array[] = [];
    for (let i = 0; i < this.size; i++) {
      vectors.push(this.vectorAt(i));
    }
    return {
      dim: this._dim,
      metric: this.metric,
      keyPath: this.keyPath,
      normalized: this.normalized,
      vectors,
      documents: this.documents.map(cloneDocument),
    };
  }

  /**
   * Validates a batch against `dim` and returns its rows packed and, for cosine,
   * normalized. Nothing in the store is touched.
   */
  private prepare(vectors: readonly Vector[], documents: readonly Document[], dim: number): Float32Array {
    if (vectors.length !== documents.length) {
      throw new InvalidArgumentError(
        `Got ${vectors.length} vectors for ${documents.length} documents`,
      );
    }
    const rows = new Float32Array(vectors.length * dim);
    vectors.forEach((vector, i) => {
      if (vector.length !== dim) throw new DimensionMismatchError(dim, vector.length);
      rows.set(this.spec.requiresNormalization ? normalize(vector) : vector, i * dim);
    });
    return rows;
  }

  /** Installs rows that are already in stored form. */
  private load(vectors: readonly Float32Array[], documents: readonly Document[]): void {
    vectors.forEach((vector, i) => {
      if (vector.length !== this._dim) throw new DimensionMismatchError(this._dim, vector.length);
      if (this.spec.requiresNormalization && Math.abs(norm(vector) - 1) > UNIT_NORM_TOLERANCE) {
        throw new InvalidArgumentError(`Row ${i} is not unit length under the ${this.metric} metric`);
      }
    });
    this.ensureCapacity(vectors.length);
    vectors.forEach((vector, i) => this.matrix.set(vector, i * this._dim));
    this.documents = documents.map(cloneDocument);
  }

  private ensureCapacity(rows: number): void {
    const needed = rows * this._dim;
    if (needed <= this.matrix.length) return;
    const capacity = Math.max(rows, (this.matrix.length / this._dim) * 2, MIN_CAPACITY);
    const grown = new Float32Array(capacity * this._dim);
    grown.set(this.matrix.subarray(0, this.size * this._dim));
    this.matrix = grown;
  }
}
