import type { Document, Metric, PartitionRecord, SearchHit, SearchRecord, Vector } from '../types/store.types.js';
import type { EmbeddingProvider } from '../embedders/embeddingProvider.js';
import type { Logger } from '../logging/logger.js';
import type { VectorStore } from '../store/vectorStore.js';
import { resolveKeyPath, stringifyKeyValues } from '../store/documents.js';
import { deletePartitionFile, writePartitionFile } from './partitionFile.js';

export interface PersistOptions {
  /** Write the partition to disk after the change. */
  cache?: boolean;
}

function isDocumentList(value: Document | readonly Document[]): value is readonly Document[] {
  return Array.isArray(value);
}

function toSearchRecord(hit: SearchHit): SearchRecord {
  return { ...hit.document, similarity_score: hit.score };
}

/**
 * Handle on one loaded partition. The metric and key path are fixed by the
 * store it wraps; `cachePath` is null for partitions that never touch disk.
 */
export class PartitionStore {
  constructor(
    private readonly store: VectorStore,
    readonly partition: string,
    private readonly embedder: EmbeddingProvider,
    private readonly cachePath: string | null,
    private readonly logger: Logger,
  ) {}

  get key(): string {
    return this.store.keyPath;
  }

  get metric(): Metric {
    return this.store.metric;
  }

  get size(): number {
    return this.store.size;
  }

  get dim(): number {
    return this.store.dim;
  }

  get persistent(): boolean {
    return this.cachePath !== null;
  }

  get path(): string | null {
    return this.cachePath;
  }

  async search(term: string, topK = 5): Promise<SearchRecord[]> {
    this.logger.info(
      `Searching partition '${this.partition}' for '${term}' (topK=${topK}, metric=${this.metric})`,
    );
    if (term.trim() === '') {
      this.logger.error('Search term is empty');
      return [];
    }
    const query = await this.embedder.embed(term);
    const results = this.searchVector(query, topK).map(toSearchRecord);
    this.logger.info(`Found ${results.length} results`);
    return results;
  }

  searchVector(vector: Vector, topK: number): SearchHit[] {
    return this.store.search(vector, topK);
  }

  async add(documents: Document | readonly Document[], options: PersistOptions = {}): Promise<void> {
    const batch = isDocumentList(documents) ? documents : [documents];
    this.logger.info(
      `Adding ${batch.length} documents to partition '${this.partition}' (cache=${options.cache ?? false})`,
    );
    const texts = batch.map((document) => resolveKeyPath(document, this.key));
    const vectors = await this.embedder.embedBatch(texts);
    const stored = stringifyKeyValues(batch, this.key);
    if (this.store.size === 0) {
      this.store.replaceAll(vectors, stored);
    } else {
      this.store.insertBatch(vectors, stored);
    }
    if (options.cache) this.persist();
  }

  /** Removes by current index or by document equality; returns the stored document. */
  remove(target: number | Document, options: PersistOptions = {}): Document {
    this.logger.info(
      `Removing document from partition '${this.partition}' (cache=${options.cache ?? false})`,
    );
    const index = typeof target === 'number' ? target : this.store.findMatching(target);
    const removed = this.store.removeAt(index);
    if (options.cache) this.persist();
    return removed;
  }

  /** Writes the partition to its cache file; a no-op with a warning for in-memory partitions. */
  persist(): void {
    if (!this.cachePath) {
      this.logger.warn(`Cannot persist - partition '${this.partition}' was created without cache`);
      return;
    }
    writePartitionFile(this.cachePath, this.store);
    this.logger.info(`Changes persisted to ${this.cachePath}`);
  }

  /** Deletes the cache file. Returns false when there is no file to delete. */
  delete(): boolean {
    if (!this.cachePath) {
      this.logger.warn(`Cannot delete - partition '${this.partition}' has no cache file`);
      return false;
    }
    const deleted = deletePartitionFile(this.cachePath);
    if (deleted) {
      this.logger.info(`Deleted cache file: ${this.cachePath}`);
    } else {
      this.logger.warn(`Cache file does not exist: ${this.cachePath}`);
    }
    return deleted;
  }

  toRecords(options: { vectors?: boolean } = {}): PartitionRecord[] {
    const records: PartitionRecord[] = [];
    let index = 0;
    for (const [vector, document] of this.store.entries()) {
      records.push({
        index,
        document: structuredClone(document),
        ...(options.vectors ? { vector: Array.from(vector) } : {}),
      });
      index++;
    }
    return records;
  }
}
