import { existsSync } from 'node:fs';
import type { Document, Metric, SearchRecord, WriteMode } from '../types/store.types.js';
import type { EmbeddingProvider } from '../embedders/embeddingProvider.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { NotFoundError } from '../errors/store.js';
import { resolveKeyPath, stringifyKeyValues } from '../store/documents.js';
import { VectorStore } from '../store/vectorStore.js';
import { readPartitionFile, deletePartitionFile, writePartitionFile } from './partitionFile.js';
import { partitionFilePath } from './paths.js';
import { PartitionStore } from './partitionStore.js';

export interface PartitionManagerOptions {
  /** Directory holding one file per persisted partition. */
  cacheDir: string;
  /** Metric for every partition this manager creates. */
  metric: Metric;
  embedder: EmbeddingProvider;
  /** Key path used when `save` is not given one. */
  defaultKey?: string;
  /** Result count used when `search` is not given one. */
  defaultTopK?: number;
  logger?: Logger;
}

export interface SaveOptions {
  key?: string;
  /** `append` merges into an existing partition; `replace` starts over. */
  mode?: WriteMode;
  /** Persist to disk. In-memory partitions never write. */
  cache?: boolean;
}

/**
 * Maps partition names to cache files and decides, per save, whether to load,
 * merge, replace or stay in memory.
 */
export class PartitionManager {
  readonly cacheDir: string;
  readonly metric: Metric;
  private readonly embedder: EmbeddingProvider;
  private readonly defaultKey: string;
  private readonly defaultTopK: number;
  private readonly logger: Logger;

  constructor(options: PartitionManagerOptions) {
    this.cacheDir = options.cacheDir;
    this.metric = options.metric;
    this.embedder = options.embedder;
    this.defaultKey = options.defaultKey ?? 'text';
    this.defaultTopK = options.defaultTopK ?? 5;
    this.logger = options.logger ?? silentLogger;
  }

  pathFor(partition: string): string {
    return partitionFilePath(this.cacheDir, partition);
  }

  exists(partition: string): boolean {
    return existsSync(this.pathFor(partition));
  }

  /**
   * Embeds `documents` and stores them in `partition`.
   *
   * | on disk | mode    | cache | result                                        |
   * |---------|---------|-------|-----------------------------------------------|
   * | no      | any     | any   | new store, written iff cache                  |
   * | yes     | replace | true  | new store overwrites the file                 |
   * | yes     | append  | true  | file loaded, items appended, file rewritten   |
   * | yes     | append  | false | file loaded, items appended in memory only    |
   * | yes     | replace | false | file ignored, in-memory store                 |
   */
  async save(
    partition: string,
    documents: readonly Document[],
    options: SaveOptions = {},
  ): Promise<PartitionStore> {
    const key = options.key ?? this.defaultKey;
    const mode = options.mode ?? 'replace';
    const cache = options.cache ?? false;
    const path = this.pathFor(partition);
    this.logger.info(
      `Saving ${documents.length} documents to partition '${partition}' (cache=${cache}, mode=${mode})`,
    );

    const existing = existsSync(path) ? path : null;
    const base = existing && mode === 'append' ? this.load(existing, partition) : null;
    if (base) {
      this.logger.info(`Loading cached vector store '${partition}' from ${existing}`);
      if (base.keyPath !== key) {
        this.logger.warn(`Partition '${partition}' was built from key '${base.keyPath}', appending with '${key}'`);
      }
      if (base.metric !== this.metric) {
        this.logger.warn(`Partition '${partition}' keeps its stored metric '${base.metric}'`);
      }
    } else if (existing) {
      this.logger.info(`Replacing existing vector store '${partition}' with ${documents.length} documents`);
    }

    // Every text is resolved and embedded before any store is touched.
    const texts = documents.map((document) => resolveKeyPath(document, key));
    const vectors = await this.embedder.embedBatch(texts);

    const store =
      base ??
      new VectorStore({
        dim: vectors[0]?.length ?? this.embedder.dimensions,
        metric: this.metric,
        keyPath: key,
      });
    // Key values are stored in the string form that was embedded.
    const stored = stringifyKeyValues(documents, key);
    if (store.size === 0) {
      // An empty store, fresh or loaded, takes its dimension from the embedder's output.
      store.replaceAll(vectors, stored);
    } else {
      store.insertBatch(vectors, stored);
    }
    if (base) {
      this.logger.info(`Appended ${documents.length} documents (now ${store.size})`);
    }

    if (cache) {
      writePartitionFile(path, store);
      this.logger.info(`Collection saved to ${path}`);
    }
    return new PartitionStore(store, partition, this.embedder, cache ? path : null, this.logger);
  }

  /** Loads a persisted partition. */
  open(partition: string): PartitionStore {
    const path = this.pathFor(partition);
    const store = this.load(path, partition);
    this.logger.info(`Loaded partition '${partition}' (${store.size} documents) from ${path}`);
    return new PartitionStore(store, partition, this.embedder, path, this.logger);
  }

  async search(term: string, partition: string, topK?: number): Promise<SearchRecord[]> {
    return this.open(partition).search(term, topK ?? this.defaultTopK);
  }

  delete(partition: string): boolean {
    const path = this.pathFor(partition);
    const deleted = deletePartitionFile(path);
    if (deleted) {
      this.logger.info(`Deleted partition '${partition}' (${path})`);
    } else {
      this.logger.warn(`Partition '${partition}' has no cache file`);
    }
    return deleted;
  }

  private load(path: string, partition: string): VectorStore {
    const store = readPartitionFile(path);
    if (!store) {
      throw new NotFoundError(`Partition '${partition}' has no cache file at ${path}`);
    }
    return store;
  }
}
