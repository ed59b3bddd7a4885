// Public API: named exports only

export type {
  Document,
  DocumentValue,
  Metric,
  PartitionRecord,
  SearchHit,
  SearchRecord,
  StoreSnapshot,
  Vector,
  WriteMode,
} from './types/store.types.js';
export type { AppConfig, EmbedderConfig, LogLevel } from './types/config.types.js';
export type { EmbeddingProvider } from './embedders/embeddingProvider.js';
export type { MetricSpec } from './store/metrics.js';
export type { Logger, LogSink } from './logging/logger.js';
export type { PartitionManagerOptions, SaveOptions } from './partition/partitionManager.js';
export type { PersistOptions } from './partition/partitionStore.js';
export type { VectorStoreOptions } from './store/vectorStore.js';

export { VectorStore } from './store/vectorStore.js';
export {
  METRICS,
  cosineSimilarity,
  derridaDistance,
  dot,
  euclideanDistance,
  getMetric,
  isMetric,
  norm,
  normalize,
  scoreMatrix,
} from './store/metrics.js';
export { encode, decode, FORMAT_VERSION } from './store/codec.js';
export {
  documentSchema,
  documentsEqual,
  resolveKeyPath,
  stringifyKeyValues,
} from './store/documents.js';
export { PartitionManager, PartitionStore, createPartitionManager, createEmbedder } from './partition/index.js';
export { partitionFilePath, partitionFileStem } from './partition/paths.js';
export { OllamaEmbedder } from './embedders/ollamaEmbedder.js';
export { createLogger, silentLogger } from './logging/logger.js';
export { loadConfig } from './config/loader.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export { validateConfig, ConfigValidationError } from './config/validator.js';
export { MicrovecError } from './errors/base.js';
export {
  DegenerateQueryError,
  DimensionMismatchError,
  IndexOutOfRangeError,
  InvalidArgumentError,
  NotFoundError,
} from './errors/store.js';
export { CorruptDataError } from './errors/codec.js';
export { IOFailureError } from './errors/io.js';
export { MissingKeyError } from './errors/document.js';
export { BackendError } from './errors/backend.js';
