import type { AppConfig, EmbedderConfig } from '../types/config.types.js';
import type { EmbeddingProvider } from '../embedders/embeddingProvider.js';
import { OllamaEmbedder } from '../embedders/ollamaEmbedder.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import { validateConfig } from '../config/validator.js';
import { PartitionManager } from './partitionManager.js';

export { PartitionManager } from './partitionManager.js';
export { PartitionStore } from './partitionStore.js';

export function createEmbedder(config: EmbedderConfig): EmbeddingProvider {
  return new OllamaEmbedder(config.baseUrl, config.model, config.dimensions);
}

/**
 * Builds a PartitionManager from application config. `embedder` and `logger`
 * replace the configured ones when given.
 */
export function createPartitionManager(
  config: AppConfig,
  overrides: { embedder?: EmbeddingProvider; logger?: Logger } = {},
): PartitionManager {
  validateConfig(config);
  return new PartitionManager({
    cacheDir: config.cacheDir,
    metric: config.metric,
    defaultKey: config.defaultKey,
    defaultTopK: config.defaultTopK,
    embedder: overrides.embedder ?? createEmbedder(config.embedder),
    logger: overrides.logger ?? createLogger(config.logLevel),
  });
}
