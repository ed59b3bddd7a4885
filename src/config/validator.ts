import type { AppConfig, EmbedderConfig, LogLevel } from '../types/config.types.js';
import { isMetric } from '../store/metrics.js';

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function validateEmbedder(embedder: EmbedderConfig): void {
  if (embedder.type === 'ollama') {
    if (!embedder.baseUrl || embedder.baseUrl.trim() === '') {
      throw new ConfigValidationError('Embedder type "ollama" requires baseUrl.');
    }
    if (!embedder.model || embedder.model.trim() === '') {
      throw new ConfigValidationError('Embedder type "ollama" requires model.');
    }
  }
  if (!Number.isInteger(embedder.dimensions) || embedder.dimensions < 1) {
    throw new ConfigValidationError(
      `embedder.dimensions must be a positive integer, got ${embedder.dimensions}.`,
    );
  }
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function validateConfig(config: AppConfig): void {
  validateEmbedder(config.embedder);

  if (!isMetric(config.metric)) {
    throw new ConfigValidationError(`Unsupported metric "${config.metric}".`);
  }

  if (config.cacheDir.trim() === '') {
    throw new ConfigValidationError('cacheDir must not be empty.');
  }

  if (config.defaultKey.trim() === '') {
    throw new ConfigValidationError('defaultKey must not be empty.');
  }

  if (!LOG_LEVELS.includes(config.logLevel)) {
    throw new ConfigValidationError(`Unsupported log level "${config.logLevel}".`);
  }

  if (!Number.isInteger(config.defaultTopK) || config.defaultTopK < 1) {
    throw new ConfigValidationError('defaultTopK must be an integer >= 1.');
  }
}
