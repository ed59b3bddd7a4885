import type { AppConfig } from '../types/config.types.js';

export const DEFAULT_CONFIG: AppConfig = {
  cacheDir: './.vector_cache',
  metric: 'cosine',
  defaultKey: 'text',
  defaultTopK: 5,
  embedder: {
    type: 'ollama',
    baseUrl: 'http://localhost:11434',
    model: 'nomic-embed-text',
    dimensions: 768,
  },
  logLevel: 'info',
};
