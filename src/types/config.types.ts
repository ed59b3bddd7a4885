import type { Metric } from './store.types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface OllamaEmbedderConfig {
  type: 'ollama';
  baseUrl: string;
  model: string;
  /** Reported until the first response reveals the model's real size. */
  dimensions: number;
}

export type EmbedderConfig = OllamaEmbedderConfig;

export interface AppConfig {
  cacheDir: string;
  metric: Metric;
  defaultKey: string;
  defaultTopK: number;
  embedder: EmbedderConfig;
  logLevel: LogLevel;
}
