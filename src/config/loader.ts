import { z } from 'zod';
import type { AppConfig } from '../types/config.types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigValidationError, LOG_LEVELS } from './validator.js';
import { isMetric, METRICS } from '../store/metrics.js';
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

type ConfigOverrides = Omit<Partial<AppConfig>, 'embedder'> & {
  embedder?: Partial<AppConfig['embedder']>;
};

const fileConfigSchema = z
  .object({
    cacheDir: z.string(),
    metric: z.enum(['cosine', 'dot', 'euclidean', 'derrida']),
    defaultKey: z.string(),
    defaultTopK: z.number().int(),
    embedder: z
      .object({
        type: z.literal('ollama'),
        baseUrl: z.string(),
        model: z.string(),
        dimensions: z.number().int(),
      })
      .partial(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  })
  .partial();

function deepMerge(base: AppConfig, override: ConfigOverrides): AppConfig {
  const result: AppConfig = { ...base, embedder: { ...base.embedder } };
  const { embedder, ...rest } = override;
  for (const key of Object.keys(rest) as Array<keyof typeof rest>) {
    const val = rest[key];
    if (val !== undefined && val !== null) {
      Object.assign(result, { [key]: val });
    }
  }
  if (embedder) {
    for (const key of Object.keys(embedder) as Array<keyof typeof embedder>) {
      const val = embedder[key];
      if (val !== undefined) {
        Object.assign(result.embedder, { [key]: val });
      }
    }
  }
  return result;
}

function loadFileConfig(cwd: string): ConfigOverrides {
  const candidates = [
    join(cwd, '.microvec.json'),
    join(cwd, 'microvec.config.json'),
  ];
  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      let raw: unknown;
      try {
        raw = JSON.parse(readFileSync(candidate, 'utf-8'));
      } catch (err) {
        throw new ConfigValidationError(`Cannot read config file ${candidate}: ${String(err)}`);
      }
      const parsed = fileConfigSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ConfigValidationError(`Invalid config file ${candidate}: ${parsed.error.message}`);
      }
      return parsed.data;
    }
  }
  return {};
}

function loadEnvOverrides(): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const cacheDir = process.env['MICROVEC_CACHE_DIR'];
  if (cacheDir) {
    overrides.cacheDir = cacheDir;
  }

  const metric = process.env['MICROVEC_METRIC'];
  if (metric) {
    if (!isMetric(metric)) {
      throw new ConfigValidationError(
        `MICROVEC_METRIC must be one of ${METRICS.join(', ')}, got "${metric}".`,
      );
    }
    overrides.metric = metric;
  }

  const logLevel = process.env['MICROVEC_LOG_LEVEL'];
  if (logLevel) {
    const level = LOG_LEVELS.find((l) => l === logLevel);
    if (!level) {
      throw new ConfigValidationError(`MICROVEC_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}.`);
    }
    overrides.logLevel = level;
  }

  // Embedder overrides from env
  const ollamaBaseUrl = process.env['OLLAMA_BASE_URL'];
  const embedModel = process.env['MICROVEC_EMBED_MODEL'];
  if (ollamaBaseUrl || embedModel) {
    overrides.embedder = {
      ...(ollamaBaseUrl ? { baseUrl: ollamaBaseUrl } : {}),
      ...(embedModel ? { model: embedModel } : {}),
    };
  }

  return overrides;
}

export function loadConfig(cwd: string = process.cwd()): AppConfig {
  const fileConfig = loadFileConfig(cwd);
  const envOverrides = loadEnvOverrides();

  let config = deepMerge(DEFAULT_CONFIG, fileConfig);
  config = deepMerge(config, envOverrides);

  return config;
}
