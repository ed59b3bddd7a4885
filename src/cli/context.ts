import { loadConfig } from '../config/loader.js';
import { createPartitionManager } from '../partition/index.js';
import type { PartitionManager } from '../partition/partitionManager.js';
import { InvalidArgumentError } from '../errors/store.js';

export type ManagerFactory = () => PartitionManager;

export const defaultManagerFactory: ManagerFactory = () => createPartitionManager(loadConfig());

export function parseCount(value: string, name: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}
