import { z } from 'zod';
import type { Document, DocumentValue } from '../types/store.types.js';
import { MissingKeyError } from '../errors/document.js';

export const documentValueSchema: z.ZodType<DocumentValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(documentValueSchema),
    z.record(documentValueSchema),
  ]),
);

export const documentSchema: z.ZodType<Document> = z.record(documentValueSchema);

export const documentListSchema = z.array(documentSchema);

function isMap(value: DocumentValue | undefined): value is Document {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function cloneDocument(document: Document): Document {
  return structuredClone(document);
}

/**
 * Structural equality: map field order is ignored, array order is not.
 */
export function documentsEqual(a: DocumentValue, b: DocumentValue): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => documentsEqual(item, b[i] ?? null));
  }
  if (isMap(a)) {
    if (!isMap(b)) return false;
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => {
      const other = b[key];
      const own = a[key];
      return other !== undefined && own !== undefined && documentsEqual(own, other);
    });
  }
  return false;
}

function lookup(document: Document, keyPath: string): DocumentValue | undefined {
  let current: DocumentValue | undefined = document;
  for (const segment of keyPath.split('.')) {
    if (!isMap(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function stringify(value: DocumentValue): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Text to embed for `document`: the value at the dot-separated `keyPath`,
 * e.g. `"product.name"`, stringified when it is not already a string.
 */
export function resolveKeyPath(document: Document, keyPath: string): string {
  const value = lookup(document, keyPath);
  if (value === undefined || value === null) {
    throw new MissingKeyError(keyPath);
  }
  return stringify(value);
}

/**
 * Copies of `documents` with the value at `keyPath` replaced by its string form.
 * Documents without a value at that path are copied unchanged.
 */
export function stringifyKeyValues(documents: readonly Document[], keyPath: string): Document[] {
  const segments = keyPath.split('.');
  const last = segments.pop() ?? keyPath;
  return documents.map((original) => {
    const copy = cloneDocument(original);
    let parent: DocumentValue | undefined = copy;
    for (const segment of segments) {
      parent = isMap(parent) ? parent[segment] : undefined;
    }
    if (isMap(parent)) {
      const value = parent[last];
      if (value !== undefined && value !== null) {
        parent[last] = stringify(value);
      }
    }
    return copy;
  });
}
