import type { Metric, Vector } from '../types/store.types.js';
import { DegenerateQueryError, DimensionMismatchError, InvalidArgumentError } from '../errors/store.js';

export const METRICS: readonly Metric[] = ['cosine', 'dot', 'euclidean', 'derrida'];

type ReadVector = Vector | Float32Array | Float64Array;

export interface MetricSpec {
  readonly name: Metric;
  /** `descending` when a higher score is a better match. */
  readonly ranking: 'ascending' | 'descending';
  /** Stored vectors are kept at unit length. */
  readonly requiresNormalization: boolean;
  score(a: ReadVector, b: ReadVector): number;
  /** Score `query` against the row of `matrix` that starts at `offset`. */
  scoreRow(query: ReadVector, matrix: Float32Array, offset: number): number;
  /** Orders two scores best first. */
  compare(x: number, y: number): number;
}

export function isMetric(value: string): value is Metric {
  return (METRICS as readonly string[]).includes(value);
}

function assertSameDim(a: ReadVector, b: ReadVector): void {
  if (a.length !== b.length) throw new DimensionMismatchError(a.length, b.length);
}

export function dot(a: ReadVector, b: ReadVector): number {
  assertSameDim(a, b);
  let s = 0;
  for (let i = 0; i < a.length; i++) {
    s += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return s;
}

export function norm(a: ReadVector): number {
  let s = 0;
  for (let i = 0; i < a.length; i++) {
    const ai = a[i] ?? 0;
    s += ai * ai;
  }
  return Math.sqrt(s);
}

/** Unit-length copy of `a`. */
export function normalize(a: ReadVector): Float32Array {
  const n = norm(a);
  if (n === 0) throw new DegenerateQueryError();
  const out = new Float32Array(a.length);
  for (let i = 0; i < a.length; i++) {
    out[i] = (a[i] ?? 0) / n;
  }
  return out;
}

export function cosineSimilarity(a: ReadVector, b: ReadVector): number {
  const d = dot(a, b);
  const denom = norm(a) * norm(b);
  if (denom === 0) throw new DegenerateQueryError('Cosine similarity is undefined for a zero-norm vector');
  return d / denom;
}

export function euclideanDistance(a: ReadVector, b: ReadVector): number {
  assertSameDim(a, b);
  let s = 0;
  for (let i = 0; i < a.length; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    s += d * d;
  }
  return Math.sqrt(s);
}

/**
 * Magnitude gap plus angular gap: `|‖a‖ − ‖b‖| + (1 − cos(a, b))`.
 * The angular term is taken as 1 when either vector has zero norm.
 */
export function derridaDistance(a: ReadVector, b: ReadVector): number {
  assertSameDim(a, b);
  return derridaTerms(dot(a, b), norm(a), norm(b));
}

function derridaTerms(d: number, na: number, nb: number): number {
  const angular = na === 0 || nb === 0 ? 1 : 1 - d / (na * nb);
  return Math.abs(na - nb) + angular;
}

const descending = (x: number, y: number): number => y - x;
const ascending = (x: number, y: number): number => x - y;

function rowDot(query: ReadVector, matrix: Float32Array, offset: number): number {
  let s = 0;
  for (let i = 0; i < query.length; i++) {
    s += (query[i] ?? 0) * (matrix[offset + i] ?? 0);
  }
  return s;
}

function rowNorm(matrix: Float32Array, offset: number, dim: number): number {
  let s = 0;
  for (let i = 0; i < dim; i++) {
    const v = matrix[offset + i] ?? 0;
    s += v * v;
  }
  return Math.sqrt(s);
}

const SPECS: Record<Metric, MetricSpec> = {
  cosine: {
    name: 'cosine',
    ranking: 'descending',
    requiresNormalization: true,
    score: cosineSimilarity,
    scoreRow(query, matrix, offset) {
      const denom = norm(query) * rowNorm(matrix, offset, query.length);
      if (denom === 0) throw new DegenerateQueryError('Cosine similarity is undefined for a zero-norm vector');
      return rowDot(query, matrix, offset) / denom;
    },
    compare: descending,
  },
  dot: {
    name: 'dot',
    ranking: 'descending',
    requiresNormalization: false,
    score: dot,
    scoreRow: rowDot,
    compare: descending,
  },
  euclidean: {
    name: 'euclidean',
    ranking: 'ascending',
    requiresNormalization: false,
    score: euclideanDistance,
    scoreRow(query, matrix, offset) {
      let s = 0;
      for (let i = 0; i < query.length; i++) {
        const d = (query[i] ?? 0) - (matrix[offset + i] ?? 0);
        s += d * d;
      }
      return Math.sqrt(s);
    },
    compare: ascending,
  },
  derrida: {
    name: 'derrida',
    ranking: 'ascending',
    requiresNormalization: false,
    score: derridaDistance,
    scoreRow(query, matrix, offset) {
      return derridaTerms(rowDot(query, matrix, offset), norm(query), rowNorm(matrix, offset, query.length));
    },
    compare: ascending,
  },
};

export function getMetric(name: string): MetricSpec {
  if (!isMetric(name)) {
    throw new InvalidArgumentError(
      `Unsupported similarity metric "${name}". Use one of: ${METRICS.join(', ')}.`,
    );
  }
  return SPECS[name];
}

/**
 * Scores `query` against the first `count` rows of a row-major matrix in one pass.
 */
export function scoreMatrix(
  spec: MetricSpec,
  query: ReadVector,
  matrix: Float32Array,
  dim: number,
  count: number,
): Float64Array {
  if (query.length !== dim) throw new DimensionMismatchError(dim, query.length);
  const scores = new Float64Array(count);
  for (let row = 0; row < count; row++) {
    scores[row] = spec.scoreRow(query, matrix, row * dim);
  }
  return scores;
}
