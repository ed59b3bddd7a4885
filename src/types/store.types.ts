export type DocumentValue =
  | string
  | number
  | boolean
  | null
  | DocumentValue[]
  | { [field: string]: DocumentValue };

export type Document = { [field: string]: DocumentValue };

/** Accepted on input; stored as Float32Array. */
export type Vector = Float32Array | readonly number[];

export type Metric = 'cosine' | 'dot' | 'euclidean' | 'derrida';

export type WriteMode = 'replace' | 'append';

export interface SearchHit {
  document: Document;
  score: number;
  /** Position in the store at the time of the search. */
  index: number;
}

export type SearchRecord = Document & { similarity_score: number };

export interface PartitionRecord {
  index: number;
  document: Document;
  vector?: number[];
}

export interface StoreSnapshot {
  dim: number;
  metric: Metric;
  keyPath: string;
  normalized: boolean;
  vectors: Float32Array[];
  documents: Document[];
}
