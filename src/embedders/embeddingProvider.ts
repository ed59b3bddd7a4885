/**
 * Turns text into fixed-length vectors. Every vector from one provider has the
 * same length; a partition built with one model cannot take vectors from another.
 */
export interface EmbeddingProvider {
  embed(text: string): Promise<Float32Array>;
  embedBatch(texts: readonly string[]): Promise<Float32Array[]>;
  readonly dimensions: number;
  isAvailable(): Promise<boolean>;
}
