import { z } from 'zod';
import type { EmbeddingProvider } from './embeddingProvider.js';
import { BackendError } from '../errors/backend.js';

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export class OllamaEmbedder implements EmbeddingProvider {
  private _dimensions: number;

  constructor(
    private readonly baseUrl: string,
    private readonly model = 'nomic-embed-text',
    dimensions = 768,
  ) {
    this._dimensions = dimensions;
  }

  get dimensions(): number {
    return this._dimensions;
  }

  async embed(text: string): Promise<Float32Array> {
    const [embedding] = await this.request(text, 1);
    if (!embedding) {
      throw new BackendError('Ollama returned empty embeddings array');
    }
    return embedding;
  }

  async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    if (texts.length === 0) return [];
    return this.request([...texts], texts.length);
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch {
      return false;
    }
  }

  private async request(input: string | string[], expected: number): Promise<Float32Array[]> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, input }),
      });
    } catch (err) {
      throw new BackendError('Failed to connect to Ollama for embeddings', undefined, err);
    }

    if (!response.ok) {
      throw new BackendError(
        `Ollama embed request failed: ${response.status} ${response.statusText}`,
        response.status,
      );
    }

    const parsed = embedResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new BackendError('Ollama returned a malformed embed response', undefined, parsed.error);
    }
    const data = parsed.data;
    if (data.embeddings.length !== expected) {
      throw new BackendError(
        `Ollama returned ${data.embeddings.length} embeddings for ${expected} inputs`,
      );
    }

    const vectors = data.embeddings.map((embedding) => new Float32Array(embedding));
    const first = vectors[0];
    // Update dimensions based on actual response
    if (first) this._dimensions = first.length;
    return vectors;
  }
}
