import type { EmbeddingProvider } from './embeddingProvider.js';
import { EmbeddingError } from '../../errors/indexing.js';

function firstEmbedding(body: unknown): number[] | undefined {
  if (typeof body !== 'object' || body === null || !('embeddings' in body)) return undefined;
  const { embeddings } = body;
  if (!Array.isArray(embeddings)) return undefined;
  const [first]: unknown[] = embeddings;
  if (!Array.isArray(first) || !first.every((v): v is number => typeof v === 'number')) return undefined;
  return first;
}

/** Embeddings from a local Ollama server's `/api/embed` endpoint. */
export class OllamaEmbedder implements EmbeddingProvider {
  private readonly baseUrl: string;
  private _dimensions: number;

  constructor(
    baseUrl: string,
    private readonly model = 'nomic-embed-text',
    dimensions = 768,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this._dimensions = dimensions;
  }

  get id(): string {
    return `ollama:${this.model}`;
  }

  get dimensions(): number {
    return this._dimensions;
  }

  async embed(text: string): Promise<Float32Array> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, input: text }),
      });
    } catch (err) {
      throw new EmbeddingError(`Failed to connect to Ollama at ${this.baseUrl}`, undefined, err);
    }

    if (!response.ok) {
      throw new EmbeddingError(
        `Ollama embed request for model "${this.model}" failed: ${response.status} ${response.statusText}`,
        response.status,
      );
    }

    const embedding = firstEmbedding(await response.json());
    if (!embedding || embedding.length === 0) {
      throw new EmbeddingError('Ollama returned no embedding');
    }

    // The model decides the width; trust the first real response.
    this._dimensions = embedding.length;
    return new Float32Array(embedding);
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
