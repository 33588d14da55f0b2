/**
 * Turns chunk text and queries into dense vectors.
 *
 * `id` names the model behind the vectors. The indexing pipeline records it
 * next to the fingerprints; vectors from two different ids are never mixed
 * in one index.
 */
export interface EmbeddingProvider {
  readonly id: string;
  /** Vector width; 0 means dense retrieval is off and chunks are stored without vectors. */
  readonly dimensions: number;
  embed(text: string): Promise<Float32Array>;
  isAvailable(): Promise<boolean>;
}

/** Stand-in used when no embedding model is configured. */
export class NoopEmbeddingProvider implements EmbeddingProvider {
  readonly id = 'none';
  readonly dimensions = 0;

  async embed(_text: string): Promise<Float32Array> {
    return new Float32Array(0);
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}
