/** Maps incident text to a vector comparable with stored case embeddings. */
export interface IEmbeddingProvider {
  readonly dimensions: number;
  generate(text: string): Promise<number[]>;
}
