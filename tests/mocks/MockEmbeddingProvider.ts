/**
 * Mock embedding provider.
 * Deterministic pseudo-embeddings: identical text gives an identical unit vector,
 * so seeding a case with generate(query) makes it a perfect semantic match.
 */

import type { IEmbeddingProvider } from '../../src/providers/IEmbeddingProvider.js';

export class MockEmbeddingProvider implements IEmbeddingProvider {
  readonly dimensions = 64;
  callCount = 0;

  /** When set, generate() rejects with this error. */
  failWith: Error | null = null;

  async generate(text: string): Promise<number[]> {
    this.callCount++;
    if (this.failWith) throw this.failWith;
    return this.textToVector(text);
  }

  private textToVector(text: string): number[] {
    const vector: number[] = [];
    for (let i = 0; i < this.dimensions; i++) {
      let hash = 0;
      for (const char of `${text}#${i}`) {
        hash = ((hash << 5) - hash + char.charCodeAt(0)) | 0;
      }
      vector.push(Math.sin(hash));
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}
