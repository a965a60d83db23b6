import { Embeddings, type EmbeddingsParams } from '@langchain/core/embeddings';

export interface LocalHashEmbeddingsParams extends EmbeddingsParams {
  dimensions?: number;
}

export const LOCAL_HASH_DIMENSIONS = 384;

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Offline embeddings by feature hashing: each lowercased word adds a signed unit to one
 * bucket, and the result is L2-normalized. Texts sharing vocabulary score close under
 * cosine similarity. Text without words maps to the zero vector.
 */
export class LocalHashEmbeddings extends Embeddings {
  readonly dimensions: number;

  constructor(fields: LocalHashEmbeddingsParams = {}) {
    const { dimensions, ...params } = fields;
    super(params);
    this.dimensions = dimensions ?? LOCAL_HASH_DIMENSIONS;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorize(text));
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const [token] of text.toLowerCase().matchAll(TOKEN_PATTERN)) {
      const hash = fnv1a(token);
      const sign = hash & 1 ? -1 : 1;
      vector[(hash >>> 1) % this.dimensions] += sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }
}
