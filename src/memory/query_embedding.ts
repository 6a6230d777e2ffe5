/**
 * Query representation for memory retrieval: a hashed bag-of-words vector, L2-normalized.
 * Deterministic and local, so retrieval works without an embedding service.
 */

export const QUERY_EMBED_DIM = 64;

const djb2 = (token: string): number => {
  let hash = 5381;
  for (let i = 0; i < token.length; i += 1) {
    hash = ((hash << 5) + hash + token.charCodeAt(i)) >>> 0;
  }
  return hash;
};

export function tokenizeForEmbedding(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]{2,}/g) ?? [];
}

export function computeQueryEmbedding(text: string, dim = QUERY_EMBED_DIM): number[] {
  const vec = new Array<number>(dim).fill(0);

  for (const token of tokenizeForEmbedding(text)) {
    vec[djb2(token) % dim] += 1;
  }

  const norm = Math.sqrt(vec.reduce((sum, value) => sum + value * value, 0));
  return norm > 0 ? vec.map((value) => value / norm) : vec;
}

/** Both inputs are expected normalized; mismatched lengths compare on the shared prefix. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  for (let i = 0; i < n; i += 1) {
    dot += a[i] * b[i];
  }
  return dot;
}
