/**
 * Similarity module — vector math shared by search, clustering and projection.
 *
 * Pure math, no external dependencies. Every function that combines two
 * vectors rejects mismatched lengths with a DimensionMismatchError.
 */

import type { EmbeddingVector, SimilarityLevel } from "@/types";
import { DimensionMismatchError, EmptyInputError } from "./errors";

function assertSameLength(a: EmbeddingVector, b: EmbeddingVector): void {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }
}

// ---------------------------------------------------------------------------
// Cosine Similarity
// ---------------------------------------------------------------------------

/**
 * Compute the cosine similarity between two vectors.
 *
 * Returns a value in [-1, 1] where 1 means identical direction,
 * 0 means orthogonal, and -1 means opposite direction.
 *
 * A zero-magnitude vector has no direction; its similarity to anything
 * is 0 rather than an error.
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  assertSameLength(a, b);

  let dot = 0;
  let magA = 0;
  let magB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(magA) * Math.sqrt(magB);

  if (magnitude === 0) return 0;

  // Rounding can push parallel vectors a hair past 1.
  return Math.max(-1, Math.min(1, dot / magnitude));
}

// ---------------------------------------------------------------------------
// Distances
// ---------------------------------------------------------------------------

/**
 * Squared Euclidean distance between two vectors.
 * Used for cluster assignment (avoids sqrt for performance).
 */
export function squaredDistance(a: EmbeddingVector, b: EmbeddingVector): number {
  assertSameLength(a, b);
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return sum;
}

/** Euclidean distance between two vectors. */
export function euclideanDistance(a: EmbeddingVector, b: EmbeddingVector): number {
  return Math.sqrt(squaredDistance(a, b));
}

// ---------------------------------------------------------------------------
// Centroid
// ---------------------------------------------------------------------------

/** Component-wise mean of a non-empty list of vectors. */
export function centroid(vectors: readonly EmbeddingVector[]): number[] {
  if (vectors.length === 0) {
    throw new EmptyInputError("Cannot compute the centroid of no vectors");
  }

  const dim = vectors[0].length;
  const sum = new Array<number>(dim).fill(0);

  for (const v of vectors) {
    if (v.length !== dim) {
      throw new DimensionMismatchError(dim, v.length);
    }
    for (let i = 0; i < dim; i++) {
      sum[i] += v[i];
    }
  }

  return sum.map((s) => s / vectors.length);
}

// ---------------------------------------------------------------------------
// Levels
// ---------------------------------------------------------------------------

/** Classify a similarity score for display. */
export function similarityLevel(score: number): SimilarityLevel {
  if (score >= 0.8) return "very_high";
  if (score >= 0.6) return "high";
  if (score >= 0.4) return "medium";
  return "low";
}
