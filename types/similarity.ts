/**
 * Similarity types for the concept lab.
 */

import type { Concept, ConceptName } from "./concept";

/** Coarse label for a cosine similarity score. */
export type SimilarityLevel = "very_high" | "high" | "medium" | "low";

/** Similarity between two indexed concepts, computed on demand. */
export interface SimilarityPair {
  conceptA: ConceptName;
  conceptB: ConceptName;
  /** Cosine similarity in [-1, 1]. */
  score: number;
  level: SimilarityLevel;
}

/** A concept ranked against a query. */
export interface ScoredConcept {
  concept: Concept;
  /** Cosine similarity between the query and the concept. */
  score: number;
}
