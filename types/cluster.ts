/**
 * Cluster types for the concept lab.
 *
 * Clusters partition the concept set by proximity in embedding space.
 * They are recomputed in full on every run and never stored.
 */

import type { ConceptName } from "./concept";
import type { EmbeddingVector } from "./embedding";

/** A group of concepts close to each other in embedding space. */
export interface Cluster {
  /** Dense cluster id, starting at 0. */
  id: number;
  /** Centroid vector: the mean embedding of the members. */
  centroid: EmbeddingVector;
  /** Member names, in index insertion order. */
  members: ConceptName[];
}
