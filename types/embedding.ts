/**
 * Embedding types for the concept lab.
 *
 * Embeddings map concept names into vector space for similarity computation.
 */

/** A dense vector representing a text's semantic position. */
export type EmbeddingVector = readonly number[];

/** Result of probing the local embedding model. */
export type ModelStatus =
  | { status: "ok"; model: string; dimensions: number }
  | { status: "not_installed"; model: string; installCommand: string }
  | { status: "unavailable"; model: string; error: string };
