/**
 * Centralized configuration for the concept lab.
 *
 * Every tunable lives here. Values fall back to sensible defaults
 * and can be overridden via environment variables. Numeric overrides
 * are validated when this module is first imported.
 */

function optionalEnv(name: string, fallback: string): string {
  return process.env[name] || fallback;
}

function optionalNumericEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Environment variable ${name} must be a number, got: ${raw}`);
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Embedding
// ---------------------------------------------------------------------------

/** Base URL of the local Ollama server. */
export const OLLAMA_URL = optionalEnv("OLLAMA_URL", "http://localhost:11434");

/** Ollama model used for generating embeddings. */
export const EMBEDDING_MODEL = optionalEnv("EMBEDDING_MODEL", "nomic-embed-text");

/** Per-request timeout for embedding calls, in milliseconds. */
export const EMBEDDING_TIMEOUT_MS = optionalNumericEnv(
  "EMBEDDING_TIMEOUT_MS",
  30_000,
);

// ---------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------

/** Number of results returned by a search when the caller does not say. */
export const DEFAULT_TOP_K = optionalNumericEnv("DEFAULT_TOP_K", 5);

// ---------------------------------------------------------------------------
// Clustering
// ---------------------------------------------------------------------------

/** Cluster count used for the visualization when none is requested. */
export const DEFAULT_CLUSTER_COUNT = optionalNumericEnv("DEFAULT_CLUSTER_COUNT", 3);

/** Maximum iterations for k-means convergence. */
export const KMEANS_MAX_ITERATIONS = optionalNumericEnv(
  "KMEANS_MAX_ITERATIONS",
  100,
);

/** Seed for centroid initialization; same seed and input give the same clusters. */
export const CLUSTER_SEED = optionalNumericEnv("CLUSTER_SEED", 42);

// ---------------------------------------------------------------------------
// Projection
// ---------------------------------------------------------------------------

/** Largest absolute coordinate of a projected point. */
export const PROJECTION_SCALE = optionalNumericEnv("PROJECTION_SCALE", 100);

// ---------------------------------------------------------------------------
// Quiz
// ---------------------------------------------------------------------------

/** Number of wrong options shown next to the correct answer. */
export const QUIZ_DISTRACTORS = 3;

/** A quiz needs a prompt, its answer and the distractors. */
export const QUIZ_MIN_CONCEPTS = QUIZ_DISTRACTORS + 2;

// ---------------------------------------------------------------------------
// Concept graph
// ---------------------------------------------------------------------------

/** Importance given to a concept whose feed entry does not carry one. */
export const DEFAULT_IMPORTANCE = optionalNumericEnv("DEFAULT_IMPORTANCE", 0.5);

/** Maximum number of related videos returned for a video. */
export const RELATED_VIDEOS_LIMIT = optionalNumericEnv("RELATED_VIDEOS_LIMIT", 10);
