/**
 * Clustering module — k-means clustering of concept embeddings.
 *
 * Pure math, no external dependencies. Partitions the concept set into
 * k groups by running k-means on the embedding vectors. Runs are
 * deterministic: the only random draw comes from a seeded PRNG.
 */

import type { Cluster, EmbeddingVector } from "@/types";
import type { ConceptSnapshot } from "./concepts";
import { CLUSTER_SEED, KMEANS_MAX_ITERATIONS } from "./config";
import { EmptyInputError, InvalidArgumentError, assertPositiveInteger } from "./errors";
import { type Rng, createSeededRng, randomIndex } from "./random";
import { squaredDistance } from "./similarity";

// ---------------------------------------------------------------------------
// Vector math helpers
// ---------------------------------------------------------------------------

/** Add vector b to vector a in place. */
function addInPlace(a: number[], b: EmbeddingVector): void {
  for (let i = 0; i < a.length; i++) {
    a[i] += b[i];
  }
}

/** Scale vector a by scalar s in place. */
function scaleInPlace(a: number[], s: number): void {
  for (let i = 0; i < a.length; i++) {
    a[i] *= s;
  }
}

// ---------------------------------------------------------------------------
// K-Means
// ---------------------------------------------------------------------------

/** Result of a single k-means run. */
export interface KMeansResult {
  /** Cluster assignments: assignments[i] is the cluster index for point i. */
  assignments: number[];
  /** Centroid vectors, one per cluster. */
  centroids: EmbeddingVector[];
  /** Number of iterations until convergence (or max). */
  iterations: number;
}

/**
 * Pick k initial centroids spread across the data (farthest-first).
 *
 * The first centroid is a point drawn with `rng`. Each later centroid is
 * the point farthest from its nearest chosen centroid; ties go to the
 * lowest index. With duplicate points a centroid may repeat, which leaves
 * a cluster empty.
 */
export function farthestFirstInit(
  vectors: readonly EmbeddingVector[],
  k: number,
  rng: Rng,
): EmbeddingVector[] {
  const n = vectors.length;
  const centroids: EmbeddingVector[] = [[...vectors[randomIndex(n, rng)]]];

  // Distance from each point to its nearest centroid
  const distances = new Array<number>(n).fill(Infinity);

  for (let c = 1; c < k; c++) {
    const latest = centroids[c - 1];
    let chosen = 0;

    for (let i = 0; i < n; i++) {
      const d = squaredDistance(vectors[i], latest);
      if (d < distances[i]) {
        distances[i] = d;
      }
      if (distances[i] > distances[chosen]) {
        chosen = i;
      }
    }

    centroids.push([...vectors[chosen]]);
  }

  return centroids;
}

/**
 * Run k-means clustering on a set of vectors.
 *
 * Stops when no assignment changes or after `maxIterations` passes.
 * A cluster that loses all its points keeps its previous centroid.
 *
 * @param initCentroids - Starting centroids; one per cluster.
 */
export function kmeans(
  vectors: readonly EmbeddingVector[],
  k: number,
  maxIterations: number,
  initCentroids: readonly EmbeddingVector[],
): KMeansResult {
  const n = vectors.length;
  const dim = vectors[0].length;

  let centroids: EmbeddingVector[] = initCentroids.map((c) => [...c]);
  const assignments = new Array<number>(n).fill(-1);
  let iterations = 0;

  for (let iter = 0; iter < maxIterations; iter++) {
    iterations = iter + 1;
    let changed = false;

    // Assignment step: nearest centroid, ties to the lowest cluster index
    for (let i = 0; i < n; i++) {
      let bestCluster = 0;
      let bestDist = Infinity;

      for (let c = 0; c < k; c++) {
        const dist = squaredDistance(vectors[i], centroids[c]);
        if (dist < bestDist) {
          bestDist = dist;
          bestCluster = c;
        }
      }

      if (assignments[i] !== bestCluster) {
        assignments[i] = bestCluster;
        changed = true;
      }
    }

    if (!changed) break;

    // Update step: recompute centroids as mean of assigned points
    const sums: number[][] = [];
    const counts = new Array<number>(k).fill(0);

    for (let c = 0; c < k; c++) {
      sums.push(new Array<number>(dim).fill(0));
    }

    for (let i = 0; i < n; i++) {
      const c = assignments[i];
      addInPlace(sums[c], vectors[i]);
      counts[c]++;
    }

    centroids = sums.map((sum, c) => {
      if (counts[c] === 0) return centroids[c];
      scaleInPlace(sum, 1 / counts[c]);
      return sum;
    });
  }

  return { assignments, centroids, iterations };
}

// ---------------------------------------------------------------------------
// High-level clustering
// ---------------------------------------------------------------------------

/** Tunables for a clustering run. */
export interface ClusterOptions {
  /** PRNG seed for the first centroid. */
  seed?: number;
  maxIterations?: number;
}

/**
 * Partition the indexed concepts into at most k clusters.
 *
 * Every concept lands in exactly one cluster. Clusters left empty after
 * convergence are dropped, and the survivors are renumbered densely from
 * 0 in their original order, so fewer than k clusters may come back when
 * the index holds duplicate vectors.
 */
export function clusterConcepts(
  snapshot: ConceptSnapshot,
  k: number,
  options: ClusterOptions = {},
): Cluster[] {
  assertPositiveInteger("k", k);
  const maxIterations = options.maxIterations ?? KMEANS_MAX_ITERATIONS;
  assertPositiveInteger("maxIterations", maxIterations);

  const concepts = snapshot.all();

  if (concepts.length === 0) {
    throw new EmptyInputError("No concepts indexed yet");
  }

  if (k > concepts.length) {
    throw new InvalidArgumentError(
      `'k' must not exceed the number of concepts (${concepts.length}), got: ${k}`,
    );
  }

  const vectors = concepts.map((c) => c.embedding);
  const rng = createSeededRng(options.seed ?? CLUSTER_SEED);
  const result = kmeans(vectors, k, maxIterations, farthestFirstInit(vectors, k, rng));

  const clusters: Cluster[] = [];

  for (let c = 0; c < k; c++) {
    const members = concepts
      .filter((_, i) => result.assignments[i] === c)
      .map((concept) => concept.name);

    if (members.length === 0) continue;

    clusters.push({ id: clusters.length, centroid: result.centroids[c], members });
  }

  return clusters;
}
