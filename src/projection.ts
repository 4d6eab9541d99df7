/**
 * Projection module — 2D layout of concepts for visualization.
 *
 * Principal component analysis onto the two directions of largest
 * variance. The concept set is small (n in the tens) while embeddings are
 * wide (768), so the eigenvectors are taken from the n×n Gram matrix of
 * the centered vectors instead of the covariance matrix. The principal
 * component scores are then sqrt(λ)·u for each eigenpair (λ, u).
 */

import type { Concept, ProjectionPoint } from "@/types";
import { PROJECTION_SCALE } from "./config";
import { EmptyInputError } from "./errors";
import { type Rng, createSeededRng } from "./random";
import { centroid } from "./similarity";

const PROJECTION_SEED = 7;
const MAX_POWER_ITERATIONS = 1000;
const CONVERGENCE_TOLERANCE = 1e-12;

/** Relative size below which an eigenvalue counts as zero. */
const ZERO_VARIANCE = 1e-12;

interface Eigenpair {
  value: number;
  vector: number[];
}

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

function multiply(matrix: readonly number[][], v: readonly number[]): number[] {
  return matrix.map((row) => dot(row, v));
}

function normalize(v: number[]): number[] {
  const norm = Math.sqrt(dot(v, v));
  return norm === 0 ? v : v.map((x) => x / norm);
}

/**
 * Dominant eigenpair of a symmetric positive semi-definite matrix by power
 * iteration from a random start.
 */
function dominantEigenpair(matrix: readonly number[][], rng: Rng): Eigenpair {
  let v = normalize(matrix.map(() => rng() - 0.5));

  for (let iter = 0; iter < MAX_POWER_ITERATIONS; iter++) {
    const next = normalize(multiply(matrix, v));
    let delta = 0;
    for (let i = 0; i < next.length; i++) {
      delta = Math.max(delta, Math.abs(next[i] - v[i]));
    }
    v = next;
    if (delta < CONVERGENCE_TOLERANCE) break;
  }

  return { value: dot(v, multiply(matrix, v)), vector: v };
}

/** Subtract λ·u·uᵀ so the next power iteration finds the following eigenpair. */
function deflate(matrix: readonly number[][], { value, vector }: Eigenpair): number[][] {
  return matrix.map((row, i) => row.map((x, j) => x - value * vector[i] * vector[j]));
}

/**
 * Flip an axis so its largest-magnitude coordinate is positive; otherwise
 * the sign would depend on the random start.
 */
function orient(scores: number[]): number[] {
  let largest = 0;
  for (const s of scores) {
    if (Math.abs(s) > Math.abs(largest)) largest = s;
  }
  return largest < 0 ? scores.map((s) => -s) : scores;
}

/**
 * Project concepts onto the plane of their two principal components.
 *
 * Coordinates are scaled uniformly (both axes by the same factor) so that
 * the largest absolute coordinate equals `scale`; relative distances are
 * kept. A single concept, or concepts that all share one vector, map to
 * the origin.
 */
export function projectTo2D(
  concepts: readonly Concept[],
  scale: number = PROJECTION_SCALE,
): ProjectionPoint[] {
  if (concepts.length === 0) {
    throw new EmptyInputError("No concepts to project");
  }

  const vectors = concepts.map((c) => c.embedding);
  const mean = centroid(vectors);
  const centered = vectors.map((v) => v.map((x, i) => x - mean[i]));
  const gram = centered.map((a) => centered.map((b) => dot(a, b)));

  const totalVariance = gram.reduce((sum, row, i) => sum + row[i], 0);
  const totalMagnitude = vectors.reduce((sum, v) => sum + dot(v, v), 0);

  // Identical vectors leave only rounding noise after centering.
  if (totalVariance <= ZERO_VARIANCE * totalMagnitude) {
    return concepts.map((c) => ({ conceptName: c.name, x: 0, y: 0 }));
  }

  const rng = createSeededRng(PROJECTION_SEED);
  const axes: number[][] = [];
  let residual = gram;

  for (let axis = 0; axis < 2; axis++) {
    const pair = dominantEigenpair(residual, rng);
    if (pair.value <= ZERO_VARIANCE * totalVariance) {
      axes.push(new Array<number>(concepts.length).fill(0));
      continue;
    }
    axes.push(orient(pair.vector.map((u) => Math.sqrt(pair.value) * u)));
    residual = deflate(residual, pair);
  }

  const [xs, ys] = axes;
  let extent = 0;
  for (let i = 0; i < concepts.length; i++) {
    extent = Math.max(extent, Math.abs(xs[i]), Math.abs(ys[i]));
  }
  const factor = extent === 0 ? 0 : scale / extent;

  return concepts.map((c, i) => ({
    conceptName: c.name,
    x: xs[i] * factor,
    y: ys[i] * factor,
  }));
}
