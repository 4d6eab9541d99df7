/**
 * Search module — rank indexed concepts by cosine similarity.
 *
 * Brute force over the whole snapshot: the concept set is tens to low
 * hundreds of entries. Callers depend only on `rankConcepts`'s contract
 * (descending cosine similarity, ties in insertion order), so another
 * backing structure can replace the scan.
 */

import type { ConceptName, EmbeddingVector, ScoredConcept } from "@/types";
import type { ConceptSnapshot } from "./concepts";
import type { EmbeddingProvider } from "./embeddings";
import { DEFAULT_TOP_K } from "./config";
import { EmptyInputError, InvalidArgumentError, assertPositiveInteger } from "./errors";
import { cosineSimilarity } from "./similarity";

/**
 * Score every concept against `query`, sorted by similarity descending.
 * The sort is stable, so equal scores keep insertion order.
 *
 * @param exclude - Names to leave out (e.g. the concept being compared).
 */
export function scoreAll(
  snapshot: ConceptSnapshot,
  query: EmbeddingVector,
  exclude: ReadonlySet<ConceptName> = new Set(),
): ScoredConcept[] {
  const scored: ScoredConcept[] = [];

  for (const concept of snapshot.all()) {
    if (exclude.has(concept.name)) continue;
    scored.push({ concept, score: cosineSimilarity(query, concept.embedding) });
  }

  scored.sort((a, b) => b.score - a.score);

  return scored;
}

/** The `topK` concepts closest to `query`, clamped to the index size. */
export function rankConcepts(
  snapshot: ConceptSnapshot,
  query: EmbeddingVector,
  topK: number,
): ScoredConcept[] {
  assertPositiveInteger("topK", topK);
  return scoreAll(snapshot, query).slice(0, topK);
}

/**
 * Every other concept ranked by similarity to the named one.
 * Throws NotFoundError for an unknown name.
 */
export function neighborsOf(snapshot: ConceptSnapshot, name: ConceptName): ScoredConcept[] {
  const target = snapshot.get(name);
  return scoreAll(snapshot, target.embedding, new Set([name]));
}

/**
 * Semantic search: embed `queryText` and return the closest concepts.
 *
 * The query goes through the provider, so a cached provider answers
 * repeated queries without a new request.
 */
export async function search(
  snapshot: ConceptSnapshot,
  provider: EmbeddingProvider,
  queryText: string,
  topK: number = DEFAULT_TOP_K,
): Promise<ScoredConcept[]> {
  assertPositiveInteger("topK", topK);

  if (!queryText.trim()) {
    throw new InvalidArgumentError("Search query must not be empty");
  }

  if (snapshot.size === 0) {
    throw new EmptyInputError("No concepts indexed yet");
  }

  const query = await provider.embed(queryText);
  return rankConcepts(snapshot, query, topK);
}
