/**
 * Shared test utilities.
 *
 * A five-concept fixture in a 4-dimensional toy embedding space with
 * axes (python, web, containers, orchestration): Python, Flask and
 * FastAPI sit together, Docker and Kubernetes sit together.
 */

import type { Concept, ConceptFeedEntry, ConceptType } from "@/types";
import { ConceptSnapshot } from "./concepts";
import type { EmbeddingProvider } from "./embeddings";

/** Embeddings of the fixture concepts, keyed by name. */
export const FIXTURE_VECTORS: Record<string, number[]> = {
  Python: [0.9, 0.3, 0.05, 0.0],
  Flask: [0.7, 0.7, 0.05, 0.0],
  FastAPI: [0.75, 0.65, 0.1, 0.0],
  Docker: [0.05, 0.1, 0.9, 0.4],
  Kubernetes: [0.0, 0.05, 0.7, 0.7],
};

/** Query embeddings the stub provider knows besides the concept names. */
export const QUERY_VECTORS: Record<string, number[]> = {
  "web framework": [0.6, 0.8, 0.0, 0.0],
  containers: [0.0, 0.0, 1.0, 0.0],
};

/** The fixture as the extraction layer would feed it. */
export const FIXTURE_FEED: ConceptFeedEntry[] = [
  { name: "Python", type: "language", sourceVideoIds: ["vid-1", "vid-2", "vid-3"], importance: 0.9 },
  { name: "Flask", type: "library", sourceVideoIds: ["vid-1"], importance: 0.7 },
  { name: "FastAPI", type: "library", sourceVideoIds: ["vid-2"], importance: 0.8 },
  { name: "Docker", type: "tool", sourceVideoIds: ["vid-2", "vid-4"], importance: 0.6 },
  { name: "Kubernetes", type: "tool", sourceVideoIds: ["vid-4"] },
];

/** Build a concept directly, without going through a provider. */
export function makeConcept(
  name: string,
  embedding: number[],
  type: ConceptType = "concept",
  sourceVideos: string[] = [],
  importance = 0.5,
): Concept {
  return { name, type, embedding, sourceVideos: new Set(sourceVideos), importance };
}

/** Snapshot holding the five fixture concepts in feed order. */
export function fixtureSnapshot(): ConceptSnapshot {
  return ConceptSnapshot.from(
    FIXTURE_FEED.map((entry) =>
      makeConcept(
        entry.name,
        FIXTURE_VECTORS[entry.name],
        entry.type,
        entry.sourceVideoIds,
        entry.importance ?? 0.5,
      ),
    ),
  );
}

/**
 * In-memory provider answering from the fixture tables.
 * `calls` records every text that reached it.
 */
export function stubProvider(): EmbeddingProvider & { calls: string[] } {
  const calls: string[] = [];
  return {
    model: "stub-model",
    calls,
    async embed(text: string) {
      calls.push(text);
      const vector = FIXTURE_VECTORS[text] ?? QUERY_VECTORS[text];
      if (!vector) throw new Error(`No stub embedding for "${text}"`);
      return vector;
    },
  };
}
