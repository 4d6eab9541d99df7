/**
 * Concept types for the concept lab.
 *
 * A concept is a canonicalized named entity (a language, a library, an
 * idea) mined from one or more videos, placed in embedding space.
 */

import type { EmbeddingVector } from "./embedding";

/** Canonical concept name; the unique key of the index. */
export type ConceptName = string;

/** Opaque identifier of the video a concept was mined from. */
export type VideoId = string;

/** Category assigned to a concept by the extractor. */
export type ConceptType = "language" | "library" | "tool" | "concept" | "methodology";

/** All valid concept types, useful for validation. */
export const CONCEPT_TYPES = [
  "language",
  "library",
  "tool",
  "concept",
  "methodology",
] as const satisfies readonly ConceptType[];

/** A concept held by the index. */
export interface Concept {
  /** Canonical name (synonyms are resolved before a concept gets here). */
  readonly name: ConceptName;
  readonly type: ConceptType;
  /** Embedding of the concept name. */
  readonly embedding: EmbeddingVector;
  /** Videos this concept was mined from. */
  readonly sourceVideos: ReadonlySet<VideoId>;
  /** How central the concept is to its videos, in [0, 1]. */
  readonly importance: number;
  /** Broader concept this one belongs to, when the extractor named one. */
  readonly parent?: ConceptName;
}

/** One entry of the concept feed produced by the extraction layer. */
export interface ConceptFeedEntry {
  name: ConceptName;
  type: ConceptType;
  sourceVideoIds: VideoId[];
  importance?: number;
  parent?: ConceptName | null;
}

/** A concept name with its type, as listed to callers. */
export interface ConceptSummary {
  name: ConceptName;
  type: ConceptType;
}

/** Everything the index knows about one concept, as shown to callers. */
export interface ConceptInfo {
  name: ConceptName;
  type: ConceptType;
  importance: number;
  /** Source videos in the order the feed listed them. */
  sourceVideoIds: VideoId[];
  parent?: ConceptName;
}
