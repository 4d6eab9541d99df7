/**
 * Concepts module — the in-memory concept index and its input feed.
 *
 * The index is a sequence of immutable snapshots. Every mutation builds a
 * new snapshot and swaps it in with a single assignment, so a reader that
 * took a snapshot keeps a consistent view while a rebuild runs.
 */

import { z } from "zod";
import { CONCEPT_TYPES } from "@/types";
import type { Concept, ConceptFeedEntry, ConceptName } from "@/types";
import { DimensionMismatchError, InvalidArgumentError, NotFoundError } from "./errors";

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

/** An immutable, ordered view of the indexed concepts. */
export class ConceptSnapshot {
  private readonly byName: ReadonlyMap<ConceptName, Concept>;

  private constructor(
    private readonly ordered: readonly Concept[],
    /** Shared embedding length, or null while the snapshot is empty. */
    readonly dimensions: number | null,
  ) {
    this.byName = new Map(ordered.map((c) => [c.name, c]));
  }

  /** A snapshot with no concepts. */
  static empty(): ConceptSnapshot {
    return new ConceptSnapshot([], null);
  }

  /**
   * Build a snapshot from concepts in insertion order. A repeated name
   * replaces the earlier entry in place, like an upsert.
   */
  static from(concepts: Iterable<Concept>): ConceptSnapshot {
    const ordered: Concept[] = [];
    const positions = new Map<ConceptName, number>();

    for (const concept of concepts) {
      const at = positions.get(concept.name);
      if (at === undefined) {
        positions.set(concept.name, ordered.length);
        ordered.push(concept);
      } else {
        ordered[at] = concept;
      }
    }

    let dimensions: number | null = null;
    for (const concept of ordered) {
      if (concept.embedding.length === 0) {
        throw new InvalidArgumentError(`Concept "${concept.name}" has an empty embedding`);
      }
      dimensions ??= concept.embedding.length;
      if (concept.embedding.length !== dimensions) {
        throw new DimensionMismatchError(dimensions, concept.embedding.length);
      }
    }

    return new ConceptSnapshot(Object.freeze(ordered), dimensions);
  }

  /** Number of concepts. */
  get size(): number {
    return this.ordered.length;
  }

  /** Concepts in insertion order. */
  all(): readonly Concept[] {
    return this.ordered;
  }

  /** Look up a concept; throws NotFoundError for an unknown name. */
  get(name: ConceptName): Concept {
    const concept = this.byName.get(name);
    if (!concept) throw new NotFoundError(name);
    return concept;
  }

  /** Whether a concept with this name is indexed. */
  has(name: ConceptName): boolean {
    return this.byName.has(name);
  }

  /** A new snapshot with `concept` inserted or replaced. */
  withUpsert(concept: Concept): ConceptSnapshot {
    return ConceptSnapshot.from([...this.ordered, concept]);
  }
}

// ---------------------------------------------------------------------------
// Index
// ---------------------------------------------------------------------------

/**
 * Owner of the concept-to-vector mapping for one session.
 *
 * Query code should call `snapshot()` once per request and read only from
 * that snapshot.
 */
export class ConceptIndex {
  private current: ConceptSnapshot = ConceptSnapshot.empty();

  /** Insert a concept, or replace the one with the same name in place. */
  upsert(concept: Concept): void {
    this.current = this.current.withUpsert(concept);
  }

  /**
   * Replace the whole index. The batch is validated first; on failure the
   * previous contents stay visible.
   */
  rebuild(concepts: Iterable<Concept>): void {
    this.current = ConceptSnapshot.from(concepts);
  }

  all(): readonly Concept[] {
    return this.current.all();
  }

  get(name: ConceptName): Concept {
    return this.current.get(name);
  }

  get size(): number {
    return this.current.size;
  }

  snapshot(): ConceptSnapshot {
    return this.current;
  }
}

// ---------------------------------------------------------------------------
// Feed
// ---------------------------------------------------------------------------

const conceptFeedEntrySchema = z.object({
  name: z.string().refine((s) => s.trim().length > 0, "must not be blank"),
  type: z.enum(CONCEPT_TYPES),
  sourceVideoIds: z.array(z.string()).default([]),
  importance: z.number().min(0).max(1).optional(),
  parent: z.string().nullable().optional(),
});

/** Schema of the feed produced by the concept-extraction layer. */
export const conceptFeedSchema = z.array(conceptFeedEntrySchema);

/**
 * Validate an untrusted concept feed.
 * Throws InvalidArgumentError listing every offending field.
 */
export function parseConceptFeed(input: unknown): ConceptFeedEntry[] {
  const result = conceptFeedSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError(`Invalid concept feed: ${issues}`);
  }
  return result.data;
}
