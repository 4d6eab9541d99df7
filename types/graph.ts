/**
 * Graph types for the concept lab.
 */

import type { ConceptName, VideoId } from "./concept";

/** A video linked to another through the concepts they share. */
export interface RelatedVideo {
  videoId: VideoId;
  /** Concepts mined from both videos, in index insertion order. */
  sharedConcepts: ConceptName[];
  /** Sum of the shared concepts' importance. */
  score: number;
}
