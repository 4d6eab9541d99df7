/**
 * Graph module — videos linked through the concepts they share.
 *
 * The concept index doubles as a bipartite graph: every concept points at
 * the videos it was mined from. Two videos are related when some concept
 * points at both, and the link weighs as much as the shared concepts'
 * importance combined.
 */

import type { RelatedVideo, VideoId } from "@/types";
import type { ConceptSnapshot } from "./concepts";
import { RELATED_VIDEOS_LIMIT } from "./config";
import { assertPositiveInteger } from "./errors";

/**
 * Videos sharing at least one concept with `videoId`, strongest first.
 *
 * Equal scores keep the order in which the videos were first reached
 * walking the index. An unknown video has no related videos.
 */
export function relatedVideos(
  snapshot: ConceptSnapshot,
  videoId: VideoId,
  limit: number = RELATED_VIDEOS_LIMIT,
): RelatedVideo[] {
  assertPositiveInteger("limit", limit);

  const related = new Map<VideoId, RelatedVideo>();

  for (const concept of snapshot.all()) {
    if (!concept.sourceVideos.has(videoId)) continue;

    for (const other of concept.sourceVideos) {
      if (other === videoId) continue;

      let entry = related.get(other);
      if (!entry) {
        entry = { videoId: other, sharedConcepts: [], score: 0 };
        related.set(other, entry);
      }
      entry.sharedConcepts.push(concept.name);
      entry.score += concept.importance;
    }
  }

  return [...related.values()].sort((a, b) => b.score - a.score).slice(0, limit);
}
