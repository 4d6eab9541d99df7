export type {
  ConceptName,
  VideoId,
  ConceptType,
  Concept,
  ConceptFeedEntry,
  ConceptSummary,
  ConceptInfo,
} from "./concept";
export { CONCEPT_TYPES } from "./concept";

export type { EmbeddingVector, ModelStatus } from "./embedding";

export type { SimilarityLevel, SimilarityPair, ScoredConcept } from "./similarity";

export type { Cluster } from "./cluster";

export type { ProjectionPoint } from "./projection";

export type { QuizQuestion } from "./quiz";

export type { RelatedVideo } from "./graph";
