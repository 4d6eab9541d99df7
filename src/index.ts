export * from "../types";

export {
  createConceptLab,
  type ConceptLab,
  type ConceptLabOptions,
  type LabResult,
  type LabFailure,
  type SearchHit,
  type ClusterView,
  type ProjectedConcept,
  type QuizView,
} from "./lab";

export {
  type EmbeddingProvider,
  type CachedEmbeddingProvider,
  type OllamaOptions,
  createOllamaProvider,
  createCachedProvider,
  checkModel,
  embedConcept,
} from "./embeddings";

export { ConceptIndex, ConceptSnapshot, conceptFeedSchema, parseConceptFeed } from "./concepts";
export { search, rankConcepts, neighborsOf, scoreAll } from "./search";
export { clusterConcepts, kmeans, farthestFirstInit, type ClusterOptions } from "./cluster";
export { projectTo2D } from "./projection";
export { nextQuestion, correctAnswerFor, checkAnswer } from "./quiz";
export { relatedVideos } from "./graph";
export {
  cosineSimilarity,
  squaredDistance,
  euclideanDistance,
  centroid,
  similarityLevel,
} from "./similarity";
export { type Rng, createSeededRng, shuffle } from "./random";
export {
  type LabErrorCode,
  LabError,
  ProviderUnavailableError,
  ProviderTimeoutError,
  DimensionMismatchError,
  NotFoundError,
  InvalidArgumentError,
  EmptyInputError,
  LoadSupersededError,
} from "./errors";
