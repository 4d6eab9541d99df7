/**
 * Lab facade — the operations a UI or transport layer calls.
 *
 * One lab owns one concept index and one embedding cache. Every operation
 * resolves to a LabResult: typed failures (LabError) become `ok: false`
 * results carrying the code, message and status; anything else is a bug
 * and rejects.
 */

import type {
  Concept,
  ConceptInfo,
  ConceptName,
  ConceptSummary,
  ModelStatus,
  RelatedVideo,
  SimilarityPair,
  VideoId,
} from "@/types";
import { ConceptIndex, parseConceptFeed } from "./concepts";
import { clusterConcepts } from "./cluster";
import { CLUSTER_SEED, DEFAULT_CLUSTER_COUNT, DEFAULT_TOP_K } from "./config";
import {
  type EmbeddingProvider,
  type OllamaOptions,
  checkModel,
  createCachedProvider,
  createOllamaProvider,
  embedConcept,
} from "./embeddings";
import {
  type LabErrorCode,
  LabError,
  LoadSupersededError,
  assertPositiveInteger,
} from "./errors";
import { relatedVideos } from "./graph";
import { projectTo2D } from "./projection";
import { correctAnswerFor, nextQuestion } from "./quiz";
import type { Rng } from "./random";
import { search } from "./search";
import { cosineSimilarity, similarityLevel } from "./similarity";

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/** Serializable description of a failed operation. */
export interface LabFailure {
  code: LabErrorCode;
  message: string;
  status: number;
  /** Whether the same request may succeed later. */
  retryable: boolean;
}

export type LabResult<T> = { ok: true; value: T } | { ok: false; error: LabFailure };

export interface SearchHit {
  name: ConceptName;
  score: number;
}

export interface ClusterView {
  clusterId: number;
  memberNames: ConceptName[];
}

export interface ProjectedConcept {
  name: ConceptName;
  x: number;
  y: number;
  clusterId: number;
}

export interface QuizView {
  prompt: ConceptName;
  options: ConceptName[];
}

// ---------------------------------------------------------------------------
// Lab
// ---------------------------------------------------------------------------

export interface ConceptLabOptions {
  /** Embedding backend; defaults to a local Ollama server. */
  provider?: EmbeddingProvider;
  /** Connection settings for the default provider and the model probe. */
  ollama?: OllamaOptions;
  /** Replaces the Ollama model probe behind `modelStatus`. */
  probeModel?: () => Promise<ModelStatus>;
  /** Seed for cluster initialization. */
  seed?: number;
  /** Source of randomness for quiz questions. */
  rng?: Rng;
  /** Cluster count used by `projection`. */
  defaultClusterCount?: number;
}

export interface ConceptLab {
  /**
   * Replace the index with the concepts of `feed`; the old index stays on
   * failure. A load overtaken by a later one fails with SUPERSEDED.
   */
  load(feed: unknown): Promise<LabResult<{ count: number }>>;
  listConcepts(): Promise<LabResult<ConceptSummary[]>>;
  conceptInfo(name: ConceptName): Promise<LabResult<ConceptInfo>>;
  search(query: string, topK?: number): Promise<LabResult<SearchHit[]>>;
  similarity(nameA: ConceptName, nameB: ConceptName): Promise<LabResult<SimilarityPair>>;
  clusters(k?: number): Promise<LabResult<ClusterView[]>>;
  projection(): Promise<LabResult<ProjectedConcept[]>>;
  nextQuiz(): Promise<LabResult<QuizView>>;
  checkQuiz(prompt: ConceptName, chosenAnswer: ConceptName): Promise<LabResult<boolean>>;
  relatedVideos(videoId: VideoId, limit?: number): Promise<LabResult<RelatedVideo[]>>;
  modelStatus(): Promise<LabResult<ModelStatus>>;
}

/** Log a typed failure and turn it into a result. */
function fail(operation: string, err: LabError): { ok: false; error: LabFailure } {
  const entry = JSON.stringify({
    event: "lab_request_failed",
    operation,
    code: err.code,
    message: err.message,
  });

  // Vectors from different models got mixed.
  if (err.code === "DIMENSION_MISMATCH") {
    console.error(entry);
  } else {
    console.log(entry);
  }

  return {
    ok: false,
    error: { code: err.code, message: err.message, status: err.status, retryable: err.retryable },
  };
}

async function run<T>(operation: string, fn: () => T | Promise<T>): Promise<LabResult<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    if (err instanceof LabError) return fail(operation, err);
    throw err;
  }
}

export function createConceptLab(options: ConceptLabOptions = {}): ConceptLab {
  const defaultClusterCount = options.defaultClusterCount ?? DEFAULT_CLUSTER_COUNT;
  assertPositiveInteger("defaultClusterCount", defaultClusterCount);

  const provider = createCachedProvider(
    options.provider ?? createOllamaProvider(options.ollama),
  );
  const probeModel = options.probeModel ?? (() => checkModel(options.ollama));
  const seed = options.seed ?? CLUSTER_SEED;
  const rng = options.rng ?? Math.random;
  const index = new ConceptIndex();
  let loadGeneration = 0;

  return {
    load: (feed) =>
      run("load", async () => {
        const entries = parseConceptFeed(feed);
        const generation = ++loadGeneration;

        // Cached vectors may come from a previous model.
        provider.clear();

        const concepts: Concept[] = [];
        for (const entry of entries) {
          concepts.push(await embedConcept(entry, provider));
        }

        // Loads commit in call order, not completion order.
        if (generation !== loadGeneration) throw new LoadSupersededError();
        index.rebuild(concepts);

        console.log(
          JSON.stringify({ event: "index_rebuilt", concepts: index.size, model: provider.model }),
        );
        return { count: index.size };
      }),

    listConcepts: () =>
      run("listConcepts", () => index.all().map((c) => ({ name: c.name, type: c.type }))),

    conceptInfo: (name) =>
      run("conceptInfo", () => {
        const concept = index.get(name);
        return {
          name: concept.name,
          type: concept.type,
          importance: concept.importance,
          sourceVideoIds: [...concept.sourceVideos],
          ...(concept.parent ? { parent: concept.parent } : {}),
        };
      }),

    search: (query, topK = DEFAULT_TOP_K) =>
      run("search", async () => {
        const results = await search(index.snapshot(), provider, query, topK);
        return results.map((r) => ({ name: r.concept.name, score: r.score }));
      }),

    similarity: (nameA, nameB) =>
      run("similarity", () => {
        const snapshot = index.snapshot();
        const score = cosineSimilarity(snapshot.get(nameA).embedding, snapshot.get(nameB).embedding);
        return { conceptA: nameA, conceptB: nameB, score, level: similarityLevel(score) };
      }),

    clusters: (k = defaultClusterCount) =>
      run("clusters", () =>
        clusterConcepts(index.snapshot(), k, { seed }).map((c) => ({
          clusterId: c.id,
          memberNames: c.members,
        })),
      ),

    projection: () =>
      run("projection", () => {
        const snapshot = index.snapshot();
        const points = projectTo2D(snapshot.all());
        const k = Math.min(defaultClusterCount, snapshot.size);

        const clusterOf = new Map<ConceptName, number>();
        for (const cluster of clusterConcepts(snapshot, k, { seed })) {
          for (const name of cluster.members) clusterOf.set(name, cluster.id);
        }

        return points.map((p) => ({
          name: p.conceptName,
          x: p.x,
          y: p.y,
          clusterId: clusterOf.get(p.conceptName) ?? 0,
        }));
      }),

    nextQuiz: () =>
      run("nextQuiz", () => {
        const question = nextQuestion(index.snapshot(), rng);
        return { prompt: question.prompt, options: question.options };
      }),

    checkQuiz: (prompt, chosenAnswer) =>
      run("checkQuiz", () => correctAnswerFor(index.snapshot(), prompt) === chosenAnswer),

    relatedVideos: (videoId, limit) =>
      run("relatedVideos", () => relatedVideos(index.snapshot(), videoId, limit)),

    modelStatus: () => run("modelStatus", probeModel),
  };
}
