/**
 * Embedding module — pluggable provider interface + Ollama implementation.
 *
 * Generates dense vector embeddings from text. The provider interface
 * allows swapping embedding backends without changing consumer code, and
 * the caching wrapper keeps repeated lookups of the same text local.
 */

import { z } from "zod";
import type { Concept, ConceptFeedEntry, EmbeddingVector, ModelStatus } from "@/types";
import {
  DEFAULT_IMPORTANCE,
  EMBEDDING_MODEL,
  EMBEDDING_TIMEOUT_MS,
  OLLAMA_URL,
} from "./config";
import {
  InvalidArgumentError,
  LabError,
  ProviderTimeoutError,
  ProviderUnavailableError,
} from "./errors";

// ---------------------------------------------------------------------------
// Provider Interface
// ---------------------------------------------------------------------------

/** A pluggable embedding provider. */
export interface EmbeddingProvider {
  /** Generate an embedding vector for the given text. */
  embed(text: string): Promise<EmbeddingVector>;
  /** Identifier of the model this provider uses. */
  readonly model: string;
}

// ---------------------------------------------------------------------------
// Ollama Provider
// ---------------------------------------------------------------------------

/** Connection settings for a local Ollama server. */
export interface OllamaOptions {
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
}

const embeddingResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

function resolveOptions(options: OllamaOptions): Required<OllamaOptions> {
  return {
    baseUrl: (options.baseUrl ?? OLLAMA_URL).replace(/\/+$/, ""),
    model: options.model ?? EMBEDDING_MODEL,
    timeoutMs: options.timeoutMs ?? EMBEDDING_TIMEOUT_MS,
  };
}

function isAbort(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "name" in err &&
    (err.name === "TimeoutError" || err.name === "AbortError")
  );
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Fetch with a timeout, mapping transport failures onto the provider
 * error taxonomy.
 */
async function ollamaFetch(
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  try {
    return await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    if (isAbort(err)) throw new ProviderTimeoutError(timeoutMs);
    throw new ProviderUnavailableError(`cannot reach ${url} (${errorMessage(err)})`);
  }
}

/** Read a JSON body; the timeout signal also covers the body download. */
async function readJson(response: Response, timeoutMs: number): Promise<unknown> {
  try {
    return await response.json();
  } catch (err) {
    if (isAbort(err)) throw new ProviderTimeoutError(timeoutMs);
    throw new ProviderUnavailableError(`malformed response body (${errorMessage(err)})`);
  }
}

/**
 * Read the body of a failed response for the error message. An unreadable
 * body yields "", except that a timeout still surfaces as one.
 */
async function readErrorBody(response: Response, timeoutMs: number): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    if (isAbort(err)) throw new ProviderTimeoutError(timeoutMs);
    return "";
  }
}

/**
 * Create an EmbeddingProvider backed by a local Ollama server.
 *
 * Uses `fetch` directly against `/api/embeddings`; the response body is
 * validated before it is trusted.
 */
export function createOllamaProvider(options: OllamaOptions = {}): EmbeddingProvider {
  const { baseUrl, model, timeoutMs } = resolveOptions(options);

  return {
    model,

    async embed(text: string): Promise<EmbeddingVector> {
      if (!text.trim()) {
        throw new InvalidArgumentError("Cannot embed empty text");
      }

      console.log(
        JSON.stringify({ event: "embedding_request", model, chars: text.length }),
      );

      const response = await ollamaFetch(
        `${baseUrl}/api/embeddings`,
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ model, prompt: text }),
        },
        timeoutMs,
      );

      if (!response.ok) {
        const body = await readErrorBody(response, timeoutMs);
        throw new ProviderUnavailableError(
          `Ollama embedding request failed (${response.status})${body ? `: ${body}` : ""}`,
        );
      }

      const parsed = embeddingResponseSchema.safeParse(
        await readJson(response, timeoutMs),
      );

      if (!parsed.success) {
        throw new ProviderUnavailableError(
          "unexpected Ollama response: missing embedding data",
        );
      }

      return parsed.data.embedding;
    },
  };
}

/**
 * Probe the Ollama server: is it up, is the model pulled, and what
 * dimensionality does it produce?
 */
export async function checkModel(options: OllamaOptions = {}): Promise<ModelStatus> {
  const resolved = resolveOptions(options);
  const { baseUrl, model, timeoutMs } = resolved;

  try {
    const response = await ollamaFetch(`${baseUrl}/api/tags`, { method: "GET" }, timeoutMs);
    if (!response.ok) {
      throw new ProviderUnavailableError(`Ollama tags request failed (${response.status})`);
    }

    const tags = tagsResponseSchema.safeParse(await readJson(response, timeoutMs));
    if (!tags.success) {
      throw new ProviderUnavailableError("unexpected Ollama response: missing model list");
    }

    const installed = tags.data.models.some(
      (m) => m.name === model || m.name.startsWith(`${model}:`),
    );
    if (!installed) {
      return { status: "not_installed", model, installCommand: `ollama pull ${model}` };
    }

    const probe = await createOllamaProvider(resolved).embed("test");
    return { status: "ok", model, dimensions: probe.length };
  } catch (err) {
    if (err instanceof LabError) {
      return { status: "unavailable", model, error: err.message };
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Caching
// ---------------------------------------------------------------------------

/** An EmbeddingProvider that memoizes vectors by exact input text. */
export interface CachedEmbeddingProvider extends EmbeddingProvider {
  /** Drop every cached vector; requests already in flight are not cached. */
  clear(): void;
  /** Number of cached vectors. */
  readonly size: number;
}

/**
 * Wrap a provider so each distinct text reaches it once.
 *
 * The key is the raw text: "Python" and "python" are different entries.
 * Concurrent misses for the same text share one upstream request.
 * Failures are not cached, so a later call retries.
 */
export function createCachedProvider(inner: EmbeddingProvider): CachedEmbeddingProvider {
  const cache = new Map<string, EmbeddingVector>();
  const pending = new Map<string, Promise<EmbeddingVector>>();
  let generation = 0;

  return {
    model: inner.model,

    get size(): number {
      return cache.size;
    },

    clear(): void {
      cache.clear();
      pending.clear();
      generation++;
    },

    embed(text: string): Promise<EmbeddingVector> {
      const hit = cache.get(text);
      if (hit) return Promise.resolve(hit);

      const inFlight = pending.get(text);
      if (inFlight) return inFlight;

      const startedIn = generation;
      const request = inner
        .embed(text)
        .then((vector) => {
          if (startedIn === generation) cache.set(text, vector);
          return vector;
        })
        .finally(() => {
          if (pending.get(text) === request) pending.delete(text);
        });

      pending.set(text, request);
      return request;
    },
  };
}

// ---------------------------------------------------------------------------
// Convenience helpers
// ---------------------------------------------------------------------------

/**
 * Build a Concept from a feed entry by embedding its name with the
 * supplied provider.
 */
export async function embedConcept(
  entry: ConceptFeedEntry,
  provider: EmbeddingProvider,
): Promise<Concept> {
  const embedding = await provider.embed(entry.name);
  return {
    name: entry.name,
    type: entry.type,
    embedding,
    sourceVideos: new Set(entry.sourceVideoIds),
    importance: entry.importance ?? DEFAULT_IMPORTANCE,
    ...(entry.parent ? { parent: entry.parent } : {}),
  };
}
