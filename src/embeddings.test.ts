import { describe, expect, it, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import {
  checkModel,
  createCachedProvider,
  createOllamaProvider,
  embedConcept,
  type EmbeddingProvider,
} from "./embeddings";
import {
  InvalidArgumentError,
  ProviderTimeoutError,
  ProviderUnavailableError,
} from "./errors";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** A fake embedding vector for testing. */
const FAKE_VECTOR = [0.1, 0.2, 0.3, 0.4, 0.5];

/** Build a JSON response the way Ollama answers. */
function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** An error shaped like the one fetch rejects with when AbortSignal.timeout fires. */
function timeoutError(): Error {
  const err = new Error("The operation was aborted due to timeout");
  err.name = "TimeoutError";
  return err;
}

/** A provider that counts upstream calls and answers from a lookup table. */
function countingProvider(vectors: Record<string, number[]> = {}) {
  const calls: string[] = [];
  const provider: EmbeddingProvider = {
    model: "stub-model",
    async embed(text: string) {
      calls.push(text);
      return vectors[text] ?? FAKE_VECTOR;
    },
  };
  return { provider, calls };
}

/** A promise with its resolve function exposed. */
function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// ---------------------------------------------------------------------------
// createOllamaProvider
// ---------------------------------------------------------------------------

describe("createOllamaProvider", () => {
  let fetchSpy: MockInstance<typeof fetch>;

  beforeEach(() => {
    fetchSpy = vi.spyOn(globalThis, "fetch");
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns an EmbeddingProvider with the specified model", () => {
    const provider = createOllamaProvider({ model: "nomic-embed-text" });
    expect(provider.model).toBe("nomic-embed-text");
  });

  it("calls the Ollama embeddings endpoint and returns the vector", async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ embedding: FAKE_VECTOR }));

    const provider = createOllamaProvider({
      baseUrl: "http://ollama.test:11434/",
      model: "nomic-embed-text",
    });
    const result = await provider.embed("Python");

    expect(result).toEqual(FAKE_VECTOR);
    expect(fetchSpy).toHaveBeenCalledOnce();

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe("http://ollama.test:11434/api/embeddings");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json" });
    expect(init?.signal).toBeInstanceOf(AbortSignal);

    const body = JSON.parse(String(init?.body));
    expect(body).toEqual({ model: "nomic-embed-text", prompt: "Python" });
  });

  it("rejects empty text without a request", async () => {
    const provider = createOllamaProvider();
    await expect(provider.embed("   ")).rejects.toThrow(InvalidArgumentError);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it("maps a non-OK HTTP response to ProviderUnavailableError", async () => {
    fetchSpy.mockResolvedValueOnce(
      new Response('{"error":"model not found"}', { status: 404 }),
    );

    const provider = createOllamaProvider({ baseUrl: "http://ollama.test" });
    await expect(provider.embed("Flask")).rejects.toThrow(
      'Embedding provider unavailable: Ollama embedding request failed (404): {"error":"model not found"}',
    );
  });

  it("maps a non-OK response with an unreadable body to ProviderUnavailableError", async () => {
    const body = new ReadableStream({
      start(controller) {
        controller.error(new TypeError("terminated"));
      },
    });
    fetchSpy.mockResolvedValueOnce(new Response(body, { status: 500 }));

    const provider = createOllamaProvider({ baseUrl: "http://ollama.test" });
    const err = await provider.embed("Flask").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderUnavailableError);
    expect(err).toMatchObject({
      message: "Embedding provider unavailable: Ollama embedding request failed (500)",
    });
  });

  it("maps a timeout while reading an error body to ProviderTimeoutError", async () => {
    const body = new ReadableStream({
      start(controller) {
        controller.error(timeoutError());
      },
    });
    fetchSpy.mockResolvedValueOnce(new Response(body, { status: 500 }));

    const provider = createOllamaProvider({ baseUrl: "http://ollama.test", timeoutMs: 250 });
    await expect(provider.embed("Flask")).rejects.toThrow(ProviderTimeoutError);
  });

  it("maps a malformed body to ProviderUnavailableError", async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ embedding: [] }));

    const provider = createOllamaProvider({ baseUrl: "http://ollama.test" });
    await expect(provider.embed("Flask")).rejects.toThrow(
      "Embedding provider unavailable: unexpected Ollama response: missing embedding data",
    );
  });

  it("maps a body that is not JSON to ProviderUnavailableError", async () => {
    fetchSpy.mockResolvedValueOnce(new Response("<html>", { status: 200 }));

    const provider = createOllamaProvider({ baseUrl: "http://ollama.test" });
    await expect(provider.embed("Flask")).rejects.toThrow(ProviderUnavailableError);
  });

  it("maps a refused connection to ProviderUnavailableError", async () => {
    fetchSpy.mockRejectedValueOnce(new TypeError("fetch failed"));

    const provider = createOllamaProvider({ baseUrl: "http://ollama.test" });
    const err = await provider.embed("Flask").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderUnavailableError);
    expect(err).toMatchObject({
      code: "PROVIDER_UNAVAILABLE",
      status: 503,
      retryable: true,
      message:
        "Embedding provider unavailable: cannot reach http://ollama.test/api/embeddings (fetch failed)",
    });
  });

  it("maps a timeout to ProviderTimeoutError", async () => {
    fetchSpy.mockRejectedValueOnce(timeoutError());

    const provider = createOllamaProvider({ baseUrl: "http://ollama.test", timeoutMs: 250 });
    const err = await provider.embed("Flask").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderTimeoutError);
    expect(err).toMatchObject({
      code: "PROVIDER_TIMEOUT",
      message: "Embedding request timed out after 250ms",
    });
  });
});

// ---------------------------------------------------------------------------
// checkModel
// ---------------------------------------------------------------------------

describe("checkModel", () => {
  let fetchSpy: MockInstance<typeof fetch>;

  beforeEach(() => {
    fetchSpy = vi.spyOn(globalThis, "fetch");
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports the dimensionality of an installed model", async () => {
    fetchSpy
      .mockResolvedValueOnce(
        jsonResponse({ models: [{ name: "llama3:8b" }, { name: "nomic-embed-text:latest" }] }),
      )
      .mockResolvedValueOnce(jsonResponse({ embedding: [0.1, 0.2, 0.3] }));

    const status = await checkModel({ baseUrl: "http://ollama.test", model: "nomic-embed-text" });

    expect(status).toEqual({ status: "ok", model: "nomic-embed-text", dimensions: 3 });
    expect(fetchSpy.mock.calls[0][0]).toBe("http://ollama.test/api/tags");
    expect(fetchSpy.mock.calls[1][0]).toBe("http://ollama.test/api/embeddings");
  });

  it("tells how to install a missing model", async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ models: [{ name: "llama3:8b" }] }));

    const status = await checkModel({ baseUrl: "http://ollama.test", model: "nomic-embed-text" });

    expect(status).toEqual({
      status: "not_installed",
      model: "nomic-embed-text",
      installCommand: "ollama pull nomic-embed-text",
    });
    expect(fetchSpy).toHaveBeenCalledOnce();
  });

  it("reports an unreachable server without throwing", async () => {
    fetchSpy.mockRejectedValueOnce(new TypeError("fetch failed"));

    const status = await checkModel({ baseUrl: "http://ollama.test", model: "nomic-embed-text" });

    expect(status).toEqual({
      status: "unavailable",
      model: "nomic-embed-text",
      error: "Embedding provider unavailable: cannot reach http://ollama.test/api/tags (fetch failed)",
    });
  });
});

// ---------------------------------------------------------------------------
// createCachedProvider
// ---------------------------------------------------------------------------

describe("createCachedProvider", () => {
  it("issues at most one upstream call for repeated text", async () => {
    const { provider, calls } = countingProvider();
    const cached = createCachedProvider(provider);

    const first = await cached.embed("Python");
    const second = await cached.embed("Python");

    expect(calls).toEqual(["Python"]);
    expect(second).toBe(first);
    expect(cached.size).toBe(1);
  });

  it("keys on the raw text without normalizing it", async () => {
    const { provider, calls } = countingProvider();
    const cached = createCachedProvider(provider);

    await cached.embed("Python");
    await cached.embed("python");
    await cached.embed("Python ");

    expect(calls).toEqual(["Python", "python", "Python "]);
  });

  it("shares one request between concurrent misses", async () => {
    const gate = deferred<number[]>();
    const embed = vi.fn<(text: string) => Promise<number[]>>(() => gate.promise);
    const cached = createCachedProvider({ model: "slow", embed });

    const a = cached.embed("Docker");
    const b = cached.embed("Docker");
    gate.resolve([1, 2]);

    expect(await a).toEqual([1, 2]);
    expect(await b).toEqual([1, 2]);
    expect(embed).toHaveBeenCalledOnce();
  });

  it("does not cache failures", async () => {
    const embed = vi
      .fn<(text: string) => Promise<number[]>>()
      .mockRejectedValueOnce(new ProviderTimeoutError(100))
      .mockResolvedValueOnce([3, 4]);
    const cached = createCachedProvider({ model: "flaky", embed });

    await expect(cached.embed("Kubernetes")).rejects.toThrow(ProviderTimeoutError);
    expect(await cached.embed("Kubernetes")).toEqual([3, 4]);
    expect(embed).toHaveBeenCalledTimes(2);
  });

  it("clear() forces a new upstream call", async () => {
    const { provider, calls } = countingProvider();
    const cached = createCachedProvider(provider);

    await cached.embed("Flask");
    cached.clear();
    expect(cached.size).toBe(0);
    await cached.embed("Flask");

    expect(calls).toEqual(["Flask", "Flask"]);
  });

  it("does not cache a request that was in flight during clear()", async () => {
    const gate = deferred<number[]>();
    const cached = createCachedProvider({ model: "slow", embed: () => gate.promise });

    const pending = cached.embed("FastAPI");
    cached.clear();
    gate.resolve([5, 6]);

    expect(await pending).toEqual([5, 6]);
    expect(cached.size).toBe(0);
  });

  it("exposes the wrapped provider's model", () => {
    const { provider } = countingProvider();
    expect(createCachedProvider(provider).model).toBe("stub-model");
  });
});

// ---------------------------------------------------------------------------
// embedConcept
// ---------------------------------------------------------------------------

describe("embedConcept", () => {
  it("embeds the concept name and fills defaults", async () => {
    const { provider, calls } = countingProvider({ Flask: [1, 0] });

    const concept = await embedConcept(
      { name: "Flask", type: "library", sourceVideoIds: ["vid-a", "vid-b", "vid-a"] },
      provider,
    );

    expect(calls).toEqual(["Flask"]);
    expect(concept.embedding).toEqual([1, 0]);
    expect(concept.type).toBe("library");
    expect([...concept.sourceVideos]).toEqual(["vid-a", "vid-b"]);
    expect(concept.importance).toBe(0.5);
    expect(concept).not.toHaveProperty("parent");
  });

  it("keeps importance and parent from the feed", async () => {
    const { provider } = countingProvider();

    const concept = await embedConcept(
      { name: "FastAPI", type: "library", sourceVideoIds: [], importance: 0.9, parent: "Python" },
      provider,
    );

    expect(concept.importance).toBe(0.9);
    expect(concept.parent).toBe("Python");
  });

  it("propagates provider errors", async () => {
    const provider: EmbeddingProvider = {
      model: "fail-model",
      async embed() {
        throw new ProviderUnavailableError("down");
      },
    };

    await expect(
      embedConcept({ name: "Git", type: "tool", sourceVideoIds: [] }, provider),
    ).rejects.toThrow("Embedding provider unavailable: down");
  });
});
