import { describe, test, expect, vi, afterEach } from "vitest";
import { LocalEmbeddingProvider } from "../src/embedding/local";
import { OpenAIEmbeddingProvider } from "../src/embedding/openai";
import { VoyageEmbeddingProvider } from "../src/embedding/voyage";
import { CohereEmbeddingProvider } from "../src/embedding/cohere";
import { createEmbeddingProvider } from "../src/embedding";

function dot(a: number[], b: number[]): number {
  return a.reduce((sum, v, i) => sum + v * (b[i] ?? 0), 0);
}

describe("LocalEmbeddingProvider", () => {
  const provider = new LocalEmbeddingProvider();

  test("should have correct properties", () => {
    expect(provider.name).toBe("local");
    expect(provider.dimensions).toBe(384);
  });

  test("should embed single text", async () => {
    const vector = await provider.embedSingle("Hello world");

    expect(vector).toHaveLength(384);
    expect(typeof vector[0]).toBe("number");
  });

  test("should embed multiple texts", async () => {
    const vectors = await provider.embed(["Hello", "World", "Test"]);

    expect(vectors).toHaveLength(3);
    vectors.forEach(v => {
      expect(v).toHaveLength(384);
    });
  });

  test("should produce normalized vectors", async () => {
    const vector = await provider.embedSingle("Test normalization");

    const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    expect(magnitude).toBeCloseTo(1, 5);
  });

  test("should return a zero vector when no token is long enough", async () => {
    const vector = await provider.embedSingle("a b ?");
    expect(vector.every(v => v === 0)).toBe(true);
  });

  test("should be deterministic", async () => {
    const [first] = await provider.embed(["release schedule for the runtime"]);
    const second = await provider.embedSingle("release schedule for the runtime");
    expect(first).toEqual(second);
  });

  test("should produce different vectors for different texts", async () => {
    const vec1 = await provider.embedSingle("Hello world");
    const vec2 = await provider.embedSingle("Goodbye universe");

    expect(dot(vec1, vec2)).not.toBeCloseTo(1, 2);
  });

  test("should produce similar vectors for similar texts", async () => {
    const vec1 = await provider.embedSingle("The quick brown fox");
    const vec2 = await provider.embedSingle("The fast brown fox");

    expect(dot(vec1, vec2)).toBeGreaterThan(0.5);
  });
});

describe("remote embedding providers", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test("openai sends the batch and orders vectors by index", async () => {
    const mockFetch = vi.fn<typeof fetch>().mockResolvedValue(
      Response.json({
        data: [
          { embedding: [0, 1], index: 1 },
          { embedding: [1, 0], index: 0 },
        ],
      })
    );
    vi.stubGlobal("fetch", mockFetch);

    const provider = new OpenAIEmbeddingProvider({ provider: "openai", apiKey: "test-key" });
    const vectors = await provider.embed(["first", "second"]);

    expect(vectors).toEqual([[1, 0], [0, 1]]);
    const call = mockFetch.mock.calls[0];
    expect(call?.[0]).toBe("https://api.openai.com/v1/embeddings");
    expect(JSON.parse(String(call?.[1]?.body))).toEqual({
      input: ["first", "second"],
      model: "text-embedding-3-small",
    });
  });

  test("voyage marks queries and documents with different input types", async () => {
    const mockFetch = vi.fn<typeof fetch>().mockImplementation(() =>
      Promise.resolve(Response.json({ data: [{ embedding: [0.5, 0.5] }] }))
    );
    vi.stubGlobal("fetch", mockFetch);

    const provider = new VoyageEmbeddingProvider({ provider: "voyage", apiKey: "test-key" });
    await provider.embed(["a document"]);
    await provider.embedSingle("a query");

    const bodies = mockFetch.mock.calls.map(([, init]) => JSON.parse(String(init?.body)));
    expect(bodies[0].input_type).toBe("document");
    expect(bodies[1].input_type).toBe("query");
  });

  test("cohere splits input into batches", async () => {
    const mockFetch = vi.fn<typeof fetch>().mockImplementation(() =>
      Promise.resolve(Response.json({ embeddings: [[1], [2]] }))
    );
    vi.stubGlobal("fetch", mockFetch);

    const provider = new CohereEmbeddingProvider({ provider: "cohere", apiKey: "test-key", batchSize: 2 });
    const vectors = await provider.embed(["a", "b", "c", "d"]);

    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(vectors).toEqual([[1], [2], [1], [2]]);
  });

  test("error statuses surface as errors", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockResolvedValue(new Response("nope", { status: 401 })));

    const provider = new OpenAIEmbeddingProvider({ provider: "openai", apiKey: "test-key" });
    await expect(provider.embedSingle("query")).rejects.toThrow("OpenAI embeddings returned HTTP 401: nope");
  });

  test("providers require an api key", () => {
    expect(() => new OpenAIEmbeddingProvider({ provider: "openai" })).toThrow(
      "OpenAI embedding needs an API key (embedding.apiKey or SITESEEK_EMBEDDING_API_KEY)"
    );
    expect(() => new VoyageEmbeddingProvider({ provider: "voyage" })).toThrow("Voyage embedding needs an API key");
    expect(() => new CohereEmbeddingProvider({ provider: "cohere" })).toThrow("Cohere embedding needs an API key");
  });

  test("a reply with fewer vectors than texts is an error", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockResolvedValue(Response.json({ embeddings: [[1]] })));

    const provider = new CohereEmbeddingProvider({ provider: "cohere", apiKey: "test-key" });
    await expect(provider.embed(["a", "b"])).rejects.toThrow("cohere embedded 1 of 2 texts");
  });

  test("cohere tags documents and queries with search input types", async () => {
    const mockFetch = vi.fn<typeof fetch>().mockImplementation(() =>
      Promise.resolve(Response.json({ embeddings: [[0.1]] }))
    );
    vi.stubGlobal("fetch", mockFetch);

    const provider = new CohereEmbeddingProvider({ provider: "cohere", apiKey: "test-key" });
    await provider.embed(["a document"]);
    await provider.embedSingle("a query");

    const inputTypes = mockFetch.mock.calls.map(([, init]) => JSON.parse(String(init?.body)).input_type);
    expect(inputTypes).toEqual(["search_document", "search_query"]);
  });
});

describe("createEmbeddingProvider", () => {
  test("defaults to the local provider", async () => {
    const provider = await createEmbeddingProvider();
    expect(provider.name).toBe("local");
  });

  test("rejects unknown providers", async () => {
    await expect(createEmbeddingProvider({ provider: "unknown" })).rejects.toThrow(
      'Unknown embedding provider "unknown"; expected one of local, openai, voyage, cohere'
    );
  });
});
