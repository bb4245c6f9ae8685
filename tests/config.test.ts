import { test, expect, describe, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm, stat, writeFile } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import {
  ConfigValidationError,
  DEFAULT_CONFIG,
  applyEnvOverrides,
  getConfigSync,
  getDataPaths,
  loadConfig,
  resetConfigCache,
  saveConfig,
  validateConfig,
} from "../src/config";

function validationError(config: unknown): ConfigValidationError {
  try {
    validateConfig(config);
  } catch (err) {
    if (err instanceof ConfigValidationError) return err;
    throw err;
  }
  throw new Error("expected validation to fail");
}

describe("config validation", () => {
  test("rejects invalid embedding provider", () => {
    const err = validationError({ embedding: { provider: "invalid-provider" } });

    expect(err.invalidFields).toEqual(["embedding.provider"]);
    expect(err.details).toEqual([
      "embedding.provider: Invalid embedding provider. Must be one of: local, openai, voyage, cohere",
    ]);
  });

  test("rejects search.weight outside 0-1 range", () => {
    expect(validationError({ search: { weight: 1.5 } }).details).toEqual([
      "search.weight: search.weight must be between 0 and 1",
    ]);
    expect(validationError({ search: { weight: -0.1 } }).details).toEqual([
      "search.weight: search.weight must be between 0 and 1",
    ]);
  });

  test("rejects crawler limits outside their range", () => {
    expect(validationError({ crawler: { maxPages: 0 } }).details).toEqual([
      "crawler.maxPages: crawler.maxPages must be at least 1",
    ]);
    expect(validationError({ crawler: { maxDepth: -1 } }).details).toEqual([
      "crawler.maxDepth: crawler.maxDepth cannot be negative",
    ]);
  });

  test("rejects worker.port outside valid range", () => {
    expect(validationError({ worker: { port: 70000 } }).invalidFields).toEqual(["worker.port"]);
  });

  test("rejects unknown top-level fields", () => {
    expect(validationError({ unknownField: "value" }).invalidFields).toEqual(["(root)"]);
  });

  test("reports every invalid field in the message", () => {
    const err = validationError({ search: { topK: 0 }, rerank: { provider: "nope" } });

    expect(err.invalidFields).toEqual(["search.topK", "rerank.provider"]);
    expect(err.message).toContain("Invalid config in (inline):");
    expect(err.message).toContain("Invalid fields: search.topK, rerank.provider");
  });

  test("accepts valid partial config", () => {
    const config = validateConfig({
      dataDir: "/custom/path",
      embedding: { provider: "openai", model: "text-embedding-3-small" },
      search: { topK: 10, weight: 0.5 },
    });

    expect(config.embedding).toEqual({ provider: "openai", model: "text-embedding-3-small" });
    expect(config.search).toEqual({ topK: 10, weight: 0.5 });
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "siteseek-config-"));
    resetConfigCache();
    for (const name of [
      "SITESEEK_DATA_DIR",
      "SITESEEK_PORT",
      "SITESEEK_EMBEDDING_PROVIDER",
      "SITESEEK_EMBEDDING_API_KEY",
      "SITESEEK_RERANK_PROVIDER",
      "SITESEEK_RERANK_API_KEY",
    ]) {
      vi.stubEnv(name, "");
    }
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    resetConfigCache();
    await rm(dir, { recursive: true, force: true });
  });

  test("uses defaults when no config file exists and creates the data directories", async () => {
    const config = await loadConfig(dir);

    expect(config).toEqual({ ...DEFAULT_CONFIG, dataDir: dir });
    for (const path of getDataPaths(dir)) {
      expect((await stat(path)).isDirectory()).toBe(true);
    }
  });

  test("merges the user config over the defaults", async () => {
    await writeFile(join(dir, "config.json"), JSON.stringify({
      search: { topK: 3 },
      worker: { port: 9001 },
    }));

    const config = await loadConfig(dir);

    expect(config.search).toEqual({ ...DEFAULT_CONFIG.search, topK: 3 });
    expect(config.worker).toEqual({ port: 9001, host: "127.0.0.1" });
    expect(config.crawler).toEqual(DEFAULT_CONFIG.crawler);
  });

  test("rejects malformed JSON", async () => {
    await writeFile(join(dir, "config.json"), "{ not json");

    const attempt = loadConfig(dir);

    await expect(attempt).rejects.toBeInstanceOf(ConfigValidationError);
    await expect(attempt).rejects.toMatchObject({ invalidFields: ["(json)"] });
  });

  test("rejects config that fails validation", async () => {
    await writeFile(join(dir, "config.json"), JSON.stringify({ search: { weight: 2 } }));

    await expect(loadConfig(dir)).rejects.toMatchObject({ invalidFields: ["search.weight"] });
  });

  test("caches the loaded config until reset", async () => {
    const first = await loadConfig(dir);
    const second = await loadConfig(join(dir, "elsewhere"));

    expect(second).toBe(first);
    expect(getConfigSync()).toBe(first);
  });

  test("applies environment overrides", async () => {
    vi.stubEnv("SITESEEK_PORT", "9100");
    vi.stubEnv("SITESEEK_EMBEDDING_API_KEY", "test-key");

    const config = await loadConfig(dir);

    expect(config.worker.port).toBe(9100);
    expect(config.embedding.apiKey).toBe("test-key");
  });

  test("saveConfig writes config.json and refreshes the cache", async () => {
    const config = { ...DEFAULT_CONFIG, dataDir: dir, search: { ...DEFAULT_CONFIG.search, topK: 7 } };

    await saveConfig(config);

    expect(JSON.parse(await readFile(join(dir, "config.json"), "utf-8"))).toEqual(config);
    expect(getConfigSync()).toBe(config);
  });
});

describe("applyEnvOverrides", () => {
  test("ignores a port that is not a positive integer", () => {
    const config = applyEnvOverrides(DEFAULT_CONFIG, { SITESEEK_PORT: "abc" });

    expect(config.worker.port).toBe(DEFAULT_CONFIG.worker.port);
  });

  test("overrides providers and keys", () => {
    const config = applyEnvOverrides(DEFAULT_CONFIG, {
      SITESEEK_RERANK_PROVIDER: "cohere",
      SITESEEK_RERANK_API_KEY: "test-key",
      SITESEEK_DATA_DIR: "/srv/siteseek",
    });

    expect(config.rerank).toEqual({ provider: "cohere", apiKey: "test-key" });
    expect(config.dataDir).toBe("/srv/siteseek");
    expect(config.embedding).toEqual(DEFAULT_CONFIG.embedding);
  });
});

describe("getDataPaths", () => {
  test("lists the data directory layout", () => {
    expect(getDataPaths("/data")).toEqual([
      "/data",
      join("/data", "crawls"),
      join("/data", "logs"),
      join("/data", "index"),
    ]);
  });
});
