// Config loading from <dataDir>/config.json with environment overrides

import { homedir } from "os";
import { join } from "path";
import { mkdir, readFile, writeFile } from "fs/promises";
import { z } from "zod/v4";
import type {
  SiteseekConfig,
  CrawlerConfig,
  SearchConfig,
  EmbeddingConfig,
  RerankConfig,
  WorkerConfig,
} from "../types";

const DEFAULT_DATA_DIR = process.env.SITESEEK_DATA_DIR || join(homedir(), ".siteseek");

const EMBEDDING_PROVIDERS = ["local", "openai", "voyage", "cohere"] as const;
const RERANK_PROVIDERS = ["local", "cohere", "voyage"] as const;

const CrawlerConfigSchema = z.object({
  maxPages: z.number().int().min(1, "crawler.maxPages must be at least 1").max(10000, "crawler.maxPages must be at most 10000"),
  maxDepth: z.number().int().min(0, "crawler.maxDepth cannot be negative").max(20, "crawler.maxDepth must be at most 20"),
  concurrency: z.number().int().min(1, "crawler.concurrency must be at least 1").max(50, "crawler.concurrency must be at most 50"),
  timeout: z.number().int().min(100, "crawler.timeout must be at least 100ms").max(120000, "crawler.timeout must be at most 120000ms"),
  politeDelay: z.number().int().min(0, "crawler.politeDelay cannot be negative").max(60000, "crawler.politeDelay must be at most 60000ms"),
  cacheRobots: z.boolean(),
  fallbackBaseUrl: z.url({ message: "crawler.fallbackBaseUrl must be a valid URL" }),
  acceptLanguage: z.string().min(1, "crawler.acceptLanguage cannot be empty"),
});

const SearchConfigSchema = z.object({
  topK: z.number().int().min(1, "search.topK must be at least 1").max(100, "search.topK must be at most 100"),
  weight: z.number().min(0, "search.weight must be between 0 and 1").max(1, "search.weight must be between 0 and 1"),
  minScore: z.number().min(-1, "search.minScore must be at least -1").max(1, "search.minScore must be at most 1"),
  overFetch: z.number().int().min(1, "search.overFetch must be at least 1").max(20, "search.overFetch must be at most 20"),
  fallbackSeedUrl: z.url({ message: "search.fallbackSeedUrl must be a valid URL" }),
  fallbackMaxPages: z.number().int().min(1, "search.fallbackMaxPages must be at least 1").max(50, "search.fallbackMaxPages must be at most 50"),
});

const EmbeddingConfigSchema = z.object({
  provider: z.enum(EMBEDDING_PROVIDERS, {
    error: `Invalid embedding provider. Must be one of: ${EMBEDDING_PROVIDERS.join(", ")}`,
  }),
  model: z.string().optional(),
  apiKey: z.string().optional(),
  apiBase: z.url({ message: "embedding.apiBase must be a valid URL" }).optional(),
  batchSize: z.number().int().min(1, "embedding.batchSize must be at least 1").max(1000, "embedding.batchSize must be at most 1000").optional(),
});

const RerankConfigSchema = z.object({
  provider: z.enum(RERANK_PROVIDERS, {
    error: `Invalid rerank provider. Must be one of: ${RERANK_PROVIDERS.join(", ")}`,
  }),
  model: z.string().optional(),
  apiKey: z.string().optional(),
  apiBase: z.url({ message: "rerank.apiBase must be a valid URL" }).optional(),
});

const WorkerConfigSchema = z.object({
  port: z.number().int().min(1, "worker.port must be at least 1").max(65535, "worker.port must be at most 65535"),
  host: z.string().min(1, "worker.host cannot be empty"),
});

const UserConfigSchema = z.object({
  dataDir: z.string().optional(),
  crawler: CrawlerConfigSchema.partial().optional(),
  search: SearchConfigSchema.partial().optional(),
  embedding: EmbeddingConfigSchema.partial().optional(),
  rerank: RerankConfigSchema.partial().optional(),
  worker: WorkerConfigSchema.partial().optional(),
}).strict();

type ValidatedUserConfig = z.infer<typeof UserConfigSchema>;

class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly invalidFields: string[],
    public readonly details: string[]
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

function formatZodError(error: z.ZodError): { invalidFields: string[]; details: string[] } {
  const invalidFields: string[] = [];
  const details: string[] = [];

  for (const issue of error.issues) {
    const path = issue.path.map(String).join(".");
    invalidFields.push(path || "(root)");
    details.push(path ? `${path}: ${issue.message}` : issue.message);
  }

  return { invalidFields, details };
}

function validateUserConfig(userConfig: unknown, configPath: string): ValidatedUserConfig {
  const result = UserConfigSchema.safeParse(userConfig);

  if (!result.success) {
    const { invalidFields, details } = formatZodError(result.error);
    const message = [
      `Invalid config in ${configPath}:`,
      "",
      "Validation errors:",
      ...details.map((d) => `  - ${d}`),
      "",
      `Invalid fields: ${invalidFields.join(", ")}`,
    ].join("\n");

    throw new ConfigValidationError(message, invalidFields, details);
  }

  return result.data;
}

const DEFAULT_CRAWLER_CONFIG: CrawlerConfig = {
  maxPages: 50,
  maxDepth: 2,
  concurrency: 5,
  timeout: 10000,
  politeDelay: 200,
  cacheRobots: true,
  fallbackBaseUrl: "https://en.wikipedia.org/wiki/",
  acceptLanguage: "en-US,en;q=0.9",
};

const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  topK: 5,
  weight: 0.7,
  minScore: 0.15,
  overFetch: 3,
  fallbackSeedUrl: "https://en.wikipedia.org/wiki/Main_Page",
  fallbackMaxPages: 2,
};

const DEFAULT_EMBEDDING_CONFIG: EmbeddingConfig = {
  provider: "local",
  batchSize: 32,
};

const DEFAULT_RERANK_CONFIG: RerankConfig = {
  provider: "local",
};

const DEFAULT_WORKER_CONFIG: WorkerConfig = {
  port: 8000,
  host: "127.0.0.1",
};

const DEFAULT_CONFIG: SiteseekConfig = {
  dataDir: DEFAULT_DATA_DIR,
  crawler: DEFAULT_CRAWLER_CONFIG,
  search: DEFAULT_SEARCH_CONFIG,
  embedding: DEFAULT_EMBEDDING_CONFIG,
  rerank: DEFAULT_RERANK_CONFIG,
  worker: DEFAULT_WORKER_CONFIG,
};

let cachedConfig: SiteseekConfig | null = null;

export async function loadConfig(dataDir = DEFAULT_DATA_DIR): Promise<SiteseekConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath = join(dataDir, "config.json");
  let merged: SiteseekConfig;

  try {
    const raw = await readFile(configPath, "utf-8");
    const userConfig = validateUserConfig(JSON.parse(raw), configPath);
    merged = mergeConfig({ ...DEFAULT_CONFIG, dataDir }, userConfig);
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      throw err;
    }
    if (err instanceof SyntaxError) {
      throw new ConfigValidationError(
        `Invalid JSON in ${configPath}: ${err.message}`,
        ["(json)"],
        [err.message]
      );
    }
    if (!isMissingFile(err)) {
      console.warn(`[config] Failed to load ${configPath}, using defaults`);
    }
    merged = { ...DEFAULT_CONFIG, dataDir };
  }

  cachedConfig = applyEnvOverrides(merged, process.env);
  await ensureDataDir(cachedConfig.dataDir);

  return cachedConfig;
}

export function getConfigSync(): SiteseekConfig {
  return cachedConfig ?? { ...DEFAULT_CONFIG };
}

export function mergeConfig(defaults: SiteseekConfig, user: ValidatedUserConfig): SiteseekConfig {
  return {
    dataDir: user.dataDir ?? defaults.dataDir,
    crawler: { ...defaults.crawler, ...user.crawler },
    search: { ...defaults.search, ...user.search },
    embedding: { ...defaults.embedding, ...user.embedding },
    rerank: { ...defaults.rerank, ...user.rerank },
    worker: { ...defaults.worker, ...user.worker },
  };
}

export function applyEnvOverrides(config: SiteseekConfig, env: NodeJS.ProcessEnv): SiteseekConfig {
  const port = env.SITESEEK_PORT ? Number.parseInt(env.SITESEEK_PORT, 10) : NaN;

  return {
    ...config,
    dataDir: env.SITESEEK_DATA_DIR || config.dataDir,
    embedding: {
      ...config.embedding,
      provider: env.SITESEEK_EMBEDDING_PROVIDER || config.embedding.provider,
      apiKey: env.SITESEEK_EMBEDDING_API_KEY || config.embedding.apiKey,
    },
    rerank: {
      ...config.rerank,
      provider: env.SITESEEK_RERANK_PROVIDER || config.rerank.provider,
      apiKey: env.SITESEEK_RERANK_API_KEY || config.rerank.apiKey,
    },
    worker: {
      ...config.worker,
      port: Number.isInteger(port) && port > 0 ? port : config.worker.port,
    },
  };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function ensureDataDir(dataDir: string): Promise<void> {
  for (const dir of getDataPaths(dataDir)) {
    await mkdir(dir, { recursive: true });
  }
}

export function getDataPaths(dataDir: string): [root: string, crawls: string, logs: string, index: string] {
  return [dataDir, join(dataDir, "crawls"), join(dataDir, "logs"), join(dataDir, "index")];
}

export async function saveConfig(config: SiteseekConfig): Promise<void> {
  await mkdir(config.dataDir, { recursive: true });
  await writeFile(join(config.dataDir, "config.json"), JSON.stringify(config, null, 2));
  cachedConfig = config;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

export function validateConfig(config: unknown): ValidatedUserConfig {
  return validateUserConfig(config, "(inline)");
}

export {
  DEFAULT_CONFIG,
  DEFAULT_DATA_DIR,
  ConfigValidationError,
  EMBEDDING_PROVIDERS,
  RERANK_PROVIDERS,
};
