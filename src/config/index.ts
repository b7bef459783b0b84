// Config loading from <dataDir>/config.json

import { mkdir, readFile, writeFile } from "fs/promises";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod/v4";
import type {
  DocsageConfig,
  EmbeddingConfig,
  GeneratorConfig,
  WorkerConfig,
  CrawlerConfig,
  ChunkingConfig,
  RetrievalConfig,
} from "../types";

const EMBEDDING_PROVIDERS = ["local", "openai"] as const;
const GENERATOR_PROVIDERS = ["extractive", "openai"] as const;
const CRAWL_SCOPES = ["host", "domain", "path"] as const;

const EmbeddingConfigSchema = z.object({
  provider: z.enum(EMBEDDING_PROVIDERS, {
    error: `Invalid embedding provider. Must be one of: ${EMBEDDING_PROVIDERS.join(", ")}`,
  }),
  model: z.string().optional(),
  apiKey: z.string().optional(),
  apiBase: z.url({ message: "embedding.apiBase must be a valid URL" }).optional(),
  batchSize: z.number().int().min(1, "embedding.batchSize must be at least 1").max(1000, "embedding.batchSize must be at most 1000"),
  maxAttempts: z.number().int().min(1, "embedding.maxAttempts must be at least 1").max(10, "embedding.maxAttempts must be at most 10"),
  baseDelayMs: z.number().int().min(0, "embedding.baseDelayMs cannot be negative").max(60000, "embedding.baseDelayMs must be at most 60000ms"),
});

const GeneratorConfigSchema = z.object({
  provider: z.enum(GENERATOR_PROVIDERS, {
    error: `Invalid generator provider. Must be one of: ${GENERATOR_PROVIDERS.join(", ")}`,
  }),
  model: z.string().optional(),
  apiKey: z.string().optional(),
  apiBase: z.url({ message: "generator.apiBase must be a valid URL" }).optional(),
});

const WorkerConfigSchema = z.object({
  port: z.number().int().min(1, "worker.port must be at least 1").max(65535, "worker.port must be at most 65535"),
  host: z.string().min(1, "worker.host cannot be empty"),
});

const CrawlerConfigSchema = z.object({
  concurrency: z.number().int().min(1, "crawler.concurrency must be at least 1").max(50, "crawler.concurrency must be at most 50"),
  requestDelay: z.number().int().min(0, "crawler.requestDelay cannot be negative").max(60000, "crawler.requestDelay must be at most 60000ms"),
  timeout: z.number().int().min(1000, "crawler.timeout must be at least 1000ms").max(120000, "crawler.timeout must be at most 120000ms"),
  maxPages: z.number().int().min(1, "crawler.maxPages must be at least 1").max(100000, "crawler.maxPages must be at most 100000"),
  maxDepth: z.number().int().min(0, "crawler.maxDepth cannot be negative").max(50, "crawler.maxDepth must be at most 50"),
  scope: z.enum(CRAWL_SCOPES, {
    error: `Invalid crawler scope. Must be one of: ${CRAWL_SCOPES.join(", ")}`,
  }),
  userAgent: z.string().min(1, "crawler.userAgent cannot be empty"),
  maxAttempts: z.number().int().min(1, "crawler.maxAttempts must be at least 1").max(10, "crawler.maxAttempts must be at most 10"),
  baseDelayMs: z.number().int().min(0, "crawler.baseDelayMs cannot be negative").max(60000, "crawler.baseDelayMs must be at most 60000ms"),
  useSitemap: z.boolean(),
});

const ChunkingConfigSchema = z.object({
  chunkSize: z.number().int().min(100, "chunking.chunkSize must be at least 100").max(20000, "chunking.chunkSize must be at most 20000"),
  chunkOverlap: z.number().int().min(0, "chunking.chunkOverlap cannot be negative").max(5000, "chunking.chunkOverlap must be at most 5000"),
});

const RetrievalConfigSchema = z.object({
  topK: z.number().int().min(1, "retrieval.topK must be at least 1").max(50, "retrieval.topK must be at most 50"),
  candidates: z.number().int().min(1, "retrieval.candidates must be at least 1").max(1000, "retrieval.candidates must be at most 1000"),
  rrfK: z.number().min(0, "retrieval.rrfK cannot be negative").max(1000, "retrieval.rrfK must be at most 1000"),
  previewChars: z.number().int().min(40, "retrieval.previewChars must be at least 40").max(5000, "retrieval.previewChars must be at most 5000"),
});

const UserConfigSchema = z.object({
  dataDir: z.string().optional(),
  embedding: EmbeddingConfigSchema.partial().optional(),
  generator: GeneratorConfigSchema.partial().optional(),
  worker: WorkerConfigSchema.partial().optional(),
  crawler: CrawlerConfigSchema.partial().optional(),
  chunking: ChunkingConfigSchema.partial().optional(),
  retrieval: RetrievalConfigSchema.partial().optional(),
}).strict().refine(
  cfg => {
    const size = cfg.chunking?.chunkSize ?? DEFAULT_CHUNKING_CONFIG.chunkSize;
    const overlap = cfg.chunking?.chunkOverlap ?? DEFAULT_CHUNKING_CONFIG.chunkOverlap;
    return overlap < size;
  },
  { message: "chunking.chunkOverlap must be smaller than chunking.chunkSize", path: ["chunking", "chunkOverlap"] }
);

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

const DEFAULT_EMBEDDING_CONFIG: EmbeddingConfig = {
  provider: "local",
  batchSize: 32,
  maxAttempts: 4,
  baseDelayMs: 500,
};

const DEFAULT_GENERATOR_CONFIG: GeneratorConfig = {
  provider: "extractive",
};

const DEFAULT_WORKER_CONFIG: WorkerConfig = {
  port: 8000,
  host: "127.0.0.1",
};

const DEFAULT_CRAWLER_CONFIG: CrawlerConfig = {
  concurrency: 5,
  requestDelay: 100,
  timeout: 20000,
  maxPages: 200,
  maxDepth: 5,
  scope: "host",
  userAgent: "docsage/0.1 (documentation crawler)",
  maxAttempts: 3,
  baseDelayMs: 500,
  useSitemap: true,
};

const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  chunkSize: 2000,
  chunkOverlap: 200,
};

const DEFAULT_RETRIEVAL_CONFIG: RetrievalConfig = {
  topK: 5,
  candidates: 20,
  rrfK: 60,
  previewChars: 200,
};

export function resolveDataDir(): string {
  return process.env.DOCSAGE_DATA_DIR || join(homedir(), ".docsage");
}

export function defaultConfig(dataDir = resolveDataDir()): DocsageConfig {
  return {
    dataDir,
    embedding: { ...DEFAULT_EMBEDDING_CONFIG },
    generator: { ...DEFAULT_GENERATOR_CONFIG },
    worker: { ...DEFAULT_WORKER_CONFIG },
    crawler: { ...DEFAULT_CRAWLER_CONFIG },
    chunking: { ...DEFAULT_CHUNKING_CONFIG },
    retrieval: { ...DEFAULT_RETRIEVAL_CONFIG },
  };
}

let cachedConfig: DocsageConfig | null = null;

export async function loadConfig(): Promise<DocsageConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const dataDir = resolveDataDir();
  const configPath = join(dataDir, "config.json");
  let config: DocsageConfig;

  try {
    const raw = await readFile(configPath, "utf8");
    const userConfig = validateUserConfig(JSON.parse(raw), configPath);
    config = mergeConfig(defaultConfig(dataDir), userConfig);
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
      console.warn(`[config] Failed to load config from ${configPath}, using defaults`);
    }
    config = defaultConfig(dataDir);
  }

  await ensureDataDir(config.dataDir);
  cachedConfig = config;

  return config;
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

function mergeConfig(defaults: DocsageConfig, user: ValidatedUserConfig): DocsageConfig {
  return {
    dataDir: user.dataDir ?? defaults.dataDir,
    embedding: { ...defaults.embedding, ...user.embedding },
    generator: { ...defaults.generator, ...user.generator },
    worker: { ...defaults.worker, ...user.worker },
    crawler: { ...defaults.crawler, ...user.crawler },
    chunking: { ...defaults.chunking, ...user.chunking },
    retrieval: { ...defaults.retrieval, ...user.retrieval },
  };
}

async function ensureDataDir(dataDir: string): Promise<void> {
  for (const dir of [dataDir, join(dataDir, "vectors"), join(dataDir, "db")]) {
    await mkdir(dir, { recursive: true });
  }
}

export async function saveConfig(config: DocsageConfig): Promise<void> {
  await ensureDataDir(config.dataDir);
  const configPath = join(config.dataDir, "config.json");
  await writeFile(configPath, JSON.stringify(config, null, 2));
  cachedConfig = config;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

export function validateConfig(config: unknown): ValidatedUserConfig {
  return validateUserConfig(config, "(inline)");
}

export {
  DEFAULT_CRAWLER_CONFIG,
  DEFAULT_CHUNKING_CONFIG,
  DEFAULT_RETRIEVAL_CONFIG,
  ConfigValidationError,
  EMBEDDING_PROVIDERS,
  GENERATOR_PROVIDERS,
  CRAWL_SCOPES,
};
