import { z } from "zod";

const booleanFlag = z.enum(["true", "false"]).optional();

const envSchema = z.object({
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),

  DOCUMENT_STORE: z.enum(["local", "graph"]).default("local"),
  DOCUMENTS_ROOT: z.string().default("./documents"),
  GRAPH_TENANT_ID: z.string().optional(),
  GRAPH_CLIENT_ID: z.string().optional(),
  GRAPH_CLIENT_SECRET: z.string().optional(),
  GRAPH_SITE_ID: z.string().optional(),

  ENABLE_PGVECTOR: booleanFlag,
  DATABASE_URL: z.string().optional(),
  PERSIST_INMEMORY_INDEX: booleanFlag,
  INMEMORY_INDEX_PATH: z.string().default(".data/index.json"),
  MAX_INMEMORY_INDEX_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(200 * 1024 * 1024),
  JOB_REPOSITORY: z.enum(["memory", "postgres"]).default("memory"),

  EMBEDDING_PROVIDER: z.enum(["ollama", "openai"]).default("ollama"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("all-minilm"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(384),
  EMBEDDING_MAX_INPUT_CHARS: z.coerce.number().int().positive().default(2000),

  CHUNK_MAX_CHARS: z.coerce.number().int().positive().default(1000),
  CHUNK_STRIDE: z.coerce.number().int().nonnegative().default(150),
  CHUNK_LOOKAHEAD: z.coerce.number().int().nonnegative().default(120),
  DATE_WINDOW_WORDS: z.coerce.number().int().positive().default(25),

  MAX_RETRIES: z.coerce.number().int().nonnegative().default(5),
  RETRY_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1000),
  RETRY_BACKOFF: z.enum(["fixed", "exponential"]).default("exponential"),
  MAX_CONCURRENT_JOBS: z.coerce.number().int().positive().default(2),
  MAX_FOLDER_DEPTH: z.coerce.number().int().positive().default(5),
  DEFAULT_TOP_K: z.coerce.number().int().positive().default(20),

  EXPORT_CHRONOLOGY: booleanFlag,
  ARTIFACT_DIR: z.string().default(".data/artifacts"),
});

export interface GraphCredentials {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  siteId: string;
}

export interface RetryPolicy {
  maxRetries: number;
  intervalMs: number;
  backoff: "fixed" | "exponential";
}

export interface ChunkingOptions {
  maxChars: number;
  stride: number;
  lookahead: number;
}

export interface AppConfig {
  transport: "stdio" | "http";
  host: string;
  port: number;
  logLevel: "error" | "warn" | "info" | "debug";
  documentStore: "local" | "graph";
  documentsRoot: string;
  graph: GraphCredentials | null;
  enablePgvector: boolean;
  databaseUrl: string | null;
  persistInMemoryIndex: boolean;
  inMemoryIndexPath: string;
  maxInMemoryIndexBytes: number;
  jobRepository: "memory" | "postgres";
  embeddingProvider: "ollama" | "openai";
  ollamaBaseUrl: string;
  ollamaEmbeddingModel: string;
  openaiApiKey: string | null;
  openaiEmbeddingModel: string;
  vectorDimension: number;
  embeddingMaxInputChars: number;
  chunking: ChunkingOptions;
  dateWindowWords: number;
  retry: RetryPolicy;
  maxConcurrentJobs: number;
  maxFolderDepth: number;
  defaultTopK: number;
  exportChronology: boolean;
  artifactDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const enablePgvector = parsed.ENABLE_PGVECTOR === "true";

  if (enablePgvector && !parsed.DATABASE_URL) {
    throw new Error("ENABLE_PGVECTOR=true requires DATABASE_URL.");
  }
  if (parsed.JOB_REPOSITORY === "postgres" && !parsed.DATABASE_URL) {
    throw new Error("JOB_REPOSITORY=postgres requires DATABASE_URL.");
  }
  if (parsed.EMBEDDING_PROVIDER === "openai" && !parsed.OPENAI_API_KEY) {
    throw new Error("EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY.");
  }
  if (parsed.CHUNK_STRIDE >= parsed.CHUNK_MAX_CHARS) {
    throw new Error("CHUNK_STRIDE must be smaller than CHUNK_MAX_CHARS.");
  }

  return {
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
    logLevel: parsed.LOG_LEVEL,
    documentStore: parsed.DOCUMENT_STORE,
    documentsRoot: parsed.DOCUMENTS_ROOT,
    graph: resolveGraphCredentials(parsed),
    enablePgvector,
    databaseUrl: parsed.DATABASE_URL ?? null,
    persistInMemoryIndex: parsed.PERSIST_INMEMORY_INDEX === "true",
    inMemoryIndexPath: parsed.INMEMORY_INDEX_PATH,
    maxInMemoryIndexBytes: parsed.MAX_INMEMORY_INDEX_BYTES,
    jobRepository: parsed.JOB_REPOSITORY,
    embeddingProvider: parsed.EMBEDDING_PROVIDER,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    vectorDimension: parsed.VECTOR_DIMENSION,
    embeddingMaxInputChars: parsed.EMBEDDING_MAX_INPUT_CHARS,
    chunking: {
      maxChars: parsed.CHUNK_MAX_CHARS,
      stride: parsed.CHUNK_STRIDE,
      lookahead: parsed.CHUNK_LOOKAHEAD,
    },
    dateWindowWords: parsed.DATE_WINDOW_WORDS,
    retry: {
      maxRetries: parsed.MAX_RETRIES,
      intervalMs: parsed.RETRY_INTERVAL_MS,
      backoff: parsed.RETRY_BACKOFF,
    },
    maxConcurrentJobs: parsed.MAX_CONCURRENT_JOBS,
    maxFolderDepth: parsed.MAX_FOLDER_DEPTH,
    defaultTopK: parsed.DEFAULT_TOP_K,
    exportChronology: parsed.EXPORT_CHRONOLOGY === "true",
    artifactDir: parsed.ARTIFACT_DIR,
  };
}

function resolveGraphCredentials(
  parsed: z.infer<typeof envSchema>,
): GraphCredentials | null {
  if (parsed.DOCUMENT_STORE !== "graph") {
    return null;
  }

  const { GRAPH_TENANT_ID, GRAPH_CLIENT_ID, GRAPH_CLIENT_SECRET, GRAPH_SITE_ID } = parsed;
  if (!GRAPH_TENANT_ID || !GRAPH_CLIENT_ID || !GRAPH_CLIENT_SECRET || !GRAPH_SITE_ID) {
    throw new Error(
      "DOCUMENT_STORE=graph requires GRAPH_TENANT_ID, GRAPH_CLIENT_ID, GRAPH_CLIENT_SECRET and GRAPH_SITE_ID.",
    );
  }

  return {
    tenantId: GRAPH_TENANT_ID,
    clientId: GRAPH_CLIENT_ID,
    clientSecret: GRAPH_CLIENT_SECRET,
    siteId: GRAPH_SITE_ID,
  };
}
