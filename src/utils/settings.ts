// src/utils/settings.ts
import { z } from 'zod';
import { Constants, EnvVar } from '@/common/enum';
import { ConfigurationError } from './errors';
import { isPresent } from './misc';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (isPresent(value) ? value.trim() : undefined));

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const nonNegativeInt = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const settingsSchema = z.object({
  [EnvVar.OPENAI_API_KEY]: z
    .string({ required_error: 'OPENAI_API_KEY is required' })
    .trim()
    .min(1, 'OPENAI_API_KEY is required'),
  [EnvVar.OPENAI_MODEL]: z.string().default('gpt-4o-mini'),
  [EnvVar.RAG_MODEL]: z.string().default('gpt-4o-mini'),
  [EnvVar.EMBEDDING_MODEL]: z.string().default('text-embedding-3-small'),
  [EnvVar.TAVILY_API_KEY]: optionalString,
  [EnvVar.SEARCH_MAX_RESULTS]: positiveInt(5),
  [EnvVar.WORKSPACE_BASE_PATH]: z
    .string()
    .default(Constants.DEFAULT_WORKSPACE_BASE),
  [EnvVar.DATA_DIR]: z.string().default('data'),
  [EnvVar.COMPLAINTS_CSV]: z.string().default('data/complaints.csv'),
  [EnvVar.RAG_CHUNK_SIZE]: positiveInt(750),
  [EnvVar.RAG_CHUNK_OVERLAP]: nonNegativeInt(0),
  [EnvVar.RETRIEVER_K]: positiveInt(4),
  [EnvVar.RECURSION_LIMIT]: positiveInt(30),
  [EnvVar.AGENT_MAX_ITERATIONS]: positiveInt(15),
  [EnvVar.REQUEST_TIMEOUT_MS]: positiveInt(60_000),
  [EnvVar.TOOL_TIMEOUT_MS]: positiveInt(60_000),
  [EnvVar.MAX_RETRIES]: nonNegativeInt(2),
  [EnvVar.LOG_LEVEL]: z
    .enum(['debug', 'info', 'warn', 'error', 'silent'])
    .default('info'),
  [EnvVar.LANGFUSE_SECRET_KEY]: optionalString,
  [EnvVar.LANGFUSE_PUBLIC_KEY]: optionalString,
  [EnvVar.LANGFUSE_BASE_URL]: optionalString,
});

type RawSettings = z.infer<typeof settingsSchema>;

export type Settings = {
  openAIApiKey: string;
  model: string;
  ragModel: string;
  embeddingModel: string;
  tavilyApiKey?: string;
  searchMaxResults: number;
  workspaceBasePath: string;
  dataDir: string;
  complaintsCsv: string;
  chunkSize: number;
  chunkOverlap: number;
  retrieverK: number;
  recursionLimit: number;
  agentMaxIterations: number;
  requestTimeoutMs: number;
  toolTimeoutMs: number;
  maxRetries: number;
  logLevel: RawSettings[EnvVar.LOG_LEVEL];
  langfuse?: {
    secretKey: string;
    publicKey: string;
    baseUrl: string;
  };
};

/** Blank values count as unset so that `.env` placeholders fall back to defaults */
function withoutBlanks(
  env: Record<string, string | undefined>
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (isPresent(value)) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Validates process configuration.
 * @throws {ConfigurationError} when `OPENAI_API_KEY` is missing or a numeric
 * setting does not parse
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env
): Settings {
  const parsed = settingsSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const raw = parsed.data;
  if (raw[EnvVar.RAG_CHUNK_OVERLAP] >= raw[EnvVar.RAG_CHUNK_SIZE]) {
    throw new ConfigurationError(
      `Invalid configuration: ${EnvVar.RAG_CHUNK_OVERLAP} must be smaller than ${EnvVar.RAG_CHUNK_SIZE}`
    );
  }

  const secretKey = raw[EnvVar.LANGFUSE_SECRET_KEY];
  const publicKey = raw[EnvVar.LANGFUSE_PUBLIC_KEY];
  const baseUrl = raw[EnvVar.LANGFUSE_BASE_URL];

  return {
    openAIApiKey: raw[EnvVar.OPENAI_API_KEY],
    model: raw[EnvVar.OPENAI_MODEL],
    ragModel: raw[EnvVar.RAG_MODEL],
    embeddingModel: raw[EnvVar.EMBEDDING_MODEL],
    tavilyApiKey: raw[EnvVar.TAVILY_API_KEY],
    searchMaxResults: raw[EnvVar.SEARCH_MAX_RESULTS],
    workspaceBasePath: raw[EnvVar.WORKSPACE_BASE_PATH],
    dataDir: raw[EnvVar.DATA_DIR],
    complaintsCsv: raw[EnvVar.COMPLAINTS_CSV],
    chunkSize: raw[EnvVar.RAG_CHUNK_SIZE],
    chunkOverlap: raw[EnvVar.RAG_CHUNK_OVERLAP],
    retrieverK: raw[EnvVar.RETRIEVER_K],
    recursionLimit: raw[EnvVar.RECURSION_LIMIT],
    agentMaxIterations: raw[EnvVar.AGENT_MAX_ITERATIONS],
    requestTimeoutMs: raw[EnvVar.REQUEST_TIMEOUT_MS],
    toolTimeoutMs: raw[EnvVar.TOOL_TIMEOUT_MS],
    maxRetries: raw[EnvVar.MAX_RETRIES],
    logLevel: raw[EnvVar.LOG_LEVEL],
    langfuse:
      secretKey != null && publicKey != null && baseUrl != null
        ? { secretKey, publicKey, baseUrl }
        : undefined,
  };
}
