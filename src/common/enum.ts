// src/common/enum.ts

/** Node keys shared by every graph in the hierarchy */
export enum GraphNodeKeys {
  SUPERVISOR = 'supervisor',
  AGENT = 'agent',
  TOOLS = 'tools',
  RETRIEVE = 'retrieve',
  GENERATE = 'generate',
}

/** Reserved routing label: the team (or the whole run) is done */
export const FINISH = 'FINISH';
export type Finish = typeof FINISH;

export enum ResearchMembers {
  SEARCH = 'Search',
  LOAN_RETRIEVER = 'LoanRetriever',
}

export enum AuthoringMembers {
  DOC_WRITER = 'DocWriter',
  NOTE_TAKER = 'NoteTaker',
  COPY_EDITOR = 'CopyEditor',
  TONE_EDITOR = 'ToneEditor',
}

export enum Teams {
  RESEARCH = 'Research team',
  RESPONSE = 'Response team',
}

export enum ToolNames {
  WEB_SEARCH = 'tavily_search_results_json',
  RETRIEVE_INFORMATION = 'retrieve_information',
  WRITE_DOCUMENT = 'write_document',
  READ_DOCUMENT = 'read_document',
  EDIT_DOCUMENT = 'edit_document',
  CREATE_OUTLINE = 'create_outline',
  REFERENCE_PREVIOUS_RESPONSES = 'reference_previous_responses',
  ROUTE = 'route',
}

export enum GraphEvents {
  /** A node finished and its delta was merged */
  ON_STEP = 'on_step',
  /** The top-level graph (or a standalone team chain) terminated */
  ON_RUN_END = 'on_run_end',
}

export enum EnvVar {
  OPENAI_API_KEY = 'OPENAI_API_KEY',
  OPENAI_MODEL = 'OPENAI_MODEL',
  RAG_MODEL = 'RAG_MODEL',
  EMBEDDING_MODEL = 'EMBEDDING_MODEL',
  TAVILY_API_KEY = 'TAVILY_API_KEY',
  SEARCH_MAX_RESULTS = 'SEARCH_MAX_RESULTS',
  WORKSPACE_BASE_PATH = 'WORKSPACE_BASE_PATH',
  DATA_DIR = 'DATA_DIR',
  COMPLAINTS_CSV = 'COMPLAINTS_CSV',
  RAG_CHUNK_SIZE = 'RAG_CHUNK_SIZE',
  RAG_CHUNK_OVERLAP = 'RAG_CHUNK_OVERLAP',
  RETRIEVER_K = 'RETRIEVER_K',
  RECURSION_LIMIT = 'RECURSION_LIMIT',
  AGENT_MAX_ITERATIONS = 'AGENT_MAX_ITERATIONS',
  REQUEST_TIMEOUT_MS = 'REQUEST_TIMEOUT_MS',
  TOOL_TIMEOUT_MS = 'TOOL_TIMEOUT_MS',
  MAX_RETRIES = 'MAX_RETRIES',
  LOG_LEVEL = 'LOG_LEVEL',
  LANGFUSE_SECRET_KEY = 'LANGFUSE_SECRET_KEY',
  LANGFUSE_PUBLIC_KEY = 'LANGFUSE_PUBLIC_KEY',
  LANGFUSE_BASE_URL = 'LANGFUSE_BASE_URL',
}

export const Constants = {
  NO_FILES_WRITTEN: 'No files written.',
  NO_PREVIOUS_RESPONSES: 'No previous responses available',
  SEARCH_UNAVAILABLE: 'Web search is unavailable: no search API key configured',
  AGENT_STOPPED: 'Agent stopped due to max iterations.',
  DEFAULT_WORKSPACE_BASE: './content/data',
} as const;

export const DEFAULT_TOOL_TIMEOUT_MS = 60_000;
export const DEFAULT_MAX_ITERATIONS = 15;
export const DEFAULT_RECURSION_LIMIT = 30;
/** Extra attempts a supervisor gets after an invalid routing decision */
export const DEFAULT_ROUTING_RETRIES = 1;
