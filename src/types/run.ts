// src/types/run.ts
import type { BaseMessage } from '@langchain/core/messages';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import type { Settings } from '@/utils/settings';
import type { Workspace } from '@/tools/workspace';
import type { GenericTool, PassageRetriever } from './tools';
import type { StepRecord } from './graph';
import type { Logger } from './logger';
import type { GraphEvents } from '@/common';

export type StepEventData = StepRecord & {
  /** Graph that produced the step, e.g. `top` or `Research team` */
  graph: string;
};

export type RunEndEventData = {
  runId: string;
  steps: number;
  finalMessage?: BaseMessage;
};

export type EventData = StepEventData | RunEndEventData;

export interface EventHandler {
  handle(
    event: GraphEvents | string,
    data: EventData,
    metadata?: Record<string, unknown>
  ): void | Promise<void>;
}

export type RunConfig = {
  runId?: string;
  settings?: Settings;
  /** Decision backend for agents and supervisors */
  llm?: BaseChatModel;
  /** Backend for the RAG answer step; defaults to `llm` when injected */
  ragLlm?: BaseChatModel;
  embeddings?: EmbeddingsInterface;
  /** Passage retriever over the policy corpus */
  retriever?: PassageRetriever;
  /** Retriever over previous responses, for the note taker */
  previousResponsesRetriever?: PassageRetriever;
  searchTool?: GenericTool;
  workspace?: Workspace;
  customHandlers?: Record<string, EventHandler>;
  logger?: Logger;
};

export type RunOptions = {
  recursionLimit?: number;
  signal?: AbortSignal;
};

export type RunResult = {
  runId: string;
  messages: BaseMessage[];
  finalMessage?: BaseMessage;
  steps: StepRecord[];
  workspace: string;
};
