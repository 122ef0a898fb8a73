// src/types/tools.ts
import type { StructuredToolInterface } from '@langchain/core/tools';
import type { RunnableInterface } from '@langchain/core/runnables';
import type { DocumentInterface } from '@langchain/core/documents';
import type { Logger } from './logger';

export type GenericTool = StructuredToolInterface;

export type ToolMap = Map<string, GenericTool>;

export type ToolNodeOptions = {
  name?: string;
  /** Upper bound for a single tool call, in milliseconds */
  timeoutMs?: number;
  logger?: Logger;
};

export type ToolNodeConstructorParams = {
  tools: GenericTool[];
  toolMap?: ToolMap;
} & ToolNodeOptions;

/** Anything that turns a query into ranked passages (a vector store retriever, a stub) */
export type PassageRetriever = RunnableInterface<string, DocumentInterface[]>;

/** Line number (1-indexed, as a string key) to the text inserted before it */
export type DocumentInserts = Record<string, string>;
