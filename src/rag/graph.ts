// src/rag/graph.ts
import { StateGraph, START, END } from '@langchain/langgraph';
import { ChatPromptTemplate } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { RunnableConfig } from '@langchain/core/runnables';
import type * as t from '@/types';
import { GraphNodeKeys } from '@/common/enum';
import { RagStateAnnotation } from '@/graphs/state';
import { RAG_PROMPT } from '@/prompts';
import { formatPassages } from './format';

/**
 * Two-step retrieval QA: `retrieve` fills `context` for `question`,
 * `generate` answers from that context only.
 */
export function createRagGraph(
  retriever: t.PassageRetriever,
  llm: BaseChatModel
) {
  const generator = ChatPromptTemplate.fromMessages([['human', RAG_PROMPT]])
    .pipe(llm)
    .pipe(new StringOutputParser());

  const retrieve = async (
    state: t.RagState,
    config?: RunnableConfig
  ): Promise<t.RagUpdate> => ({
    context: await retriever.invoke(state.question, config),
  });

  const generate = async (
    state: t.RagState,
    config?: RunnableConfig
  ): Promise<t.RagUpdate> => ({
    response: await generator.invoke(
      { question: state.question, context: formatPassages(state.context) },
      config
    ),
  });

  return new StateGraph(RagStateAnnotation)
    .addNode(GraphNodeKeys.RETRIEVE, retrieve)
    .addNode(GraphNodeKeys.GENERATE, generate)
    .addEdge(START, GraphNodeKeys.RETRIEVE)
    .addEdge(GraphNodeKeys.RETRIEVE, GraphNodeKeys.GENERATE)
    .addEdge(GraphNodeKeys.GENERATE, END)
    .compile();
}

export type RagGraph = ReturnType<typeof createRagGraph>;
