// src/llm/providers.ts
import { ChatOpenAI, OpenAIEmbeddings } from '@langchain/openai';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import type { Settings } from '@/utils/settings';

/** Decision backend for agents, supervisors and the RAG answer step */
export function createChatModel(
  settings: Settings,
  model: string = settings.model
): BaseChatModel {
  return new ChatOpenAI({
    model,
    apiKey: settings.openAIApiKey,
    temperature: 0,
    timeout: settings.requestTimeoutMs,
    maxRetries: settings.maxRetries,
  });
}

export function createEmbeddings(settings: Settings): EmbeddingsInterface {
  return new OpenAIEmbeddings({
    model: settings.embeddingModel,
    apiKey: settings.openAIApiKey,
    timeout: settings.requestTimeoutMs,
    maxRetries: settings.maxRetries,
  });
}
