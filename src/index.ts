/* Main Operations */
export * from './run';
export * from './events';
export * from './instrumentation';

/* Graphs */
export * from './graphs';

/* Agents */
export * from './agents';

/* RAG */
export * from './rag';

/* Tools */
export * from './tools/ToolNode';
export * from './tools/workspace';
export * from './tools/document';
export * from './tools/search';
export * from './tools/retrieval';

/* LLM */
export * from './llm';

/* Misc. */
export * from './common';
export * from './messages';
export * from './prompts';
export * from './utils';

/* Types */
export type * from './types';
