// src/graphs/state.ts
import { Annotation } from '@langchain/langgraph';
import type { BaseMessage } from '@langchain/core/messages';
import type { DocumentInterface } from '@langchain/core/documents';
import { concatMessages, replaceValue } from '@/messages/reducer';

/**
 * Conversation state shared by every star graph (research team, response
 * team and the top-level supervisor).
 *
 * Reducer table:
 * - `messages`: concatenated, never replaced
 * - `team_members`, `next`: replaced by whatever the step returns
 */
export const TeamStateAnnotation = Annotation.Root({
  messages: Annotation<BaseMessage[]>({
    reducer: concatMessages,
    default: () => [],
  }),
  team_members: Annotation<string[]>({
    reducer: replaceValue,
    default: () => [],
  }),
  next: Annotation<string>({
    reducer: replaceValue,
    default: () => '',
  }),
});

/** Private act-observe loop state of a single agent invocation */
export const AgentStateAnnotation = Annotation.Root({
  /** Conversation handed to the agent by its team node */
  messages: Annotation<BaseMessage[]>({
    reducer: replaceValue,
    default: () => [],
  }),
  /** Workspace listing for authoring agents; empty for research agents */
  current_files: Annotation<string>({
    reducer: replaceValue,
    default: () => '',
  }),
  scratchpad: Annotation<BaseMessage[]>({
    reducer: concatMessages,
    default: () => [],
  }),
  iterations: Annotation<number>({
    reducer: (left: number, right: number) => left + right,
    default: () => 0,
  }),
});

export const RagStateAnnotation = Annotation.Root({
  question: Annotation<string>({
    reducer: replaceValue,
    default: () => '',
  }),
  context: Annotation<DocumentInterface[]>({
    reducer: replaceValue,
    default: () => [],
  }),
  response: Annotation<string>({
    reducer: replaceValue,
    default: () => '',
  }),
});
