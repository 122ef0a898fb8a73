// src/graphs/execute.ts
import { GraphRecursionError } from '@langchain/langgraph';
import { isBaseMessage } from '@langchain/core/messages';
import type { RunnableConfig } from '@langchain/core/runnables';
import type * as t from '@/types';
import { StepBudgetExceededError } from '@/utils/errors';

type StreamMode = 'updates' | 'values';

/** Structural view of a compiled graph, as far as streaming is concerned */
export interface StreamableGraph<I> {
  stream(
    input: I,
    options?: Partial<RunnableConfig> & { streamMode?: StreamMode[] }
  ): Promise<AsyncIterable<unknown>>;
}

export type StreamGraphParams<I> = {
  graph: StreamableGraph<I>;
  input: I;
  recursionLimit: number;
  signal?: AbortSignal;
  config?: RunnableConfig;
  onStep?: (record: t.StepRecord) => void | Promise<void>;
};

export type StreamGraphResult = {
  state?: t.TeamState;
  steps: t.StepRecord[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value != null && !Array.isArray(value);
}

export function isRecursionError(error: unknown): boolean {
  return (
    error instanceof GraphRecursionError ||
    (error instanceof Error && error.name === 'GraphRecursionError')
  );
}

/** Rebuilds team state from a `values` chunk, keeping only well-typed fields */
export function toTeamState(value: unknown): t.TeamState | undefined {
  if (!isRecord(value) || !Array.isArray(value.messages)) {
    return undefined;
  }
  const members: unknown[] = Array.isArray(value.team_members)
    ? value.team_members
    : [];
  return {
    messages: value.messages.filter(isBaseMessage),
    team_members: members.filter(
      (member): member is string => typeof member === 'string'
    ),
    next: typeof value.next === 'string' ? value.next : '',
  };
}

/**
 * Streams a star graph with `updates` and `values` modes.
 *
 * Every node update becomes a {@link t.StepRecord}; the last `values` chunk
 * is the terminal state. Recursion exhaustion at any depth of the hierarchy
 * is rethrown as {@link StepBudgetExceededError}.
 */
export async function streamGraph<I>({
  graph,
  input,
  recursionLimit,
  signal,
  config,
  onStep,
}: StreamGraphParams<I>): Promise<StreamGraphResult> {
  const steps: t.StepRecord[] = [];
  let state: t.TeamState | undefined;

  try {
    const stream = await graph.stream(input, {
      ...config,
      recursionLimit,
      signal,
      streamMode: ['updates', 'values'],
    });

    for await (const chunk of stream) {
      if (!Array.isArray(chunk) || chunk.length !== 2) {
        continue;
      }
      const [mode, payload]: unknown[] = chunk;
      if (mode === 'values') {
        state = toTeamState(payload) ?? state;
        continue;
      }
      if (mode !== 'updates' || !isRecord(payload)) {
        continue;
      }
      for (const [node, update] of Object.entries(payload)) {
        const record: t.StepRecord = {
          step: steps.length + 1,
          node,
          update: isRecord(update) ? update : {},
        };
        steps.push(record);
        await onStep?.(record);
      }
    }
  } catch (error) {
    if (isRecursionError(error)) {
      throw new StepBudgetExceededError(recursionLimit, error);
    }
    throw error;
  }

  return { state, steps };
}
