// src/graphs/chains.ts
import { HumanMessage } from '@langchain/core/messages';
import { RunnableLambda } from '@langchain/core/runnables';
import type { Runnable } from '@langchain/core/runnables';
import type * as t from '@/types';
import { getMessageText } from '@/messages/content';
import type { TeamGraph } from './TeamGraph';

/** Input projection: plain text in, initial team state out */
export function enterChain(
  message: string,
  members?: readonly string[]
): t.TeamUpdate {
  const results: t.TeamUpdate = {
    messages: [new HumanMessage({ content: message })],
  };
  if (members && members.length > 0) {
    results.team_members = [...members];
  }
  return results;
}

/** Text of the newest message; what the outer graph hands to a team */
export function getLastMessage(state: Pick<t.TeamState, 'messages'>): string {
  return getMessageText(state.messages[state.messages.length - 1]);
}

/** Output projection: a finished team contributes only its last message */
export function joinGraph(state: Pick<t.TeamState, 'messages'>): t.TeamUpdate {
  const last = state.messages[state.messages.length - 1];
  return { messages: last ? [last] : [] };
}

export type TeamChain = Runnable<string, t.TeamState>;

/** `enterChain | graph`: accepts a request string, returns the terminal team state */
export function createTeamChain(
  graph: TeamGraph,
  members?: readonly string[]
): TeamChain {
  return RunnableLambda.from((message: string) =>
    enterChain(message, members)
  ).pipe(graph);
}

/** Collapses a whole team into one worker of an outer star graph */
export function createTeamNode(chain: TeamChain): t.TeamNode {
  return async (state, config) => {
    const result = await chain.invoke(getLastMessage(state), config);
    return joinGraph(result);
  };
}
