// src/graphs/TeamGraph.ts
import { StateGraph, START, END } from '@langchain/langgraph';
import type * as t from '@/types';
import { FINISH, GraphNodeKeys } from '@/common/enum';
import { InvalidRoutingDecisionError } from '@/utils/errors';
import { TeamStateAnnotation } from './state';

export type TeamGraphParams = {
  supervisor: t.TeamNode;
  /** Worker name to node; the names are the supervisor's legal labels */
  members: Record<string, t.TeamNode>;
};

/**
 * Static transition table out of the supervisor: every member maps to
 * itself and `FINISH` maps to END.
 */
export function createTransitionMap(
  memberNames: readonly string[]
): Record<string, string> {
  const transitions: Record<string, string> = { [FINISH]: END };
  for (const name of memberNames) {
    transitions[name] = name;
  }
  return transitions;
}

/**
 * Builds a star-topology team graph.
 *
 * - entry: supervisor
 * - supervisor → member | END, chosen by `state.next`
 * - member → supervisor, unconditionally
 *
 * The same builder serves both teams and the top level.
 */
export function createTeamGraph({ supervisor, members }: TeamGraphParams) {
  const memberNames = Object.keys(members);
  if (memberNames.length === 0) {
    throw new Error('A team needs at least one member');
  }
  const supervisorKey: string = GraphNodeKeys.SUPERVISOR;
  if (memberNames.includes(supervisorKey) || memberNames.includes(FINISH)) {
    throw new Error(
      `Member names must not collide with "${supervisorKey}" or "${FINISH}"`
    );
  }

  const transitions = createTransitionMap(memberNames);
  const labels = Object.keys(transitions);

  const workflow = new StateGraph(TeamStateAnnotation).addNode(
    supervisorKey,
    supervisor
  );
  for (const name of memberNames) {
    workflow.addNode(name, members[name]);
    workflow.addEdge(name, supervisorKey);
  }

  const route = (state: t.TeamState): string => {
    if (!Object.prototype.hasOwnProperty.call(transitions, state.next)) {
      throw new InvalidRoutingDecisionError(state.next, labels);
    }
    return state.next;
  };

  workflow
    .addEdge(START, supervisorKey)
    .addConditionalEdges(supervisorKey, route, transitions);

  return workflow.compile();
}

export type TeamGraph = ReturnType<typeof createTeamGraph>;
