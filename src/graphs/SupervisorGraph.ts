// src/graphs/SupervisorGraph.ts
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type * as t from '@/types';
import { Teams } from '@/common/enum';
import { createTeamSupervisor } from '@/agents/supervisor';
import { TOP_SUPERVISOR_PROMPT } from '@/prompts';
import { createTeamGraph } from './TeamGraph';
import { createTeamNode } from './chains';
import type { TeamChain } from './chains';
import type { TeamGraph } from './TeamGraph';

export type SupervisorGraphParams = {
  llm: BaseChatModel;
  researchChain: TeamChain;
  authoringChain: TeamChain;
  maxRoutingRetries?: number;
  logger?: t.Logger;
};

export const TEAMS: readonly Teams[] = [Teams.RESEARCH, Teams.RESPONSE];

/** Top level: the same star topology with the two team chains as members */
export function createSupervisorGraph({
  llm,
  researchChain,
  authoringChain,
  maxRoutingRetries,
  logger,
}: SupervisorGraphParams): TeamGraph {
  const supervisor = createTeamSupervisor({
    llm,
    systemPrompt: TOP_SUPERVISOR_PROMPT,
    members: TEAMS,
    maxRetries: maxRoutingRetries,
    logger,
  });

  return createTeamGraph({
    supervisor,
    members: {
      [Teams.RESEARCH]: createTeamNode(researchChain),
      [Teams.RESPONSE]: createTeamNode(authoringChain),
    },
  });
}
