// src/graphs/ResearchGraph.ts
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type * as t from '@/types';
import { ResearchMembers } from '@/common/enum';
import { Agent } from '@/agents/Agent';
import { createAgentNode } from '@/agents/nodes';
import { createTeamSupervisor } from '@/agents/supervisor';
import { childLogger } from '@/utils/logger';
import {
  SEARCH_AGENT_PROMPT,
  LOAN_RETRIEVER_PROMPT,
  RESEARCH_SUPERVISOR_PROMPT,
} from '@/prompts';
import { createTeamGraph } from './TeamGraph';
import { createTeamChain } from './chains';
import type { TeamChain } from './chains';
import type { TeamGraph } from './TeamGraph';

/** Limits shared by every worker and supervisor of a team */
export type WorkerOptions = {
  maxIterations?: number;
  toolTimeoutMs?: number;
  maxRoutingRetries?: number;
  logger?: t.Logger;
};

export type ResearchGraphParams = WorkerOptions & {
  llm: BaseChatModel;
  searchTool: t.GenericTool;
  retrieveTool: t.GenericTool;
};

export const RESEARCH_MEMBERS: readonly ResearchMembers[] = [
  ResearchMembers.SEARCH,
  ResearchMembers.LOAN_RETRIEVER,
];

/** Research team: `Search` (web) and `LoanRetriever` (policy corpus) under one supervisor */
export function createResearchGraph({
  llm,
  searchTool,
  retrieveTool,
  maxIterations,
  toolTimeoutMs,
  maxRoutingRetries,
  logger,
}: ResearchGraphParams): TeamGraph {
  const scoped = (name: string): t.Logger | undefined =>
    logger ? childLogger(logger, name) : undefined;

  const searchAgent = new Agent({
    name: ResearchMembers.SEARCH,
    llm,
    tools: [searchTool],
    systemPrompt: SEARCH_AGENT_PROMPT,
    maxIterations,
    toolTimeoutMs,
    logger: scoped(ResearchMembers.SEARCH),
  });
  const retrieverAgent = new Agent({
    name: ResearchMembers.LOAN_RETRIEVER,
    llm,
    tools: [retrieveTool],
    systemPrompt: LOAN_RETRIEVER_PROMPT,
    maxIterations,
    toolTimeoutMs,
    logger: scoped(ResearchMembers.LOAN_RETRIEVER),
  });

  const supervisor = createTeamSupervisor({
    llm,
    systemPrompt: RESEARCH_SUPERVISOR_PROMPT,
    members: RESEARCH_MEMBERS,
    maxRetries: maxRoutingRetries,
    logger: scoped('Research supervisor'),
  });

  return createTeamGraph({
    supervisor,
    members: {
      [ResearchMembers.SEARCH]: createAgentNode({
        agent: searchAgent,
        name: ResearchMembers.SEARCH,
      }),
      [ResearchMembers.LOAN_RETRIEVER]: createAgentNode({
        agent: retrieverAgent,
        name: ResearchMembers.LOAN_RETRIEVER,
      }),
    },
  });
}

export function createResearchChain(graph: TeamGraph): TeamChain {
  return createTeamChain(graph);
}
