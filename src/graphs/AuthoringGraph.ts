// src/graphs/AuthoringGraph.ts
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type * as t from '@/types';
import { AuthoringMembers } from '@/common/enum';
import { Agent } from '@/agents/Agent';
import { createAgentNode, createPrelude } from '@/agents/nodes';
import { createTeamSupervisor } from '@/agents/supervisor';
import { createDocumentTools } from '@/tools/document';
import { childLogger } from '@/utils/logger';
import {
  DOC_WRITER_PROMPT,
  NOTE_TAKER_PROMPT,
  COPY_EDITOR_PROMPT,
  TONE_EDITOR_PROMPT,
  AUTHORING_SUPERVISOR_PROMPT,
} from '@/prompts';
import type { Workspace } from '@/tools/workspace';
import { createTeamGraph } from './TeamGraph';
import { createTeamChain } from './chains';
import type { TeamChain } from './chains';
import type { TeamGraph } from './TeamGraph';
import type { WorkerOptions } from './ResearchGraph';

export type AuthoringGraphParams = WorkerOptions & {
  llm: BaseChatModel;
  workspace: Workspace;
  previousResponsesRetriever?: t.PassageRetriever;
};

export const AUTHORING_MEMBERS: readonly AuthoringMembers[] = [
  AuthoringMembers.DOC_WRITER,
  AuthoringMembers.NOTE_TAKER,
  AuthoringMembers.COPY_EDITOR,
  AuthoringMembers.TONE_EDITOR,
];

/**
 * Response team. Every worker sees a fresh workspace listing through the
 * prelude; the note taker can also consult previous responses.
 */
export function createAuthoringGraph({
  llm,
  workspace,
  previousResponsesRetriever,
  maxIterations,
  toolTimeoutMs,
  maxRoutingRetries,
  logger,
}: AuthoringGraphParams): TeamGraph {
  const docs = createDocumentTools(workspace, { previousResponsesRetriever });
  const prelude = createPrelude(workspace);
  const editingTools = [docs.writeDocument, docs.editDocument, docs.readDocument];

  const roles: Record<AuthoringMembers, { prompt: string; tools: t.GenericTool[] }> = {
    [AuthoringMembers.DOC_WRITER]: {
      prompt: DOC_WRITER_PROMPT,
      tools: editingTools,
    },
    [AuthoringMembers.NOTE_TAKER]: {
      prompt: NOTE_TAKER_PROMPT,
      tools: [
        docs.createOutline,
        docs.readDocument,
        docs.referencePreviousResponses,
      ],
    },
    [AuthoringMembers.COPY_EDITOR]: {
      prompt: COPY_EDITOR_PROMPT,
      tools: editingTools,
    },
    [AuthoringMembers.TONE_EDITOR]: {
      prompt: TONE_EDITOR_PROMPT,
      tools: editingTools,
    },
  };

  const members: Record<string, t.TeamNode> = {};
  for (const name of AUTHORING_MEMBERS) {
    const agent = new Agent({
      name,
      llm,
      tools: roles[name].tools,
      systemPrompt: roles[name].prompt,
      maxIterations,
      toolTimeoutMs,
      logger: logger ? childLogger(logger, name) : undefined,
    });
    members[name] = createAgentNode({ agent, name, prelude });
  }

  const supervisor = createTeamSupervisor({
    llm,
    systemPrompt: AUTHORING_SUPERVISOR_PROMPT,
    members: AUTHORING_MEMBERS,
    maxRetries: maxRoutingRetries,
    logger: logger ? childLogger(logger, 'Response supervisor') : undefined,
  });

  return createTeamGraph({ supervisor, members });
}

/** The Response team's chain also seeds `team_members` */
export function createAuthoringChain(graph: TeamGraph): TeamChain {
  return createTeamChain(graph, AUTHORING_MEMBERS);
}
