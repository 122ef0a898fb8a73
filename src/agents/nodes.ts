// src/agents/nodes.ts
import { HumanMessage } from '@langchain/core/messages';
import type * as t from '@/types';
import type { Workspace } from '@/tools/workspace';
import { Constants } from '@/common/enum';
import type { Agent } from './Agent';

/** Human-readable workspace listing injected into authoring prompts */
export function formatFileListing(files: string[]): string {
  if (files.length === 0) {
    return Constants.NO_FILES_WRITTEN;
  }
  return (
    '\nBelow are files your team has written to the directory:\n' +
    files.map((file) => ` - ${file}`).join('\n')
  );
}

/**
 * Recomputes `current_files` from the workspace before an authoring agent
 * runs. The listing is never stored in team state.
 */
export function createPrelude(workspace: Workspace): t.Prelude {
  return async (state) => {
    const files = await workspace.listFiles();
    return { ...state, current_files: formatFileListing(files) };
  };
}

export type AgentNodeParams = {
  agent: Pick<Agent, 'invoke'>;
  /** Role name recorded on the produced message */
  name: string;
  prelude?: t.Prelude;
};

/** Wraps an agent as a team worker: one invocation, one named `HumanMessage` */
export function createAgentNode({
  agent,
  name,
  prelude,
}: AgentNodeParams): t.TeamNode {
  return async (state, config) => {
    const input: t.AgentInput = prelude ? await prelude(state) : state;
    const result = await agent.invoke(
      { messages: input.messages, current_files: input.current_files },
      config
    );
    return {
      messages: [new HumanMessage({ content: result.output, name })],
    };
  };
}
