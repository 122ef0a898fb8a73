// src/agents/supervisor.ts
import { z } from 'zod';
import { HumanMessage } from '@langchain/core/messages';
import {
  ChatPromptTemplate,
  MessagesPlaceholder,
} from '@langchain/core/prompts';
import type { AIMessageChunk, BaseMessage } from '@langchain/core/messages';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type * as t from '@/types';
import {
  FINISH,
  ToolNames,
  DEFAULT_ROUTING_RETRIES,
} from '@/common/enum';
import { ConfigurationError, InvalidRoutingDecisionError } from '@/utils/errors';
import { ROUTING_INSTRUCTION, routingCorrection } from '@/prompts';

export type RoutingOptions = [string, ...string[]];

export function routingOptions(members: readonly string[]): RoutingOptions {
  return [FINISH, ...members];
}

/**
 * Validates a raw routing label against the legal set.
 * @throws {InvalidRoutingDecisionError} for anything else, including non-strings
 */
export function parseRoutingDecision(
  raw: unknown,
  options: RoutingOptions
): string {
  const parsed = z.enum(options).safeParse(raw);
  if (!parsed.success) {
    throw new InvalidRoutingDecisionError(raw, options);
  }
  return parsed.data;
}

/** Label proposed by the backend: the `next` argument of its `route` call */
function extractRouteLabel(response: AIMessageChunk): unknown {
  const call = response.tool_calls?.find(
    (toolCall) => toolCall.name === ToolNames.ROUTE
  );
  return call?.args.next;
}

export type TeamSupervisorParams = {
  llm: BaseChatModel;
  /** Role prompt; may reference `{team_members}` */
  systemPrompt: string;
  members: readonly string[];
  /** Extra attempts after an invalid decision before giving up */
  maxRetries?: number;
  logger?: t.Logger;
};

/**
 * LLM router for a star graph.
 *
 * The backend is bound to a single `route` tool whose `next` argument is an
 * enum of `["FINISH", ...members]`; its choice is validated again on the way
 * out and written to state as `{ next }`.
 */
export function createTeamSupervisor({
  llm,
  systemPrompt,
  members,
  maxRetries = DEFAULT_ROUTING_RETRIES,
  logger,
}: TeamSupervisorParams): t.TeamNode {
  if (typeof llm.bindTools !== 'function') {
    throw new ConfigurationError(
      `Chat model "${llm._llmType()}" does not support tool binding`
    );
  }

  const options = routingOptions(members);
  const routeTool = {
    name: ToolNames.ROUTE,
    description: 'Select the next role.',
    schema: z.object({
      next: z.enum(options),
    }),
  };
  const model = llm.bindTools([routeTool], { tool_choice: ToolNames.ROUTE });

  const prompt = ChatPromptTemplate.fromMessages([
    ['system', systemPrompt],
    new MessagesPlaceholder('messages'),
    ['system', ROUTING_INSTRUCTION],
  ]);

  return async (state, config) => {
    const promptValue = await prompt.invoke(
      {
        messages: state.messages,
        team_members: members.join(', '),
        options: options.join(', '),
      },
      config
    );
    const messages: BaseMessage[] = promptValue.toChatMessages();

    for (let attempt = 0; ; attempt++) {
      const response = await model.invoke([...messages], config);
      const label = extractRouteLabel(response);
      try {
        const next = parseRoutingDecision(label, options);
        logger?.debug(`Routing to ${next}`);
        return { next };
      } catch (error) {
        if (attempt >= maxRetries) {
          throw error;
        }
        logger?.warn(
          `Invalid routing decision ${JSON.stringify(label) ?? String(label)}, re-prompting (${attempt + 1}/${maxRetries})`
        );
        messages.push(new HumanMessage(routingCorrection(label, options)));
      }
    }
  };
}
