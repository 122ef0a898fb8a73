// src/agents/Agent.ts
import { AIMessage } from '@langchain/core/messages';
import { StateGraph, START, END } from '@langchain/langgraph';
import {
  ChatPromptTemplate,
  MessagesPlaceholder,
} from '@langchain/core/prompts';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { RunnableConfig } from '@langchain/core/runnables';
import type * as t from '@/types';
import {
  Constants,
  GraphNodeKeys,
  DEFAULT_MAX_ITERATIONS,
} from '@/common/enum';
import { AgentStateAnnotation } from '@/graphs/state';
import { ToolNode, toolsCondition } from '@/tools/ToolNode';
import { ConfigurationError } from '@/utils/errors';
import { getMessageText } from '@/messages/content';
import { AUTONOMY_SUFFIX } from '@/prompts';

export type AgentParams = {
  name: string;
  llm: BaseChatModel;
  tools: t.GenericTool[];
  /** Role prompt; may reference `{current_files}` */
  systemPrompt: string;
  maxIterations?: number;
  toolTimeoutMs?: number;
  logger?: t.Logger;
};

function buildAgentGraph(
  llm: BaseChatModel,
  tools: t.GenericTool[],
  systemPrompt: string,
  maxIterations: number,
  toolNode: ToolNode
) {
  if (typeof llm.bindTools !== 'function') {
    throw new ConfigurationError(
      `Chat model "${llm._llmType()}" does not support tool binding`
    );
  }

  const prompt = ChatPromptTemplate.fromMessages([
    ['system', systemPrompt + AUTONOMY_SUFFIX],
    new MessagesPlaceholder('messages'),
    new MessagesPlaceholder('agent_scratchpad'),
  ]);
  const model = llm.bindTools(tools);

  const callModel = async (
    state: t.AgentState,
    config?: RunnableConfig
  ): Promise<t.AgentUpdate> => {
    if (state.iterations >= maxIterations) {
      return { scratchpad: [new AIMessage(Constants.AGENT_STOPPED)] };
    }
    const promptValue = await prompt.invoke(
      {
        messages: state.messages,
        agent_scratchpad: state.scratchpad,
        current_files: state.current_files,
      },
      config
    );
    const response = await model.invoke(promptValue, config);
    return { scratchpad: [response], iterations: 1 };
  };

  const callTools = async (
    state: t.AgentState,
    config?: RunnableConfig
  ): Promise<t.AgentUpdate> => ({
    scratchpad: await toolNode.run(state.scratchpad, config),
  });

  return new StateGraph(AgentStateAnnotation)
    .addNode(GraphNodeKeys.AGENT, callModel)
    .addNode(GraphNodeKeys.TOOLS, callTools)
    .addEdge(START, GraphNodeKeys.AGENT)
    .addConditionalEdges(
      GraphNodeKeys.AGENT,
      (state: t.AgentState) =>
        toolsCondition(state.scratchpad, GraphNodeKeys.TOOLS),
      [GraphNodeKeys.TOOLS, END]
    )
    .addEdge(GraphNodeKeys.TOOLS, GraphNodeKeys.AGENT)
    .compile();
}

export type AgentGraph = ReturnType<typeof buildAgentGraph>;

/**
 * A worker: decision backend + fixed tool set + role prompt.
 *
 * Each invocation runs a private act-observe loop (agent ↔ tools) until the
 * backend answers without tool calls or `maxIterations` backend calls were made.
 */
export class Agent {
  readonly name: string;
  readonly graph: AgentGraph;
  readonly maxIterations: number;
  readonly toolNode: ToolNode;
  private logger?: t.Logger;

  constructor({
    name,
    llm,
    tools,
    systemPrompt,
    maxIterations = DEFAULT_MAX_ITERATIONS,
    toolTimeoutMs,
    logger,
  }: AgentParams) {
    this.name = name;
    this.maxIterations = maxIterations;
    this.logger = logger;
    this.toolNode = new ToolNode({
      tools,
      name: `${name}:${GraphNodeKeys.TOOLS}`,
      timeoutMs: toolTimeoutMs,
      logger,
    });
    this.graph = buildAgentGraph(
      llm,
      tools,
      systemPrompt,
      maxIterations,
      this.toolNode
    );
  }

  /** One model call and one tool round per iteration, plus the stop step */
  get recursionLimit(): number {
    return this.maxIterations * 2 + 3;
  }

  async invoke(
    input: t.AgentInput,
    config?: RunnableConfig
  ): Promise<t.AgentOutput> {
    const state = await this.graph.invoke(
      {
        messages: input.messages,
        current_files: input.current_files ?? '',
      },
      { ...config, recursionLimit: this.recursionLimit }
    );
    const output = getMessageText(state.scratchpad[state.scratchpad.length - 1]);
    this.logger?.debug(
      `${this.name} answered after ${state.iterations} iteration(s)`
    );
    return { output, iterations: state.iterations };
  }
}
