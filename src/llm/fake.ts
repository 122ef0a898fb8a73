// src/llm/fake.ts
import { nanoid } from 'nanoid';
import { AIMessage } from '@langchain/core/messages';
import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { BaseMessage, AIMessageChunk } from '@langchain/core/messages';
import type {
  BaseChatModelParams,
  BaseChatModelCallOptions,
  BindToolsInput,
} from '@langchain/core/language_models/chat_models';
import type { BaseLanguageModelInput } from '@langchain/core/language_models/base';
import type { Runnable } from '@langchain/core/runnables';
import type { ChatResult } from '@langchain/core/outputs';
import { ToolNames } from '@/common/enum';
import { getContentText } from '@/messages/content';

export type ScriptedChatModelParams = BaseChatModelParams & {
  /** Replies in the order they will be returned */
  responses: AIMessage[];
};

/**
 * Offline chat model that replays scripted replies, tool calls included.
 * Records the prompts it receives and the tools bound to it.
 */
export class ScriptedChatModel extends BaseChatModel {
  responses: AIMessage[];
  calls: BaseMessage[][] = [];
  boundTools: string[][] = [];

  constructor({ responses, ...params }: ScriptedChatModelParams) {
    super(params);
    this.responses = [...responses];
  }

  _llmType(): string {
    return 'scripted';
  }

  async _generate(messages: BaseMessage[]): Promise<ChatResult> {
    this.calls.push([...messages]);
    const message = this.responses.shift();
    if (!message) {
      throw new Error(
        `ScriptedChatModel ran out of responses after ${this.calls.length - 1} call(s)`
      );
    }
    return {
      generations: [{ message, text: getContentText(message.content) }],
    };
  }

  bindTools(
    tools: BindToolsInput[],
    _kwargs?: Partial<BaseChatModelCallOptions>
  ): Runnable<BaseLanguageModelInput, AIMessageChunk, BaseChatModelCallOptions> {
    this.boundTools.push(
      tools.map((tool) =>
        'name' in tool && typeof tool.name === 'string' ? tool.name : 'unknown'
      )
    );
    return this;
  }
}

/** Supervisor reply choosing `label` through the `route` tool */
export function routeTo(label: string): AIMessage {
  return callTool(ToolNames.ROUTE, { next: label });
}

export function callTool(
  name: string,
  args: Record<string, unknown>
): AIMessage {
  return new AIMessage({
    content: '',
    tool_calls: [{ name, args, id: `call_${nanoid(8)}`, type: 'tool_call' }],
  });
}

export function answer(text: string): AIMessage {
  return new AIMessage({ content: text });
}
