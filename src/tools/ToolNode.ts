import { ToolMessage, isAIMessage } from '@langchain/core/messages';
import { END, isGraphInterrupt } from '@langchain/langgraph';
import type { ToolCall } from '@langchain/core/messages/tool';
import type { RunnableConfig } from '@langchain/core/runnables';
import type { BaseMessage } from '@langchain/core/messages';
import type * as t from '@/types';
import { ToolTimeoutError, toError } from '@/utils/errors';
import { truncateObservation } from '@/utils/truncation';
import { DEFAULT_TOOL_TIMEOUT_MS } from '@/common/enum';

/**
 * Executes the tool calls of the last AI message.
 *
 * Calls run one after another: document edits address line numbers, so two
 * edits on the same file must observe each other's result. A failing or
 * timed-out call becomes an error `ToolMessage` the agent can react to.
 */
export class ToolNode {
  readonly name: string;
  private toolMap: t.ToolMap;
  timeoutMs: number;
  private logger?: t.Logger;

  constructor({
    tools,
    toolMap,
    name,
    timeoutMs,
    logger,
  }: t.ToolNodeConstructorParams) {
    this.name = name ?? 'tools';
    this.toolMap = toolMap ?? new Map(tools.map((tool) => [tool.name, tool]));
    this.timeoutMs = timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.logger = logger;
  }

  /**
   * Invokes `tool` with an abort signal that fires after `timeoutMs` or when
   * the caller's signal does. Document tools check it before writing.
   */
  private async invokeWithTimeout(
    tool: t.GenericTool,
    call: ToolCall,
    config: RunnableConfig
  ): Promise<unknown> {
    const parentSignal = config.signal;
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(parentSignal?.reason);
    if (parentSignal?.aborted === true) {
      onAbort();
    } else {
      parentSignal?.addEventListener('abort', onAbort, { once: true });
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new ToolTimeoutError(call.name, this.timeoutMs);
        reject(error);
        controller.abort(error);
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([
        tool.invoke(call.args, { ...config, signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
      parentSignal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Runs a single tool call with error handling
   */
  protected async runTool(
    call: ToolCall,
    config: RunnableConfig
  ): Promise<ToolMessage> {
    const tool = this.toolMap.get(call.name);
    const toolCallId = call.id ?? '';
    try {
      if (tool === undefined) {
        throw new Error(`Tool "${call.name}" not found.`);
      }
      this.logger?.debug(`Calling ${call.name}`, call.args);

      const output = await this.invokeWithTimeout(tool, call, config);
      const content =
        typeof output === 'string' ? output : JSON.stringify(output);
      return new ToolMessage({
        status: 'success',
        name: tool.name,
        content: truncateObservation(content),
        tool_call_id: toolCallId,
      });
    } catch (_e: unknown) {
      const e = toError(_e);
      if (isGraphInterrupt(e)) {
        throw e;
      }
      this.logger?.warn(`Tool ${call.name} failed: ${e.message}`, {
        toolCallId,
        input: call.args,
      });
      return new ToolMessage({
        status: 'error',
        content: `Error: ${e.message}\n Please fix your mistakes.`,
        name: call.name,
        tool_call_id: toolCallId,
      });
    }
  }

  /** Executes every tool call of the last message in `messages`, in order */
  async run(
    messages: BaseMessage[],
    config: RunnableConfig = {}
  ): Promise<ToolMessage[]> {
    const message = messages[messages.length - 1];
    if (message === undefined || !isAIMessage(message)) {
      throw new Error('ToolNode only accepts AIMessages as input.');
    }

    const outputs: ToolMessage[] = [];
    for (const call of message.tool_calls ?? []) {
      outputs.push(await this.runTool(call, config));
    }
    return outputs;
  }
}

/** Routes to `toolNode` while the last message still carries tool calls */
export function toolsCondition<T extends string>(
  messages: BaseMessage[],
  toolNode: T
): T | typeof END {
  const message = messages[messages.length - 1];
  if (
    message !== undefined &&
    isAIMessage(message) &&
    (message.tool_calls?.length ?? 0) > 0
  ) {
    return toolNode;
  }
  return END;
}
