// src/events.ts
import type * as t from '@/types';
import { GraphEvents } from '@/common/enum';
import { getMessageText } from '@/messages/content';

export class HandlerRegistry {
  private handlers: Map<string, t.EventHandler> = new Map();

  register(eventType: string, handler: t.EventHandler): void {
    this.handlers.set(eventType, handler);
  }

  getHandler(eventType: string): t.EventHandler | undefined {
    return this.handlers.get(eventType);
  }

  /** Dispatches to the registered handler, if any */
  async dispatch(
    eventType: string,
    data: t.EventData,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.handlers.get(eventType)?.handle(eventType, data, metadata);
  }
}

function isStepEvent(data: t.EventData): data is t.StepEventData {
  return 'node' in data;
}

function summarizeUpdate(update: Record<string, unknown>): string {
  if (typeof update.next === 'string') {
    return `→ ${update.next}`;
  }
  const messages = update.messages;
  if (Array.isArray(messages) && messages.length > 0) {
    const last: unknown = messages[messages.length - 1];
    if (
      typeof last === 'object' &&
      last != null &&
      'content' in last &&
      typeof last.content === 'string'
    ) {
      return last.content.length > 150
        ? `${last.content.slice(0, 150)}…`
        : last.content;
    }
  }
  return Object.keys(update).join(', ');
}

/** Logs one line per graph step and a summary when the run ends */
export class StepLogHandler implements t.EventHandler {
  private logger: t.Logger;

  constructor(logger: t.Logger) {
    this.logger = logger;
  }

  handle(event: string, data: t.EventData): void {
    if (event === GraphEvents.ON_STEP && isStepEvent(data)) {
      this.logger.info(
        `[${data.graph}] step ${data.step} ${data.node}: ${summarizeUpdate(data.update)}`
      );
      return;
    }
    if (event === GraphEvents.ON_RUN_END && !isStepEvent(data)) {
      this.logger.info(
        `Run ${data.runId} finished after ${data.steps} step(s): ${getMessageText(data.finalMessage)}`
      );
    }
  }
}

/** Fans one event out to several handlers in registration order */
export class CompositeHandler implements t.EventHandler {
  private handlers: t.EventHandler[];

  constructor(...handlers: t.EventHandler[]) {
    this.handlers = handlers;
  }

  async handle(
    event: string,
    data: t.EventData,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    for (const handler of this.handlers) {
      await handler.handle(event, data, metadata);
    }
  }
}
