import {
  BaseMessage,
  BaseMessageLike,
  coerceMessageLikeToMessage,
} from '@langchain/core/messages';

export type Messages =
  | Array<BaseMessage | BaseMessageLike>
  | BaseMessage
  | BaseMessageLike;

/**
 * Append-only reducer for conversation history.
 *
 * Unlike LangGraph's `messagesStateReducer`, messages are never replaced or
 * removed by id: the right-hand delta is always concatenated after the
 * existing history, so a step can only grow the transcript.
 */
export function concatMessages(
  left: Messages,
  right: Messages
): BaseMessage[] {
  const leftArray = (Array.isArray(left) ? left : [left]) as BaseMessageLike[];
  const rightArray = (
    Array.isArray(right) ? right : [right]
  ) as BaseMessageLike[];

  return [
    ...leftArray.map((msg) => coerceMessageLikeToMessage(msg)),
    ...rightArray.map((msg) => coerceMessageLikeToMessage(msg)),
  ];
}

/** Last-write-wins reducer for scalar channels */
export function replaceValue<T>(_left: T, right: T): T {
  return right;
}
