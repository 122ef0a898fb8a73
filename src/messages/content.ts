import type { BaseMessage, MessageContent } from '@langchain/core/messages';

/** Flattens string or multi-part message content into plain text */
export function getContentText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map((part) => {
      if (typeof part === 'string') return part;
      if (part.type === 'text' && typeof part.text === 'string') {
        return part.text;
      }
      return '';
    })
    .join('');
}

export function getMessageText(message: BaseMessage | undefined): string {
  if (!message) return '';
  return getContentText(message.content);
}
