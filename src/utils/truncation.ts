/**
 * Bounds tool observations before they enter an agent's scratchpad.
 * Search results and retrieved passages can be large; the model only needs
 * the head (structure) and the tail (conclusion).
 */

export const DEFAULT_MAX_OBSERVATION_CHARS = 20_000;

export function truncateObservation(
  content: string,
  maxChars: number = DEFAULT_MAX_OBSERVATION_CHARS
): string {
  if (content.length <= maxChars) {
    return content;
  }

  const marker = `\n… [${content.length - maxChars} chars omitted] …\n`;
  const budget = maxChars - marker.length;
  if (budget <= 0) {
    return content.slice(0, maxChars);
  }

  const head = Math.ceil(budget * 0.7);
  const tail = budget - head;
  return (
    content.slice(0, head) +
    marker +
    (tail > 0 ? content.slice(content.length - tail) : '')
  );
}
