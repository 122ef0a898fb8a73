import { getEncoding } from 'js-tiktoken';
import type { Tiktoken } from 'js-tiktoken';

let encoder: Tiktoken | undefined;

function getEncoder(): Tiktoken {
  if (!encoder) {
    encoder = getEncoding('o200k_base');
  }
  return encoder;
}

/** Length of `text` in o200k_base tokens, the unit chunk sizes are measured in */
export function tokenLength(text: string): number {
  return getEncoder().encode(text).length;
}
