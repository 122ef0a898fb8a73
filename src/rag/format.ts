import type { DocumentInterface } from '@langchain/core/documents';

/** Passages as prompt text, separated by blank lines */
export function formatPassages(documents: DocumentInterface[]): string {
  return documents.map((doc) => doc.pageContent).join('\n\n');
}
