// src/rag/corpus.ts
import { promises as fs } from 'fs';
import { csvParse } from 'd3-dsv';
import { Document } from '@langchain/core/documents';
import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { MemoryVectorStore } from 'langchain/vectorstores/memory';
import { DirectoryLoader } from 'langchain/document_loaders/fs/directory';
import { PDFLoader } from '@langchain/community/document_loaders/fs/pdf';
import type { DocumentInterface } from '@langchain/core/documents';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import type * as t from '@/types';
import { tokenLength } from '@/utils/tokens';

/** Columns of the complaints export that make up a previous response */
export const COMPLAINT_CONTENT_COLUMNS = [
  'Consumer complaint narrative',
  'Company public response',
  'Company response to consumer',
] as const;

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/** Every PDF under `dataDir`, one document per page; empty when the directory is missing */
export async function loadPolicyDocuments(
  dataDir: string
): Promise<DocumentInterface[]> {
  if (!(await exists(dataDir))) {
    return [];
  }
  const loader = new DirectoryLoader(
    dataDir,
    { '.pdf': (filePath: string) => new PDFLoader(filePath) },
    true,
    'ignore'
  );
  return loader.load();
}

/** Parses the complaints CSV text into one document per row */
export function parseComplaints(
  csv: string,
  source: string
): DocumentInterface[] {
  return csvParse(csv).map(
    (row, index) =>
      new Document({
        pageContent: COMPLAINT_CONTENT_COLUMNS.map(
          (column) => `${column}: ${(row[column] ?? '').trim()}`
        ).join('\n'),
        metadata: { source, row: index },
      })
  );
}

/** Returns `undefined` when the file does not exist */
export async function loadComplaints(
  filePath: string
): Promise<DocumentInterface[] | undefined> {
  if (!(await exists(filePath))) {
    return undefined;
  }
  return parseComplaints(await fs.readFile(filePath, 'utf8'), filePath);
}

export type ChunkingOptions = {
  chunkSize: number;
  chunkOverlap: number;
};

/** Splitter measuring length in o200k_base tokens */
export function createTextSplitter({
  chunkSize,
  chunkOverlap,
}: ChunkingOptions): RecursiveCharacterTextSplitter {
  return new RecursiveCharacterTextSplitter({
    chunkSize,
    chunkOverlap,
    lengthFunction: tokenLength,
  });
}

export async function createRetriever(
  documents: DocumentInterface[],
  embeddings: EmbeddingsInterface,
  k: number
): Promise<t.PassageRetriever> {
  const store = await MemoryVectorStore.fromDocuments(documents, embeddings);
  return store.asRetriever(k);
}

export type KnowledgeBaseParams = ChunkingOptions & {
  dataDir: string;
  complaintsCsv: string;
  embeddings: EmbeddingsInterface;
  k: number;
  logger?: t.Logger;
};

export type KnowledgeBase = {
  retriever: t.PassageRetriever;
  previousResponsesRetriever?: t.PassageRetriever;
  stats: { policyChunks: number; complaints: number };
};

/**
 * Loads, chunks and indexes the policy corpus and the previous responses.
 * Missing inputs degrade: no PDFs gives an empty index, no complaints file
 * gives no previous-responses retriever.
 */
export async function buildKnowledgeBase({
  dataDir,
  complaintsCsv,
  embeddings,
  chunkSize,
  chunkOverlap,
  k,
  logger,
}: KnowledgeBaseParams): Promise<KnowledgeBase> {
  const pages = await loadPolicyDocuments(dataDir);
  const chunks = await createTextSplitter({
    chunkSize,
    chunkOverlap,
  }).splitDocuments(pages);
  logger?.info(
    `Indexed ${pages.length} policy page(s) as ${chunks.length} chunk(s) from ${dataDir}`
  );
  if (chunks.length === 0) {
    logger?.warn(`No policy documents found in ${dataDir}`);
  }
  const retriever = await createRetriever(chunks, embeddings, k);

  const complaints = await loadComplaints(complaintsCsv);
  if (!complaints) {
    logger?.warn(
      `Complaints file ${complaintsCsv} not found; previous responses are unavailable`
    );
    return {
      retriever,
      stats: { policyChunks: chunks.length, complaints: 0 },
    };
  }
  logger?.info(`Indexed ${complaints.length} previous response(s)`);

  return {
    retriever,
    previousResponsesRetriever: await createRetriever(complaints, embeddings, k),
    stats: { policyChunks: chunks.length, complaints: complaints.length },
  };
}
