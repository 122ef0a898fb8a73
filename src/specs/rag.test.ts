// src/specs/rag.test.ts
import os from 'os';
import path from 'path';
import { promises as fs } from 'fs';
import { Document } from '@langchain/core/documents';
import { RunnableLambda } from '@langchain/core/runnables';
import { FakeEmbeddings } from '@langchain/core/utils/testing';
import { ToolNames } from '@/common';
import { createRagGraph } from '@/rag/graph';
import { formatPassages } from '@/rag/format';
import {
  parseComplaints,
  createRetriever,
  loadComplaints,
  buildKnowledgeBase,
} from '@/rag/corpus';
import { createRetrieveInformationTool } from '@/tools/retrieval';
import { ScriptedChatModel, answer } from '@/llm/fake';
import { getMessageText } from '@/messages';

const COMPLAINTS_CSV = [
  'Product,Consumer complaint narrative,Company public response,Company response to consumer',
  'Student loan,"My servicer lost my forms, twice",Company has responded,Closed with explanation',
  'Student loan,Payments were misapplied,,Closed with monetary relief',
  '',
].join('\n');

function stubRetriever(...passages: string[]) {
  const queries: string[] = [];
  const retriever = RunnableLambda.from(async (query: string) => {
    queries.push(query);
    return passages.map((pageContent) => new Document({ pageContent }));
  });
  return { retriever, queries };
}

describe('RAG graph', () => {
  it('retrieves for the question and answers from the context', async () => {
    const { retriever, queries } = stubRetriever('passage one', 'passage two');
    const llm = new ScriptedChatModel({
      responses: [answer('Pell Grants do not need to be repaid.')],
    });

    const result = await createRagGraph(retriever, llm).invoke({
      question: 'What are Pell Grants?',
    });

    expect(queries).toEqual(['What are Pell Grants?']);
    expect(result.context.map((doc) => doc.pageContent)).toEqual([
      'passage one',
      'passage two',
    ]);
    expect(result.response).toBe('Pell Grants do not need to be repaid.');

    expect(llm.calls).toHaveLength(1);
    const [prompt] = llm.calls[0];
    expect(getMessageText(prompt)).toContain(
      '#CONTEXT:\npassage one\n\npassage two\n\nQUERY:\nWhat are Pell Grants?\n'
    );
  });

  it('is exposed to agents as retrieve_information', async () => {
    const { retriever } = stubRetriever('Interest accrues daily.');
    const llm = new ScriptedChatModel({
      responses: [answer('Interest accrues daily.')],
    });
    const tool = createRetrieveInformationTool(createRagGraph(retriever, llm));

    expect(tool.name).toBe(ToolNames.RETRIEVE_INFORMATION);
    await expect(tool.invoke({ query: 'How does interest accrue?' })).resolves.toBe(
      'Interest accrues daily.'
    );
  });

  it('formats passages separated by blank lines', () => {
    expect(
      formatPassages([
        new Document({ pageContent: 'a' }),
        new Document({ pageContent: 'b' }),
      ])
    ).toBe('a\n\nb');
    expect(formatPassages([])).toBe('');
  });
});

describe('corpus', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'corpus-'));
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  it('turns each complaint row into one document', () => {
    const docs = parseComplaints(COMPLAINTS_CSV, 'complaints.csv');

    expect(docs).toHaveLength(2);
    expect(docs[0].pageContent).toBe(
      [
        'Consumer complaint narrative: My servicer lost my forms, twice',
        'Company public response: Company has responded',
        'Company response to consumer: Closed with explanation',
      ].join('\n')
    );
    expect(docs[1].pageContent).toBe(
      [
        'Consumer complaint narrative: Payments were misapplied',
        'Company public response: ',
        'Company response to consumer: Closed with monetary relief',
      ].join('\n')
    );
    expect(docs[1].metadata).toEqual({ source: 'complaints.csv', row: 1 });
  });

  it('returns undefined for a missing complaints file', async () => {
    await expect(
      loadComplaints(path.join(baseDir, 'missing.csv'))
    ).resolves.toBeUndefined();
  });

  it('returns the top k passages', async () => {
    const retriever = await createRetriever(
      ['one', 'two', 'three'].map(
        (pageContent) => new Document({ pageContent })
      ),
      new FakeEmbeddings(),
      2
    );
    const docs = await retriever.invoke('anything');
    expect(docs).toHaveLength(2);
  });

  it('builds a previous-responses retriever when the CSV exists', async () => {
    const csvPath = path.join(baseDir, 'complaints.csv');
    await fs.writeFile(csvPath, COMPLAINTS_CSV, 'utf8');

    const knowledgeBase = await buildKnowledgeBase({
      dataDir: path.join(baseDir, 'no-pdfs'),
      complaintsCsv: csvPath,
      embeddings: new FakeEmbeddings(),
      chunkSize: 100,
      chunkOverlap: 0,
      k: 4,
    });

    expect(knowledgeBase.stats).toEqual({ policyChunks: 0, complaints: 2 });
    expect(knowledgeBase.previousResponsesRetriever).toBeDefined();
    const previous = await knowledgeBase.previousResponsesRetriever?.invoke(
      'lost forms'
    );
    expect(previous).toHaveLength(2);
    await expect(knowledgeBase.retriever.invoke('anything')).resolves.toEqual(
      []
    );
  });

  it('omits the previous-responses retriever without a CSV', async () => {
    const knowledgeBase = await buildKnowledgeBase({
      dataDir: path.join(baseDir, 'no-pdfs'),
      complaintsCsv: path.join(baseDir, 'missing.csv'),
      embeddings: new FakeEmbeddings(),
      chunkSize: 100,
      chunkOverlap: 0,
      k: 4,
    });

    expect(knowledgeBase.previousResponsesRetriever).toBeUndefined();
    expect(knowledgeBase.stats).toEqual({ policyChunks: 0, complaints: 0 });
  });
});
