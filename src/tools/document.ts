// src/tools/document.ts
import { z } from 'zod';
import { tool } from '@langchain/core/tools';
import type * as t from '@/types';
import { Constants, ToolNames } from '@/common/enum';
import { formatPassages } from '@/rag/format';
import type { Workspace } from './workspace';

function toLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function fromLines(lines: string[]): string {
  return lines.length === 0 ? '' : lines.join('\n') + '\n';
}

export async function writeDocument(
  workspace: Workspace,
  fileName: string,
  content: string,
  signal?: AbortSignal
): Promise<string> {
  await workspace.writeText(fileName, content, signal);
  return `Document saved to ${fileName}`;
}

/**
 * Returns `lines[start:end]` joined by newlines.
 * Negative bounds count from the end of the document.
 */
export async function readDocument(
  workspace: Workspace,
  fileName: string,
  start?: number | null,
  end?: number | null
): Promise<string> {
  const lines = toLines(await workspace.readText(fileName));
  return lines.slice(start ?? 0, end ?? undefined).join('\n');
}

/**
 * Inserts text before the given 1-indexed line numbers.
 *
 * Line numbers refer to the document before the edit: inserts are applied in
 * ascending order and each applied insert shifts later positions by one.
 * `line_count + 1` appends. Nothing is written unless every number is in range.
 */
export async function editDocument(
  workspace: Workspace,
  fileName: string,
  inserts: t.DocumentInserts,
  signal?: AbortSignal
): Promise<string> {
  const lines = toLines(await workspace.readText(fileName));
  const originalCount = lines.length;

  const entries: Array<[number, string]> = [];
  for (const [key, text] of Object.entries(inserts)) {
    const lineNumber = Number(key);
    if (!Number.isInteger(lineNumber)) {
      return `Error: Line number ${key} is out of range.`;
    }
    entries.push([lineNumber, text]);
  }
  entries.sort((a, b) => a[0] - b[0]);

  for (const [lineNumber] of entries) {
    if (lineNumber < 1 || lineNumber > originalCount + 1) {
      return `Error: Line number ${lineNumber} is out of range.`;
    }
  }

  entries.forEach(([lineNumber, text], applied) => {
    lines.splice(lineNumber - 1 + applied, 0, text);
  });

  await workspace.writeText(fileName, fromLines(lines), signal);
  return `Document edited and saved to ${fileName}`;
}

export async function createOutline(
  workspace: Workspace,
  fileName: string,
  points: string[],
  signal?: AbortSignal
): Promise<string> {
  await workspace.writeText(
    fileName,
    points.map((point, i) => `${i + 1}. ${point}\n`).join(''),
    signal
  );
  return `Outline saved to ${fileName}`;
}

export async function referencePreviousResponses(
  query: string,
  retriever?: t.PassageRetriever
): Promise<string> {
  if (!retriever) {
    return Constants.NO_PREVIOUS_RESPONSES;
  }
  const documents = await retriever.invoke(query);
  return formatPassages(documents);
}

export type DocumentToolsOptions = {
  /** Retriever over previous responses; the tool returns a sentinel without one */
  previousResponsesRetriever?: t.PassageRetriever;
};

export type DocumentTools = {
  writeDocument: t.GenericTool;
  readDocument: t.GenericTool;
  editDocument: t.GenericTool;
  createOutline: t.GenericTool;
  referencePreviousResponses: t.GenericTool;
};

/** Builds the Response team's document tools, bound to one workspace */
export function createDocumentTools(
  workspace: Workspace,
  { previousResponsesRetriever }: DocumentToolsOptions = {}
): DocumentTools {
  const writeTool = tool(
    async ({ content, file_name }, config) =>
      writeDocument(workspace, file_name, content, config.signal),
    {
      name: ToolNames.WRITE_DOCUMENT,
      description: 'Create and save a text document.',
      schema: z.object({
        content: z.string().describe('Text content to be written into the document.'),
        file_name: z.string().describe('File path to save the document.'),
      }),
    }
  );

  const readTool = tool(
    async ({ file_name, start, end }) =>
      readDocument(workspace, file_name, start, end),
    {
      name: ToolNames.READ_DOCUMENT,
      description: 'Read the specified document.',
      schema: z.object({
        file_name: z.string().describe('File path of the document to read.'),
        start: z
          .number()
          .int()
          .nullish()
          .describe('The start line. Default is 0'),
        end: z
          .number()
          .int()
          .nullish()
          .describe('The end line. Default is the end of the document'),
      }),
    }
  );

  const editTool = tool(
    async ({ file_name, inserts }, config) =>
      editDocument(workspace, file_name, inserts, config.signal),
    {
      name: ToolNames.EDIT_DOCUMENT,
      description:
        'Edit a document by inserting text at specific line numbers.',
      schema: z.object({
        file_name: z.string().describe('Path of the document to be edited.'),
        inserts: z
          .record(z.string())
          .default({})
          .describe(
            'Dictionary where key is the line number (1-indexed) and value is the text to be inserted at that line.'
          ),
      }),
    }
  );

  const outlineTool = tool(
    async ({ points, file_name }, config) =>
      createOutline(workspace, file_name, points, config.signal),
    {
      name: ToolNames.CREATE_OUTLINE,
      description: 'Create and save an outline.',
      schema: z.object({
        points: z.array(z.string()).describe('List of main points or sections.'),
        file_name: z.string().describe('File path to save the outline.'),
      }),
    }
  );

  const previousResponsesTool = tool(
    async ({ query }) =>
      referencePreviousResponses(query, previousResponsesRetriever),
    {
      name: ToolNames.REFERENCE_PREVIOUS_RESPONSES,
      description: 'Search for previous responses that match the query.',
      schema: z.object({
        query: z
          .string()
          .describe('The query to search for in the previous responses.'),
      }),
    }
  );

  return {
    writeDocument: writeTool,
    readDocument: readTool,
    editDocument: editTool,
    createOutline: outlineTool,
    referencePreviousResponses: previousResponsesTool,
  };
}
