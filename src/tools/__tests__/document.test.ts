// src/tools/__tests__/document.test.ts
import os from 'os';
import path from 'path';
import { promises as fs } from 'fs';
import { Document } from '@langchain/core/documents';
import { RunnableLambda } from '@langchain/core/runnables';
import {
  writeDocument,
  readDocument,
  editDocument,
  createOutline,
  referencePreviousResponses,
  createDocumentTools,
} from '../document';
import { Workspace } from '../workspace';
import { Constants, ToolNames } from '@/common';

describe('document tools', () => {
  let baseDir: string;
  let workspace: Workspace;

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'doc-tools-'));
    workspace = new Workspace(baseDir);
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  const contentOf = (fileName: string): Promise<string> =>
    fs.readFile(path.join(baseDir, fileName), 'utf8');

  describe('writeDocument / readDocument', () => {
    it('overwrites and reports the saved file', async () => {
      await writeDocument(workspace, 'draft.txt', 'old\n');
      const result = await writeDocument(
        workspace,
        'draft.txt',
        'one\ntwo\nthree\n'
      );
      expect(result).toBe('Document saved to draft.txt');
      expect(await contentOf('draft.txt')).toBe('one\ntwo\nthree\n');
    });

    it('reads the whole document by default', async () => {
      await writeDocument(workspace, 'draft.txt', 'one\ntwo\nthree\n');
      expect(await readDocument(workspace, 'draft.txt')).toBe(
        'one\ntwo\nthree'
      );
    });

    it('honours start and end', async () => {
      await writeDocument(workspace, 'draft.txt', 'one\ntwo\nthree\n');
      expect(await readDocument(workspace, 'draft.txt', 1)).toBe('two\nthree');
      expect(await readDocument(workspace, 'draft.txt', 0, 2)).toBe(
        'one\ntwo'
      );
      expect(await readDocument(workspace, 'draft.txt', -1)).toBe('three');
      expect(await readDocument(workspace, 'draft.txt', null, null)).toBe(
        'one\ntwo\nthree'
      );
    });

    it('creates intermediate directories', async () => {
      await writeDocument(workspace, 'notes/outline.txt', 'x');
      expect(await contentOf('notes/outline.txt')).toBe('x');
    });
  });

  describe('editDocument', () => {
    beforeEach(async () => {
      await writeDocument(workspace, 'letter.txt', 'line1\n');
    });

    it('applies inserts in ascending order against the original numbering', async () => {
      const result = await editDocument(workspace, 'letter.txt', {
        '2': 'X',
        '1': 'Y',
      });
      expect(result).toBe('Document edited and saved to letter.txt');
      expect(await contentOf('letter.txt')).toBe('Y\nline1\nX\n');
    });

    it('appends when the line number is one past the end', async () => {
      await editDocument(workspace, 'letter.txt', { '2': 'end' });
      expect(await contentOf('letter.txt')).toBe('line1\nend\n');
    });

    it('rejects an out-of-range line and leaves the file unmodified', async () => {
      const result = await editDocument(workspace, 'letter.txt', {
        '100': 'Z',
      });
      expect(result).toBe('Error: Line number 100 is out of range.');
      expect(await contentOf('letter.txt')).toBe('line1\n');
    });

    it('writes nothing when any insert is out of range', async () => {
      const result = await editDocument(workspace, 'letter.txt', {
        '1': 'A',
        '5': 'B',
      });
      expect(result).toBe('Error: Line number 5 is out of range.');
      expect(await contentOf('letter.txt')).toBe('line1\n');
    });

    it('treats line 0 as out of range', async () => {
      expect(await editDocument(workspace, 'letter.txt', { '0': 'A' })).toBe(
        'Error: Line number 0 is out of range.'
      );
    });
  });

  it('writes a numbered outline', async () => {
    const result = await createOutline(workspace, 'outline.txt', [
      'Intro',
      'Body',
    ]);
    expect(result).toBe('Outline saved to outline.txt');
    expect(await contentOf('outline.txt')).toBe('1. Intro\n2. Body\n');
  });

  describe('referencePreviousResponses', () => {
    it('returns the sentinel without a retriever', async () => {
      expect(await referencePreviousResponses('refund')).toBe(
        Constants.NO_PREVIOUS_RESPONSES
      );
    });

    it('joins retrieved passages', async () => {
      const retriever = RunnableLambda.from(async (query: string) => [
        new Document({ pageContent: `match for ${query}` }),
        new Document({ pageContent: 'second' }),
      ]);
      expect(await referencePreviousResponses('loans', retriever)).toBe(
        'match for loans\n\nsecond'
      );
    });
  });

  describe('createDocumentTools', () => {
    it('exposes the tools under their wire names', () => {
      const tools = createDocumentTools(workspace);
      expect(Object.values(tools).map((tool) => tool.name)).toEqual([
        ToolNames.WRITE_DOCUMENT,
        ToolNames.READ_DOCUMENT,
        ToolNames.EDIT_DOCUMENT,
        ToolNames.CREATE_OUTLINE,
        ToolNames.REFERENCE_PREVIOUS_RESPONSES,
      ]);
    });

    it('edits through the structured tool interface', async () => {
      const tools = createDocumentTools(workspace);
      await tools.writeDocument.invoke({
        content: 'line1\n',
        file_name: 'letter.txt',
      });
      const result = await tools.editDocument.invoke({
        file_name: 'letter.txt',
        inserts: { '2': 'X', '1': 'Y' },
      });
      expect(result).toBe('Document edited and saved to letter.txt');
      expect(await contentOf('letter.txt')).toBe('Y\nline1\nX\n');
    });

    it('answers with the sentinel when no retriever is configured', async () => {
      const tools = createDocumentTools(workspace);
      expect(
        await tools.referencePreviousResponses.invoke({ query: 'refund' })
      ).toBe(Constants.NO_PREVIOUS_RESPONSES);
    });

    it('refuses paths outside the workspace', async () => {
      const tools = createDocumentTools(workspace);
      await expect(
        tools.writeDocument.invoke({
          content: 'x',
          file_name: '../escape.txt',
        })
      ).rejects.toThrow('Path escapes the working directory: ../escape.txt');
    });
  });
});

describe('Workspace', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'workspace-'));
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  it('creates a random 8-character subdirectory on first listing', async () => {
    const workspace = Workspace.create(baseDir);
    expect(path.dirname(workspace.root)).toBe(path.resolve(baseDir));
    expect(path.basename(workspace.root)).toMatch(/^[0-9a-f]{8}$/);

    expect(await workspace.listFiles()).toEqual([]);
    const stat = await fs.stat(workspace.root);
    expect(stat.isDirectory()).toBe(true);
  });

  it('lists nested files as sorted relative paths', async () => {
    const workspace = new Workspace(baseDir);
    await workspace.writeText('b.txt', 'b');
    await workspace.writeText('notes/a.txt', 'a');
    await workspace.writeText('a.txt', 'a');
    expect(await workspace.listFiles()).toEqual([
      'a.txt',
      'b.txt',
      'notes/a.txt',
    ]);
  });

  it('rejects absolute and escaping paths', () => {
    const workspace = new Workspace(baseDir);
    expect(() => workspace.resolve('/etc/hosts')).toThrow(
      'Absolute paths are not allowed'
    );
    expect(() => workspace.resolve('../outside.txt')).toThrow(
      'Path escapes the working directory'
    );
    expect(() => workspace.resolve('notes/../../outside.txt')).toThrow(
      'Path escapes the working directory'
    );
    expect(workspace.resolve('notes/../inside.txt')).toBe(
      path.join(path.resolve(baseDir), 'inside.txt')
    );
  });

  it('accepts names that merely start with two dots', async () => {
    const workspace = new Workspace(baseDir);
    expect(workspace.resolve('..draft.txt')).toBe(
      path.join(path.resolve(baseDir), '..draft.txt')
    );
    await workspace.writeText('..draft.txt', 'kept\n');
    expect(await workspace.listFiles()).toEqual(['..draft.txt']);
  });

  it('skips the write once the signal has fired', async () => {
    const workspace = new Workspace(baseDir);
    await workspace.writeText('letter.txt', 'one\n');
    const controller = new AbortController();
    controller.abort(new Error('timed out'));

    await expect(
      editDocument(workspace, 'letter.txt', { '1': 'zero' }, controller.signal)
    ).rejects.toThrow('timed out');
    expect(await workspace.readText('letter.txt')).toBe('one\n');
  });
});
