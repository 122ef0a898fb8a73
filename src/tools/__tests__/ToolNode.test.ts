// src/tools/__tests__/ToolNode.test.ts
import os from 'os';
import path from 'path';
import { promises as fs } from 'fs';
import { z } from 'zod';
import { END } from '@langchain/langgraph';
import { tool } from '@langchain/core/tools';
import {
  AIMessage,
  HumanMessage,
  ToolMessage,
} from '@langchain/core/messages';
import type * as t from '@/types';
import { ToolNode, toolsCondition } from '../ToolNode';
import { createDocumentTools } from '../document';
import { Workspace } from '../workspace';

const echoTool = tool(async ({ text }) => `echo: ${text}`, {
  name: 'echo',
  description: 'Echoes its input',
  schema: z.object({ text: z.string() }),
});

const failingTool = tool(
  async (): Promise<string> => {
    throw new Error('backend unavailable');
  },
  {
    name: 'flaky',
    description: 'Always fails',
    schema: z.object({}),
  }
);

const hangingTool = tool(
  async (): Promise<string> => new Promise<string>(() => undefined),
  {
    name: 'slow',
    description: 'Never finishes',
    schema: z.object({}),
  }
);

function aiWithCalls(
  calls: Array<{ name: string; args: Record<string, unknown> }>
): AIMessage {
  return new AIMessage({
    content: '',
    tool_calls: calls.map((call, i) => ({
      ...call,
      id: `call_${i}`,
      type: 'tool_call' as const,
    })),
  });
}

describe('ToolNode', () => {
  it('turns tool output into a success ToolMessage', async () => {
    const node = new ToolNode({ tools: [echoTool] });
    const [message] = await node.run([
      aiWithCalls([{ name: 'echo', args: { text: 'hi' } }]),
    ]);
    expect(message).toBeInstanceOf(ToolMessage);
    expect(message.content).toBe('echo: hi');
    expect(message.tool_call_id).toBe('call_0');
    expect(message.status).toBe('success');
  });

  it('turns a thrown error into an observation and logs it', async () => {
    const warnings: string[] = [];
    const logger: t.Logger = {
      debug: () => undefined,
      info: () => undefined,
      warn: (message) => {
        warnings.push(message);
      },
      error: () => undefined,
    };
    const node = new ToolNode({ tools: [failingTool], logger });
    const [message] = await node.run([aiWithCalls([{ name: 'flaky', args: {} }])]);
    expect(message.content).toBe(
      'Error: backend unavailable\n Please fix your mistakes.'
    );
    expect(message.status).toBe('error');
    expect(message.tool_call_id).toBe('call_0');
    expect(warnings).toEqual(['Tool flaky failed: backend unavailable']);
  });

  it('reports unknown tools as observations', async () => {
    const node = new ToolNode({ tools: [echoTool] });
    const [message] = await node.run([aiWithCalls([{ name: 'nope', args: {} }])]);
    expect(message.content).toBe(
      'Error: Tool "nope" not found.\n Please fix your mistakes.'
    );
  });

  it('bounds every call with the timeout', async () => {
    const node = new ToolNode({ tools: [hangingTool], timeoutMs: 50 });
    const [message] = await node.run([aiWithCalls([{ name: 'slow', args: {} }])]);
    expect(message.content).toBe(
      'Error: Tool "slow" timed out after 50ms\n Please fix your mistakes.'
    );
  });

  it('keeps a timed-out document tool from writing afterwards', async () => {
    const baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tool-node-'));
    try {
      const workspace = new Workspace(baseDir);
      const outcomes: string[] = [];
      const lateWriter = tool(
        async (_input, config) => {
          await new Promise((resolve) => setTimeout(resolve, 60));
          await workspace.writeText('late.txt', 'too late', config.signal).then(
            () => outcomes.push('written'),
            () => outcomes.push('skipped')
          );
          return 'done';
        },
        {
          name: 'late_writer',
          description: 'Writes after a delay',
          schema: z.object({}),
        }
      );
      const node = new ToolNode({ tools: [lateWriter], timeoutMs: 20 });

      const [message] = await node.run([
        aiWithCalls([{ name: 'late_writer', args: {} }]),
      ]);
      await new Promise((resolve) => setTimeout(resolve, 100));

      expect(message.content).toBe(
        'Error: Tool "late_writer" timed out after 20ms\n Please fix your mistakes.'
      );
      expect(outcomes).toEqual(['skipped']);
      await expect(workspace.listFiles()).resolves.toEqual([]);
    } finally {
      await fs.rm(baseDir, { recursive: true, force: true });
    }
  });

  it('forwards a caller signal that has already been aborted', async () => {
    const baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tool-node-'));
    try {
      const workspace = new Workspace(baseDir);
      const { writeDocument } = createDocumentTools(workspace);
      const node = new ToolNode({ tools: [writeDocument] });
      const controller = new AbortController();
      controller.abort(new Error('run cancelled'));

      const [message] = await node.run(
        [
          aiWithCalls([
            {
              name: 'write_document',
              args: { content: 'draft', file_name: 'draft.txt' },
            },
          ]),
        ],
        { signal: controller.signal }
      );

      expect(message.status).toBe('error');
      await expect(workspace.listFiles()).resolves.toEqual([]);
    } finally {
      await fs.rm(baseDir, { recursive: true, force: true });
    }
  });

  it('runs the calls of one message sequentially', async () => {
    const baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tool-node-'));
    try {
      const workspace = new Workspace(baseDir);
      await workspace.writeText('doc.txt', 'x\n');
      const { editDocument } = createDocumentTools(workspace);
      const node = new ToolNode({ tools: [editDocument] });

      const messages = await node.run([
        aiWithCalls([
          { name: 'edit_document', args: { file_name: 'doc.txt', inserts: { '1': 'A' } } },
          { name: 'edit_document', args: { file_name: 'doc.txt', inserts: { '1': 'B' } } },
        ]),
      ]);

      expect(messages.map((m) => m.tool_call_id)).toEqual(['call_0', 'call_1']);
      expect(await workspace.readText('doc.txt')).toBe('B\nA\nx\n');
    } finally {
      await fs.rm(baseDir, { recursive: true, force: true });
    }
  });

  it('only accepts an AI message as the last input', async () => {
    const node = new ToolNode({ tools: [echoTool] });
    await expect(node.run([new HumanMessage('hi')])).rejects.toThrow(
      'ToolNode only accepts AIMessages as input.'
    );
  });
});

describe('toolsCondition', () => {
  it('routes to tools while tool calls are pending', () => {
    expect(
      toolsCondition([aiWithCalls([{ name: 'echo', args: { text: 'a' } }])], 'tools')
    ).toBe('tools');
  });

  it('ends on a final answer or an empty history', () => {
    expect(toolsCondition([new AIMessage('done')], 'tools')).toBe(END);
    expect(toolsCondition([], 'tools')).toBe(END);
  });
});
