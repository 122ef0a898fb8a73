#!/usr/bin/env node
/* eslint-disable no-console */
// src/scripts/cli.ts
import { config } from 'dotenv';
config();
import { Command, InvalidArgumentError } from 'commander';
import { RunnableLambda } from '@langchain/core/runnables';
import type { DocumentInterface } from '@langchain/core/documents';
import type * as t from '@/types';
import { EnvVar, GraphEvents } from '@/common/enum';
import { startTracing, shutdownTracing } from '@/instrumentation';
import { loadSettings } from '@/utils/settings';
import { createDefaultLogger } from '@/utils/logger';
import { extractErrorMessage } from '@/utils/errors';
import { getMessageText } from '@/messages/content';
import { StepLogHandler } from '@/events';
import { Workspace } from '@/tools/workspace';
import { Run } from '@/run';

type GlobalOptions = {
  recursionLimit?: number;
  workspace?: string;
  dataDir?: string;
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

async function createRun(
  options: GlobalOptions,
  overrides: Partial<t.RunConfig> = {}
): Promise<Run> {
  const settings = loadSettings({
    ...process.env,
    [EnvVar.DATA_DIR]: options.dataDir ?? process.env[EnvVar.DATA_DIR],
  });
  const logger = createDefaultLogger(settings.logLevel);
  return Run.create({
    settings,
    logger,
    workspace: options.workspace ? new Workspace(options.workspace) : undefined,
    customHandlers: {
      [GraphEvents.ON_STEP]: new StepLogHandler(logger),
      [GraphEvents.ON_RUN_END]: new StepLogHandler(logger),
    },
    ...overrides,
  });
}

function printResult(result: t.RunResult): void {
  console.log('\n====== RESULT ======');
  console.log(getMessageText(result.finalMessage));
  console.log(`\nSteps: ${result.steps.length}`);
  console.log(`Workspace: ${result.workspace}`);
}

const program = new Command();

program
  .name('agent-teams')
  .description(
    'Hierarchical agent teams: a supervisor delegating to a research team and a response team'
  )
  .version('0.1.0')
  .option(
    '-r, --recursion-limit <n>',
    'step ceiling for every graph of the hierarchy',
    parsePositiveInt
  )
  .option('-w, --workspace <dir>', 'directory the Response team writes to')
  .option('-d, --data-dir <dir>', 'directory of policy PDFs');

program
  .command('run')
  .description('Run the full hierarchy on a request')
  .argument('<request>', 'customer request to research and answer')
  .action(async (request: string) => {
    const options = program.opts<GlobalOptions>();
    const run = await createRun(options);
    printResult(
      await run.processStream(request, {
        recursionLimit: options.recursionLimit,
      })
    );
  });

program
  .command('research')
  .description('Run only the research team')
  .argument('<question>', 'subject to research')
  .action(async (question: string) => {
    const options = program.opts<GlobalOptions>();
    const run = await createRun(options);
    printResult(
      await run.processResearch(question, {
        recursionLimit: options.recursionLimit,
      })
    );
  });

program
  .command('ask')
  .description('Answer a question from the policy corpus (RAG only)')
  .argument('<question>', 'question about the policy documents')
  .action(async (question: string) => {
    const run = await createRun(program.opts<GlobalOptions>());
    console.log(await run.ask(question));
  });

program
  .command('graph')
  .description('Print Mermaid diagrams of every graph')
  .action(async () => {
    const run = await createRun(program.opts<GlobalOptions>(), {
      retriever: RunnableLambda.from(
        async (_query: string): Promise<DocumentInterface[]> => []
      ),
    });
    for (const [name, diagram] of Object.entries(run.getGraphDiagrams())) {
      console.log(`\n%% ${name}\n${diagram}`);
    }
  });

async function main(): Promise<void> {
  startTracing();
  try {
    await program.parseAsync(process.argv);
  } finally {
    await shutdownTracing();
  }
}

main().catch((error: unknown) => {
  console.error(extractErrorMessage(error));
  process.exitCode = 1;
});
