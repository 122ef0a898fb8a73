// src/run.ts
import { v4 as uuidv4 } from 'uuid';
import { trace, SpanStatusCode } from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type * as t from '@/types';
import {
  Teams,
  GraphEvents,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_RECURSION_LIMIT,
  DEFAULT_TOOL_TIMEOUT_MS,
  DEFAULT_ROUTING_RETRIES,
} from '@/common/enum';
import { HandlerRegistry } from '@/events';
import { loadSettings } from '@/utils/settings';
import type { Settings } from '@/utils/settings';
import { createDefaultLogger } from '@/utils/logger';
import { toError } from '@/utils/errors';
import { createChatModel, createEmbeddings } from '@/llm/providers';
import { buildKnowledgeBase } from '@/rag/corpus';
import { createRagGraph } from '@/rag/graph';
import type { RagGraph } from '@/rag/graph';
import { createSearchTool } from '@/tools/search';
import { createRetrieveInformationTool } from '@/tools/retrieval';
import { Workspace } from '@/tools/workspace';
import {
  createResearchGraph,
  createResearchChain,
} from '@/graphs/ResearchGraph';
import {
  createAuthoringGraph,
  createAuthoringChain,
} from '@/graphs/AuthoringGraph';
import { createSupervisorGraph } from '@/graphs/SupervisorGraph';
import { enterChain } from '@/graphs/chains';
import { streamGraph } from '@/graphs/execute';
import type { TeamGraph } from '@/graphs/TeamGraph';

export const SUPERVISOR_GRAPH_NAME = 'Supervisor';

const tracer = trace.getTracer('hierarchical-agent-teams');

type RunParts = {
  id: string;
  logger: t.Logger;
  handlerRegistry: HandlerRegistry;
  workspace: Workspace;
  recursionLimit: number;
  ragGraph: RagGraph;
  researchGraph: TeamGraph;
  authoringGraph: TeamGraph;
  supervisorGraph: TeamGraph;
};

/**
 * Wires settings, models, the knowledge base, tools and the three star graphs
 * into one executable unit. Every collaborator can be injected through
 * {@link t.RunConfig}; whatever is missing is built from settings.
 */
export class Run {
  readonly id: string;
  readonly workspace: Workspace;
  readonly recursionLimit: number;
  readonly ragGraph: RagGraph;
  readonly researchGraph: TeamGraph;
  readonly authoringGraph: TeamGraph;
  readonly supervisorGraph: TeamGraph;
  private logger: t.Logger;
  private handlerRegistry: HandlerRegistry;

  private constructor(parts: RunParts) {
    this.id = parts.id;
    this.logger = parts.logger;
    this.handlerRegistry = parts.handlerRegistry;
    this.workspace = parts.workspace;
    this.recursionLimit = parts.recursionLimit;
    this.ragGraph = parts.ragGraph;
    this.researchGraph = parts.researchGraph;
    this.authoringGraph = parts.authoringGraph;
    this.supervisorGraph = parts.supervisorGraph;
  }

  static async create(config: t.RunConfig = {}): Promise<Run> {
    let settings: Settings | undefined =
      config.settings ?? (config.llm ? undefined : loadSettings());
    const requireSettings = (): Settings => (settings ??= loadSettings());

    const logger =
      config.logger ?? createDefaultLogger(settings?.logLevel ?? 'info');
    const id = config.runId ?? uuidv4();

    const handlerRegistry = new HandlerRegistry();
    if (config.customHandlers) {
      for (const [eventType, handler] of Object.entries(
        config.customHandlers
      )) {
        handlerRegistry.register(eventType, handler);
      }
    }

    const llm: BaseChatModel = config.llm ?? createChatModel(requireSettings());
    const ragLlm: BaseChatModel =
      config.ragLlm ??
      config.llm ??
      createChatModel(requireSettings(), requireSettings().ragModel);

    let retriever = config.retriever;
    let previousResponsesRetriever = config.previousResponsesRetriever;
    if (!retriever) {
      const current = requireSettings();
      const knowledgeBase = await buildKnowledgeBase({
        dataDir: current.dataDir,
        complaintsCsv: current.complaintsCsv,
        embeddings: config.embeddings ?? createEmbeddings(current),
        chunkSize: current.chunkSize,
        chunkOverlap: current.chunkOverlap,
        k: current.retrieverK,
        logger,
      });
      retriever = knowledgeBase.retriever;
      previousResponsesRetriever ??= knowledgeBase.previousResponsesRetriever;
    }

    const limits = {
      maxIterations: settings?.agentMaxIterations ?? DEFAULT_MAX_ITERATIONS,
      toolTimeoutMs: settings?.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS,
      maxRoutingRetries: DEFAULT_ROUTING_RETRIES,
      logger,
    };

    const ragGraph = createRagGraph(retriever, ragLlm);
    const searchTool =
      config.searchTool ??
      createSearchTool({
        apiKey: settings?.tavilyApiKey,
        maxResults: settings?.searchMaxResults,
      });
    const workspace =
      config.workspace ?? Workspace.create(settings?.workspaceBasePath);

    const researchGraph = createResearchGraph({
      llm,
      searchTool,
      retrieveTool: createRetrieveInformationTool(ragGraph),
      ...limits,
    });
    const authoringGraph = createAuthoringGraph({
      llm,
      workspace,
      previousResponsesRetriever,
      ...limits,
    });
    const supervisorGraph = createSupervisorGraph({
      llm,
      researchChain: createResearchChain(researchGraph),
      authoringChain: createAuthoringChain(authoringGraph),
      maxRoutingRetries: limits.maxRoutingRetries,
      logger,
    });

    logger.debug(`Run ${id} ready; workspace ${workspace.root}`);

    return new Run({
      id,
      logger,
      handlerRegistry,
      workspace,
      recursionLimit: settings?.recursionLimit ?? DEFAULT_RECURSION_LIMIT,
      ragGraph,
      researchGraph,
      authoringGraph,
      supervisorGraph,
    });
  }

  private async execute(
    graphName: string,
    graph: TeamGraph,
    input: t.TeamUpdate,
    options: t.RunOptions
  ): Promise<t.RunResult> {
    const recursionLimit = options.recursionLimit ?? this.recursionLimit;
    return tracer.startActiveSpan(
      'agent-teams.run',
      { attributes: { 'run.id': this.id, 'run.graph': graphName } },
      async (span: Span) => {
        try {
          const { state, steps } = await streamGraph({
            graph,
            input,
            recursionLimit,
            signal: options.signal,
            config: {
              runName: graphName,
              metadata: { run_id: this.id },
            },
            onStep: async (record) => {
              span.addEvent('graph.step', {
                'step.number': record.step,
                'step.node': record.node,
              });
              await this.handlerRegistry.dispatch(GraphEvents.ON_STEP, {
                ...record,
                graph: graphName,
              });
            },
          });

          const messages = state?.messages ?? [];
          const finalMessage = messages[messages.length - 1];
          await this.handlerRegistry.dispatch(GraphEvents.ON_RUN_END, {
            runId: this.id,
            steps: steps.length,
            finalMessage,
          });
          span.setAttribute('run.steps', steps.length);

          return {
            runId: this.id,
            messages,
            finalMessage,
            steps,
            workspace: this.workspace.root,
          };
        } catch (error) {
          const err = toError(error);
          this.logger.error(`Run ${this.id} failed: ${err.message}`);
          span.recordException(err);
          span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
          throw err;
        } finally {
          span.end();
        }
      }
    );
  }

  /** Runs the whole hierarchy: top-level supervisor over both teams */
  async processStream(
    request: string,
    options: t.RunOptions = {}
  ): Promise<t.RunResult> {
    return this.execute(
      SUPERVISOR_GRAPH_NAME,
      this.supervisorGraph,
      enterChain(request),
      options
    );
  }

  /** Runs the research team on its own */
  async processResearch(
    request: string,
    options: t.RunOptions = {}
  ): Promise<t.RunResult> {
    return this.execute(
      Teams.RESEARCH,
      this.researchGraph,
      enterChain(request),
      options
    );
  }

  /** Answers a question from the policy corpus only */
  async ask(question: string): Promise<string> {
    const result = await this.ragGraph.invoke({ question });
    return result.response;
  }

  /** Mermaid source for each graph of the hierarchy */
  getGraphDiagrams(): Record<string, string> {
    return {
      [SUPERVISOR_GRAPH_NAME]: this.supervisorGraph.getGraph().drawMermaid(),
      [Teams.RESEARCH]: this.researchGraph.getGraph().drawMermaid(),
      [Teams.RESPONSE]: this.authoringGraph.getGraph().drawMermaid(),
      RAG: this.ragGraph.getGraph().drawMermaid(),
    };
  }
}
