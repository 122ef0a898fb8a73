// src/types/graph.ts
import type { LangGraphRunnableConfig } from '@langchain/langgraph';
import type {
  TeamStateAnnotation,
  AgentStateAnnotation,
  RagStateAnnotation,
} from '@/graphs/state';

export type TeamState = typeof TeamStateAnnotation.State;
export type TeamUpdate = typeof TeamStateAnnotation.Update;

/** Team state plus the freshly computed workspace listing */
export type AuthoringState = TeamState & { current_files: string };

export type AgentState = typeof AgentStateAnnotation.State;
export type AgentUpdate = typeof AgentStateAnnotation.Update;

export type RagState = typeof RagStateAnnotation.State;
export type RagUpdate = typeof RagStateAnnotation.Update;

/** A node of a star graph: receives the full state, returns only its delta */
export type TeamNode = (
  state: TeamState,
  config?: LangGraphRunnableConfig
) => Promise<TeamUpdate>;

/** Derives the agent's input from team state before each invocation */
export type Prelude = (state: TeamState) => Promise<AuthoringState>;

export type AgentInput = {
  messages: TeamState['messages'];
  current_files?: string;
};

export type AgentOutput = {
  output: string;
  /** Number of backend calls that proposed tool use or a final answer */
  iterations: number;
};

export type StepRecord = {
  step: number;
  node: string;
  update: Record<string, unknown>;
};
