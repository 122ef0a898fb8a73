/**
 * Error types raised by the orchestration layer and a normaliser for thrown
 * values of unknown shape.
 */

/** Missing or invalid settings, or a collaborator that cannot be used */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A supervisor produced a label outside its declared set.
 * Never defaulted: the owning chain aborts.
 */
export class InvalidRoutingDecisionError extends ConfigurationError {
  readonly label: unknown;
  readonly options: readonly string[];

  constructor(label: unknown, options: readonly string[]) {
    super(
      `Invalid routing decision ${JSON.stringify(label) ?? String(label)}; expected one of: ${options.join(', ')}`
    );
    this.name = 'InvalidRoutingDecisionError';
    this.label = label;
    this.options = options;
  }
}

/** The step ceiling was reached before a supervisor chose FINISH */
export class StepBudgetExceededError extends Error {
  readonly limit: number;

  constructor(limit: number, cause?: unknown) {
    super(
      `Graph did not converge: step budget of ${limit} exhausted before FINISH`,
      { cause }
    );
    this.name = 'StepBudgetExceededError';
    this.limit = limit;
  }
}

export class ToolTimeoutError extends Error {
  readonly toolName: string;
  readonly timeoutMs: number;

  constructor(toolName: string, timeoutMs: number) {
    super(`Tool "${toolName}" timed out after ${timeoutMs}ms`);
    this.name = 'ToolTimeoutError';
    this.toolName = toolName;
    this.timeoutMs = timeoutMs;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value != null;
}

/**
 * Extracts a human-readable error message from an unknown error value.
 */
export function extractErrorMessage(error: unknown): string {
  if (error == null) {
    return '';
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (isRecord(error)) {
    if (typeof error.message === 'string') {
      return error.message;
    }
    if (typeof error.error === 'string') {
      return error.error;
    }
    if (isRecord(error.error) && typeof error.error.message === 'string') {
      return error.error.message;
    }
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(extractErrorMessage(error));
}
