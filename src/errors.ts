// Error taxonomy shared by the engine, the adapters and the agent loop.

export class SteplineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "SteplineError";
  }
}

export class WorkflowDefinitionError extends SteplineError {
  constructor(message: string, cause?: unknown) {
    super(message, "WORKFLOW_DEFINITION", cause);
    this.name = "WorkflowDefinitionError";
  }
}

export class StepNotFoundError extends SteplineError {
  constructor(public readonly ref: string) {
    super(`No step registered under "${ref}"`, "STEP_NOT_FOUND");
    this.name = "StepNotFoundError";
  }
}

export class ContextTypeError extends SteplineError {
  constructor(
    public readonly key: string,
    detail: string,
  ) {
    super(`Context value "${key}" has the wrong type: ${detail}`, "CONTEXT_TYPE");
    this.name = "ContextTypeError";
  }
}

export class ContextKeyMissingError extends SteplineError {
  constructor(public readonly key: string) {
    super(`Context value "${key}" is not set`, "CONTEXT_KEY_MISSING");
    this.name = "ContextKeyMissingError";
  }
}

export class ToolNotFoundError extends SteplineError {
  constructor(
    public readonly toolName: string,
    available: string[] = [],
  ) {
    super(
      available.length
        ? `Tool not found: "${toolName}". Available tools: ${available.join(", ")}`
        : `Tool not found: "${toolName}"`,
      "TOOL_NOT_FOUND",
    );
    this.name = "ToolNotFoundError";
  }
}

export class ToolExecutionError extends SteplineError {
  constructor(
    public readonly toolName: string,
    message: string,
    cause?: unknown,
  ) {
    super(`Tool "${toolName}" failed: ${message}`, "TOOL_EXECUTION", cause);
    this.name = "ToolExecutionError";
  }
}

export class UnsupportedParameterTypeError extends SteplineError {
  constructor(
    public readonly adapter: string,
    public readonly toolName: string,
    public readonly parameter: string,
    public readonly type: string,
  ) {
    super(
      `${adapter} cannot express type "${type}" of parameter "${parameter}" in tool "${toolName}"`,
      "UNSUPPORTED_PARAMETER_TYPE",
    );
    this.name = "UnsupportedParameterTypeError";
  }
}

export class AdapterNotFoundError extends SteplineError {
  /** Every name looked up before giving up; more than one after a fallback lookup. */
  public readonly tried: readonly string[];

  constructor(
    provider: string | readonly string[],
    available: string[] = [],
  ) {
    const tried = typeof provider === "string" ? [provider] : [...provider];
    const subject =
      tried.length === 1
        ? `provider "${tried[0]}"`
        : `any of the providers ${tried.map((p) => `"${p}"`).join(", ")}`;
    super(
      `No tool adapter registered for ${subject}` + (available.length ? ` (registered: ${available.join(", ")})` : ""),
      "ADAPTER_NOT_FOUND",
    );
    this.name = "AdapterNotFoundError";
    this.tried = tried;
  }

  get provider(): string {
    return this.tried.join(", ");
  }
}

export class ProviderError extends SteplineError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, "PROVIDER_ERROR", cause);
    this.name = "ProviderError";
  }
}

export class AIConfigurationError extends SteplineError {
  constructor(message: string, cause?: unknown) {
    super(message, "AI_CONFIGURATION", cause);
    this.name = "AIConfigurationError";
  }
}

export class AgentLoopAbortedError extends SteplineError {
  constructor(public readonly iteration: number) {
    super(`Agent loop aborted at iteration ${iteration}`, "AGENT_LOOP_ABORTED");
    this.name = "AgentLoopAbortedError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
