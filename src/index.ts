export * from './errors.js';
export * from './engine/result.js';
export { WorkflowContext, type ContextInit } from './engine/context.js';
export { ContextBuilder } from './engine/builder.js';
export { KNOWN_KEYS, isKnownKey, type KnownKey, type KnownShapes, type GitStatus } from './engine/keys.js';
export type * from './types/contracts.js';
export type * from './types/tools.js';
export type * from './types/llm.js';

export { StepRegistry, type RegisterOptions, type RegisteredStep } from './orchestrator/registry.js';
export { compileWorkflow, defineWorkflow } from './orchestrator/compiler.js';
export { runWorkflow, execute, type ExecuteOptions, type StepRecord, type WorkflowReport } from './orchestrator/executor.js';
export { loadWorkflowFile, parseWorkflowSource, parseWorkflowText } from './workflow/loader.js';
export { WorkflowSourceSchema, type WorkflowSource, type WorkflowSourceInput } from './workflow/schema.js';

export { defineTool, validateToolArgs, normalizeParameterType } from './tools/define.js';
export { buildToolRegistry, buildToolSet, type ToolRegistry } from './tools/registry.js';

export { BaseToolAdapter, type ToolAdapter } from './tap/adapter.js';
export { AnthropicAdapter, type AnthropicToolSchema } from './tap/anthropic.js';
export { OpenAIAdapter, type OpenAIToolSchema } from './tap/openai.js';
export { GeminiAdapter, type GeminiFunctionDeclaration } from './tap/gemini.js';
export {
  AdapterRegistry,
  createDefaultAdapterRegistry,
  type AdapterFactory,
  type AdapterMetadata,
  type AdapterRegisterOptions,
} from './tap/registry.js';

export { runAgentLoop, DEFAULT_MAX_ITERATIONS, type AgentLoopOptions } from './agent/loop.js';
export type { LLMProvider } from './llm/provider.js';
export { OpenAIChatCompletions } from './llm/openai.js';
export { AnthropicMessages } from './llm/anthropic.js';
export { GeminiGenerateContent } from './llm/gemini.js';
export { createProvider } from './llm/factory.js';
export { AIClient, createAIClient } from './ai/client.js';
export { aiConfigFromEnv, type AIConfig } from './ai/config.js';

export { registerBuiltinSteps } from './steps/index.js';
export { renderTemplate, missingPlaceholders } from './prompt/renderer.js';
export { createConsoleLogger, createConsoleUI, silentLogger, type Logger } from './log/logger.js';
