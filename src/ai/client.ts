import type { AICapability, AgentLoopResult, GenerateOptions } from "../types/contracts.js";
import type { Tool } from "../types/tools.js";
import type { LLMProvider } from "../llm/provider.js";
import type { ToolAdapter } from "../tap/adapter.js";
import type { AIConfig } from "./config.js";
import { createDefaultAdapterRegistry, type AdapterRegistry } from "../tap/registry.js";
import { createProvider } from "../llm/factory.js";
import { runAgentLoop } from "../agent/loop.js";
import { silentLogger, type Logger } from "../log/logger.js";

export interface AIClientDefaults {
  maxTokens?: number;
  temperature?: number;
  maxIterations?: number;
}

export interface AIClientOptions {
  provider: LLMProvider;
  /** Overrides the registry lookup by provider name. */
  adapter?: ToolAdapter;
  adapters?: AdapterRegistry;
  defaults?: AIClientDefaults;
  logger?: Logger;
}

/** Binds one provider transport to the tool adapter of the same family. */
export class AIClient implements AICapability {
  readonly provider: string;
  private readonly llm: LLMProvider;
  private readonly adapter: ToolAdapter;
  private readonly defaults: AIClientDefaults;
  private readonly logger: Logger;

  constructor(options: AIClientOptions) {
    this.llm = options.provider;
    this.provider = options.provider.name;
    this.adapter = options.adapter ?? (options.adapters ?? createDefaultAdapterRegistry()).get(options.provider.name);
    this.defaults = options.defaults ?? {};
    this.logger = options.logger ?? silentLogger;
  }

  async generate(prompt: string, systemPrompt?: string, options: { signal?: AbortSignal } = {}): Promise<string> {
    const out = await this.llm.complete({
      messages: [{ role: "user", content: prompt }],
      system: systemPrompt,
      max_tokens: this.defaults.maxTokens,
      temperature: this.defaults.temperature,
      signal: options.signal,
    });
    return out.content;
  }

  generateWithTools(prompt: string, tools: Tool[], options: GenerateOptions = {}): Promise<AgentLoopResult> {
    return runAgentLoop({
      provider: this.llm,
      adapter: this.adapter,
      prompt,
      tools,
      systemPrompt: options.systemPrompt,
      maxIterations: options.maxIterations ?? this.defaults.maxIterations,
      maxTokens: options.maxTokens ?? this.defaults.maxTokens,
      temperature: options.temperature ?? this.defaults.temperature,
      signal: options.signal,
      logger: this.logger,
    });
  }
}

export function createAIClient(
  config: AIConfig,
  options: { adapters?: AdapterRegistry; logger?: Logger } = {},
): AIClient {
  return new AIClient({
    provider: createProvider(config),
    adapters: options.adapters,
    logger: options.logger,
    defaults: { maxTokens: config.maxTokens, temperature: config.temperature, maxIterations: config.maxIterations },
  });
}
