import type { StepRegistry } from "../orchestrator/registry.js";
import type { ToolRegistry } from "../tools/registry.js";
import { commandStep } from "./command.js";
import { aiGenerateStep, createAIAgentStep } from "./ai.js";

export const CORE_NAMESPACE = "core";

export function registerBuiltinSteps(registry: StepRegistry, options: { tools?: ToolRegistry } = {}): StepRegistry {
  return registry
    .register(CORE_NAMESPACE, "command", commandStep, { description: "Run a shell command" })
    .register(CORE_NAMESPACE, "ai_generate", aiGenerateStep, {
      required: false,
      description: "Single-shot AI completion of `prompt`",
    })
    .register(CORE_NAMESPACE, "ai_agent", createAIAgentStep(options.tools), {
      required: false,
      description: "AI agent loop over the built-in tools named in `tools`",
    });
}
