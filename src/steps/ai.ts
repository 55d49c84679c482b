import type { AICapability, StepFn } from "../types/contracts.js";
import type { WorkflowContext } from "../engine/context.js";
import { fail, skip, success, type Skip } from "../engine/result.js";
import { missingPlaceholders, renderTemplate } from "../prompt/renderer.js";
import { buildToolSet, type ToolRegistry } from "../tools/registry.js";
import { maxIterationsMessage } from "../agent/loop.js";
import { errorMessage } from "../errors.js";

type AIGate = { ai: AICapability; prompt: string } | { skipped: Skip } | { missingPrompt: true };

// AI steps are opt-in: only an explicit `use_ai: true` lets them call the provider.
function gate(ctx: WorkflowContext): AIGate {
  if (ctx.read("use_ai") !== true) return { skipped: skip("AI not requested for this run (use_ai=false)") };
  if (!ctx.ai) return { skipped: skip("AI not configured") };
  const prompt = ctx.read("prompt");
  if (!prompt?.trim()) return { missingPrompt: true };

  const unresolved = missingPlaceholders(prompt, ctx.data);
  if (unresolved.length > 0) ctx.ui?.warning(`Unresolved placeholder(s) in prompt: ${unresolved.join(", ")}`);
  return { ai: ctx.ai, prompt: renderTemplate(prompt, ctx.data) };
}

export const aiGenerateStep: StepFn = async (ctx) => {
  const g = gate(ctx);
  if ("skipped" in g) return g.skipped;
  if ("missingPrompt" in g) return fail("No prompt provided (set 'prompt' in params)");

  try {
    const response = await g.ai.generate(g.prompt, ctx.read("system_prompt"), { signal: ctx.signal });
    return success(`Generated ${response.length} characters with ${g.ai.provider}`, { ai_response: response });
  } catch (e) {
    return fail(`AI generation failed: ${errorMessage(e)}`, e);
  }
};

/**
 * Agent step over the named built-in tools; the tool set comes from `tools` in the context data.
 * Reaching `max_iterations` is an error: `ai_response` is left untouched and the calls made so
 * far are still written to `ai_tool_calls`.
 */
export function createAIAgentStep(toolRegistry?: ToolRegistry): StepFn {
  return async (ctx) => {
    const g = gate(ctx);
    if ("skipped" in g) return g.skipped;
    if ("missingPrompt" in g) return fail("No prompt provided (set 'prompt' in params)");

    try {
      const tools = buildToolSet(ctx.read("tools") ?? [], toolRegistry);
      const out = await g.ai.generateWithTools(g.prompt, tools, {
        systemPrompt: ctx.read("system_prompt"),
        maxIterations: ctx.read("max_iterations"),
        signal: ctx.signal,
      });
      if (out.stopReason === "max_iterations") {
        ctx.set("ai_tool_calls", [...out.toolCalls]);
        return fail(maxIterationsMessage(out.iterations));
      }
      return success(`Agent answered after ${out.iterations} tool turn(s)`, {
        ai_response: out.content,
        ai_tool_calls: [...out.toolCalls],
      });
    } catch (e) {
      return fail(`AI agent failed: ${errorMessage(e)}`, e);
    }
  };
}
