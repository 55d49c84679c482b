import type { AICapability, UIHandle } from "../types/contracts.js";
import type { Logger } from "../log/logger.js";
import type { AdapterRegistry } from "../tap/registry.js";
import { aiConfigFromEnv } from "../ai/config.js";
import { createAIClient } from "../ai/client.js";
import { errorMessage } from "../errors.js";
import { WorkflowContext } from "./context.js";

export class ContextBuilder {
  private data: Record<string, unknown> = {};
  private ui?: UIHandle;
  private ai?: AICapability;

  withData(values: Readonly<Record<string, unknown>>): this {
    Object.assign(this.data, values);
    return this;
  }

  withUI(ui: UIHandle): this {
    this.ui = ui;
    return this;
  }

  withAI(ai: AICapability | undefined): this {
    this.ai = ai;
    return this;
  }

  /**
   * Attaches an AI client configured from the environment. When nothing is
   * configured, or the configuration is invalid, `ai` stays unset and the
   * reason goes to the logger.
   */
  withAIFromEnv(
    env: NodeJS.ProcessEnv = process.env,
    options: { adapters?: AdapterRegistry; logger?: Logger } = {},
  ): this {
    try {
      const config = aiConfigFromEnv(env);
      this.ai = config ? createAIClient(config, options) : undefined;
      if (!config) options.logger?.debug("no AI provider configured");
    } catch (e) {
      this.ai = undefined;
      options.logger?.warn(`AI disabled: ${errorMessage(e)}`);
    }
    return this;
  }

  build(): WorkflowContext {
    return new WorkflowContext({ data: this.data, ai: this.ai, ui: this.ui });
  }
}
