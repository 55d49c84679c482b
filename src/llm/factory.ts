import type { AIConfig } from "../ai/config.js";
import type { LLMProvider } from "./provider.js";
import { AnthropicMessages } from "./anthropic.js";
import { GeminiGenerateContent } from "./gemini.js";
import { OpenAIChatCompletions } from "./openai.js";

export function createProvider(config: Pick<AIConfig, "provider" | "apiKey" | "baseUrl" | "model">): LLMProvider {
  const options = { apiKey: config.apiKey, baseUrl: config.baseUrl, model: config.model };
  switch (config.provider) {
    case "anthropic":
      return new AnthropicMessages(options);
    case "openai":
      return new OpenAIChatCompletions(options);
    case "gemini":
      return new GeminiGenerateContent(options);
  }
}
