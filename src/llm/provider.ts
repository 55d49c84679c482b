import type { CompletionArgs, CompletionOut } from "../types/llm.js";

export interface LLMProvider {
  readonly name: string;
  complete(args: CompletionArgs): Promise<CompletionOut>;
}
