export type Role = "user" | "assistant" | "tool";

export interface ToolCallOut {
  id: string;
  name: string;
  /** Raw JSON text, as the provider sent it. */
  arguments: string;
}

export type Message =
  | { role: "user"; content: string }
  | { role: "assistant"; content: string; tool_calls?: ToolCallOut[] }
  | { role: "tool"; tool_call_id: string; name: string; content: string; is_error?: boolean };

export interface CompletionArgs {
  messages: Message[];
  system?: string;
  /** Provider-format tool declarations, as produced by the matching ToolAdapter. */
  tools?: unknown[];
  max_tokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface CompletionOut {
  content: string;
  tool_calls: ToolCallOut[];
  finish_reason?: string;
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
}
