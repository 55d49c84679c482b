import { z } from "zod";
import type { CompletionArgs, CompletionOut, Message } from "../types/llm.js";
import type { LLMProvider } from "./provider.js";
import type { ProviderOptions } from "./openai.js";
import { argumentsObject, parseReply, postJson } from "./http.js";

export const ANTHROPIC_DEFAULT_BASE_URL = "https://api.anthropic.com/v1";
export const ANTHROPIC_DEFAULT_MODEL = "claude-3-5-sonnet-latest";
export const ANTHROPIC_API_VERSION = "2023-06-01";
// Messages API requires max_tokens on every request.
const DEFAULT_MAX_TOKENS = 1024;

const MessagesReply = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
      id: z.string().optional(),
      name: z.string().optional(),
      input: z.unknown().optional(),
    }),
  ),
  stop_reason: z.string().nullish(),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).optional(),
});

type ContentBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string; is_error?: boolean };

interface AnthropicMessage {
  role: "user" | "assistant";
  content: string | ContentBlock[];
}

/** Consecutive tool results travel together in one user turn. */
export function toAnthropicMessages(messages: readonly Message[]): AnthropicMessage[] {
  const out: AnthropicMessage[] = [];
  for (const m of messages) {
    if (m.role === "user") {
      out.push({ role: "user", content: m.content });
    } else if (m.role === "assistant") {
      const blocks: ContentBlock[] = [];
      if (m.content) blocks.push({ type: "text", text: m.content });
      for (const tc of m.tool_calls ?? []) {
        blocks.push({ type: "tool_use", id: tc.id, name: tc.name, input: argumentsObject(tc.arguments) });
      }
      out.push({ role: "assistant", content: blocks.length ? blocks : m.content });
    } else {
      const block: ContentBlock = {
        type: "tool_result",
        tool_use_id: m.tool_call_id,
        content: m.content,
        ...(m.is_error ? { is_error: true } : {}),
      };
      const last = out[out.length - 1];
      if (last && last.role === "user" && Array.isArray(last.content)) last.content.push(block);
      else out.push({ role: "user", content: [block] });
    }
  }
  return out;
}

export class AnthropicMessages implements LLMProvider {
  readonly name = "anthropic";
  private readonly apiKey: string;
  private readonly baseUrl: string;
  readonly model: string;

  constructor(options: ProviderOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl || ANTHROPIC_DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.model = options.model || ANTHROPIC_DEFAULT_MODEL;
  }

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    const tools = args.tools ?? [];
    const data = await postJson({
      provider: this.name,
      url: `${this.baseUrl}/messages`,
      headers: { "x-api-key": this.apiKey, "anthropic-version": ANTHROPIC_API_VERSION },
      body: {
        model: this.model,
        max_tokens: args.max_tokens ?? DEFAULT_MAX_TOKENS,
        system: args.system || undefined,
        messages: toAnthropicMessages(args.messages),
        temperature: args.temperature,
        tools: tools.length ? tools : undefined,
      },
      signal: args.signal,
    });

    const reply = parseReply(this.name, MessagesReply, data);
    const text: string[] = [];
    const toolCalls: CompletionOut["tool_calls"] = [];
    for (const block of reply.content) {
      if (block.type === "text" && block.text) text.push(block.text);
      if (block.type === "tool_use" && block.id && block.name) {
        toolCalls.push({ id: block.id, name: block.name, arguments: JSON.stringify(block.input ?? {}) });
      }
    }
    return {
      content: text.join(""),
      tool_calls: toolCalls,
      finish_reason: reply.stop_reason ?? undefined,
      usage: reply.usage && {
        prompt_tokens: reply.usage.input_tokens,
        completion_tokens: reply.usage.output_tokens,
        total_tokens: reply.usage.input_tokens + reply.usage.output_tokens,
      },
    };
  }
}
