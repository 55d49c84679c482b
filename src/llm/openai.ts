import { z } from "zod";
import type { CompletionArgs, CompletionOut, Message } from "../types/llm.js";
import type { LLMProvider } from "./provider.js";
import { parseReply, postJson } from "./http.js";

export const OPENAI_DEFAULT_BASE_URL = "https://api.openai.com/v1";
export const OPENAI_DEFAULT_MODEL = "gpt-4o-mini";

export interface ProviderOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
}

const ChatCompletionReply = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string().default("") }),
              }),
            )
            .nullish(),
        }),
        finish_reason: z.string().nullish(),
      }),
    )
    .min(1),
  usage: z
    .object({ prompt_tokens: z.number(), completion_tokens: z.number(), total_tokens: z.number() })
    .optional(),
});

type ChatMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string;
      tool_calls?: { id: string; type: "function"; function: { name: string; arguments: string } }[];
    }
  | { role: "tool"; tool_call_id: string; content: string };

function toChatMessage(m: Message): ChatMessage {
  switch (m.role) {
    case "user":
      return { role: "user", content: m.content };
    case "assistant":
      if (!m.tool_calls?.length) return { role: "assistant", content: m.content };
      return {
        role: "assistant",
        content: m.content,
        tool_calls: m.tool_calls.map((tc) => ({
          id: tc.id,
          type: "function",
          function: { name: tc.name, arguments: tc.arguments || "{}" },
        })),
      };
    case "tool":
      return { role: "tool", tool_call_id: m.tool_call_id, content: m.content };
  }
}

/** Chat Completions transport; also serves OpenAI-compatible endpoints through `baseUrl`. */
export class OpenAIChatCompletions implements LLMProvider {
  readonly name = "openai";
  private readonly apiKey: string;
  private readonly baseUrl: string;
  readonly model: string;

  constructor(options: ProviderOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl || OPENAI_DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.model = options.model || OPENAI_DEFAULT_MODEL;
  }

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    const messages: ChatMessage[] = [];
    if (args.system) messages.push({ role: "system", content: args.system });
    messages.push(...args.messages.map(toChatMessage));

    const tools = args.tools ?? [];
    const data = await postJson({
      provider: this.name,
      url: `${this.baseUrl}/chat/completions`,
      headers: { authorization: `Bearer ${this.apiKey}` },
      body: {
        model: this.model,
        messages,
        temperature: args.temperature,
        max_tokens: args.max_tokens,
        tools: tools.length ? tools : undefined,
        tool_choice: tools.length ? "auto" : undefined,
      },
      signal: args.signal,
    });

    const reply = parseReply(this.name, ChatCompletionReply, data);
    const choice = reply.choices[0];
    return {
      content: choice.message.content ?? "",
      tool_calls: (choice.message.tool_calls ?? []).map((tc) => ({
        id: tc.id,
        name: tc.function.name,
        arguments: tc.function.arguments,
      })),
      finish_reason: choice.finish_reason ?? undefined,
      usage: reply.usage,
    };
  }
}
