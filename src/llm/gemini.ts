import { z } from "zod";
import type { CompletionArgs, CompletionOut, Message } from "../types/llm.js";
import type { LLMProvider } from "./provider.js";
import type { ProviderOptions } from "./openai.js";
import { argumentsObject, parseReply, postJson } from "./http.js";

export const GEMINI_DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";
export const GEMINI_DEFAULT_MODEL = "gemini-1.5-flash";

const GenerateContentReply = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z
              .array(
                z.object({
                  text: z.string().optional(),
                  functionCall: z
                    .object({ name: z.string(), args: z.record(z.unknown()).optional() })
                    .optional(),
                }),
              )
              .default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .default([]),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().default(0),
      candidatesTokenCount: z.number().default(0),
      totalTokenCount: z.number().default(0),
    })
    .optional(),
});

type Part =
  | { text: string }
  | { functionCall: { name: string; args: Record<string, unknown> } }
  | { functionResponse: { name: string; response: { content: string; is_error?: boolean } } };

interface GeminiContent {
  role: "user" | "model";
  parts: Part[];
}

/** Gemini has no call ids; tool results are matched by function name and grouped into one user turn. */
export function toGeminiContents(messages: readonly Message[]): GeminiContent[] {
  const out: GeminiContent[] = [];
  for (const m of messages) {
    if (m.role === "user") {
      out.push({ role: "user", parts: [{ text: m.content }] });
    } else if (m.role === "assistant") {
      const parts: Part[] = [];
      if (m.content) parts.push({ text: m.content });
      for (const tc of m.tool_calls ?? []) {
        parts.push({ functionCall: { name: tc.name, args: argumentsObject(tc.arguments) } });
      }
      out.push({ role: "model", parts: parts.length ? parts : [{ text: "" }] });
    } else {
      const part: Part = {
        functionResponse: {
          name: m.name,
          response: { content: m.content, ...(m.is_error ? { is_error: true } : {}) },
        },
      };
      const last = out[out.length - 1];
      if (last && last.role === "user" && last.parts.every((p) => "functionResponse" in p)) last.parts.push(part);
      else out.push({ role: "user", parts: [part] });
    }
  }
  return out;
}

export class GeminiGenerateContent implements LLMProvider {
  readonly name = "gemini";
  private readonly apiKey: string;
  private readonly baseUrl: string;
  readonly model: string;

  constructor(options: ProviderOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl || GEMINI_DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.model = options.model || GEMINI_DEFAULT_MODEL;
  }

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    const tools = args.tools ?? [];
    const data = await postJson({
      provider: this.name,
      url: `${this.baseUrl}/models/${encodeURIComponent(this.model)}:generateContent`,
      headers: { "x-goog-api-key": this.apiKey },
      body: {
        contents: toGeminiContents(args.messages),
        systemInstruction: args.system ? { parts: [{ text: args.system }] } : undefined,
        tools: tools.length ? [{ functionDeclarations: tools }] : undefined,
        generationConfig: { maxOutputTokens: args.max_tokens, temperature: args.temperature },
      },
      signal: args.signal,
    });

    const reply = parseReply(this.name, GenerateContentReply, data);
    const candidate = reply.candidates.at(0);
    const text: string[] = [];
    const toolCalls: CompletionOut["tool_calls"] = [];
    for (const part of candidate?.content?.parts ?? []) {
      if (part.text) text.push(part.text);
      if (part.functionCall) {
        toolCalls.push({
          id: `${part.functionCall.name}_${toolCalls.length}`,
          name: part.functionCall.name,
          arguments: JSON.stringify(part.functionCall.args ?? {}),
        });
      }
    }
    const usage = reply.usageMetadata;
    return {
      content: text.join(""),
      tool_calls: toolCalls,
      finish_reason: candidate?.finishReason,
      usage: usage && {
        prompt_tokens: usage.promptTokenCount,
        completion_tokens: usage.candidatesTokenCount,
        total_tokens: usage.totalTokenCount,
      },
    };
  }
}
