import type { z } from "zod";
import { ProviderError, errorMessage } from "../errors.js";

export interface PostJsonArgs {
  provider: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  signal?: AbortSignal;
}

/** POST a JSON body and return the decoded reply. Non-2xx replies become ProviderError with the status. */
export async function postJson(args: PostJsonArgs): Promise<unknown> {
  let res: Response;
  try {
    res = await fetch(args.url, {
      method: "POST",
      headers: { "content-type": "application/json", ...args.headers },
      body: JSON.stringify(args.body),
      signal: args.signal,
    });
  } catch (e) {
    throw new ProviderError(`${args.provider} request failed: ${errorMessage(e)}`, args.provider, undefined, e);
  }
  if (!res.ok) {
    const text = await res.text();
    throw new ProviderError(`${args.provider} HTTP ${res.status}: ${text}`, args.provider, res.status);
  }
  try {
    return await res.json();
  } catch (e) {
    throw new ProviderError(`${args.provider} returned a body that is not JSON`, args.provider, res.status, e);
  }
}

export function parseReply<T>(provider: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ProviderError(`${provider} reply has an unexpected shape: ${detail}`, provider, undefined, parsed.error);
  }
  return parsed.data;
}

/** Tool-call arguments as an object for providers that want structured input on replayed turns. */
export function argumentsObject(raw: string): Record<string, unknown> {
  if (!raw.trim()) return {};
  try {
    const value: unknown = JSON.parse(raw);
    if (typeof value === "object" && value !== null && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
  } catch {
    // replayed as an empty object; the loop already reported the bad arguments to the model
  }
  return {};
}
