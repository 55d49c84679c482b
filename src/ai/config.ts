import { z } from "zod";
import { AIConfigurationError } from "../errors.js";

export const AI_PROVIDERS = ["anthropic", "openai", "gemini"] as const;
export type AIProviderName = (typeof AI_PROVIDERS)[number];

/** Key variables checked in order when no provider is named explicitly. */
const KEY_VARIABLES: ReadonlyArray<[AIProviderName, readonly string[]]> = [
  ["anthropic", ["ANTHROPIC_API_KEY"]],
  ["openai", ["OPENAI_API_KEY"]],
  ["gemini", ["GEMINI_API_KEY", "GOOGLE_API_KEY"]],
];

const numberFromEnv = z.coerce.number().finite();

export const AIConfigSchema = z.object({
  provider: z.enum(AI_PROVIDERS),
  apiKey: z.string().min(1),
  baseUrl: z.string().url().optional(),
  model: z.string().min(1).optional(),
  maxTokens: numberFromEnv.int().positive().optional(),
  temperature: numberFromEnv.min(0).max(2).optional(),
  maxIterations: numberFromEnv.int().positive().optional(),
});

export type AIConfig = z.infer<typeof AIConfigSchema>;

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function apiKeyFor(env: NodeJS.ProcessEnv, provider: AIProviderName): string | undefined {
  const entry = KEY_VARIABLES.find(([name]) => name === provider);
  return firstEnvValue(env, entry?.[1] ?? []);
}

/** First non-empty variable among `names`, in order. */
function firstEnvValue(env: NodeJS.ProcessEnv, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = envValue(env, name);
    if (value) return value;
  }
  return undefined;
}

// Gateway setups often export the *_DEFAULT_MODEL and OPENAI_API_BASE spellings instead.
function modelVariables(provider: AIProviderName): string[] {
  const prefix = provider.toUpperCase();
  const names = [`${prefix}_MODEL`, `${prefix}_DEFAULT_MODEL`];
  if (provider === "anthropic") names.push("ANTHROPIC_DEFAULT_SONNET_MODEL");
  return names;
}

function baseUrlVariables(provider: AIProviderName): string[] {
  const names = [`${provider.toUpperCase()}_BASE_URL`];
  if (provider === "openai") names.push("OPENAI_API_BASE");
  return names;
}

function isProviderName(value: string): value is AIProviderName {
  return AI_PROVIDERS.some((p) => p === value);
}

/**
 * Reads the AI configuration from the environment.
 * Returns undefined when no provider is named and no API key is present;
 * throws AIConfigurationError when what is present does not validate.
 */
export function aiConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AIConfig | undefined {
  const named = envValue(env, "STEPLINE_AI_PROVIDER")?.toLowerCase();
  let provider: AIProviderName | undefined;
  if (named !== undefined) {
    if (!isProviderName(named)) {
      throw new AIConfigurationError(
        `Unknown AI provider "${named}" in STEPLINE_AI_PROVIDER (expected one of: ${AI_PROVIDERS.join(", ")})`,
      );
    }
    provider = named;
  } else {
    provider = KEY_VARIABLES.find(([name]) => apiKeyFor(env, name) !== undefined)?.[0];
  }
  if (!provider) return undefined;

  const parsed = AIConfigSchema.safeParse({
    provider,
    apiKey: apiKeyFor(env, provider),
    baseUrl: firstEnvValue(env, baseUrlVariables(provider)),
    model: firstEnvValue(env, modelVariables(provider)),
    maxTokens: envValue(env, "STEPLINE_MAX_TOKENS"),
    temperature: envValue(env, "STEPLINE_TEMPERATURE"),
    maxIterations: envValue(env, "STEPLINE_MAX_ITERATIONS"),
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new AIConfigurationError(`Invalid AI configuration for ${provider}: ${detail}`, parsed.error);
  }
  return parsed.data;
}
