import type { ToolAdapter } from "./adapter.js";
import { AdapterNotFoundError } from "../errors.js";
import { AnthropicAdapter } from "./anthropic.js";
import { OpenAIAdapter } from "./openai.js";
import { GeminiAdapter } from "./gemini.js";

export type AdapterFactory = () => ToolAdapter;

/** Free-form descriptive data kept beside a registration (version, vendor, ...). */
export type AdapterMetadata = Readonly<Record<string, unknown>>;

export interface AdapterRegisterOptions {
  /** Build the adapter once and reuse it (default true). */
  cache?: boolean;
  metadata?: AdapterMetadata;
}

interface Registration {
  factory: AdapterFactory;
  cache: boolean;
  metadata: AdapterMetadata;
}

/** Resolves provider names to ToolAdapters. Cached registrations build their adapter once. */
export class AdapterRegistry {
  private registrations = new Map<string, Registration>();
  private instances = new Map<string, ToolAdapter>();

  register(provider: string, factory: AdapterFactory, options: AdapterRegisterOptions = {}): this {
    const key = provider.toLowerCase();
    this.registrations.set(key, {
      factory,
      cache: options.cache ?? true,
      metadata: Object.freeze({ ...(options.metadata ?? {}) }),
    });
    this.instances.delete(key);
    return this;
  }

  unregister(provider: string): boolean {
    const key = provider.toLowerCase();
    this.instances.delete(key);
    return this.registrations.delete(key);
  }

  get(provider: string): ToolAdapter {
    const key = provider.toLowerCase();
    const registration = this.registrations.get(key);
    if (!registration) throw new AdapterNotFoundError(provider, this.names());
    if (!registration.cache) return registration.factory();
    let adapter = this.instances.get(key);
    if (!adapter) {
      adapter = registration.factory();
      this.instances.set(key, adapter);
    }
    return adapter;
  }

  /** Returns the first registered name in `providers` with its adapter. */
  getWithFallback(providers: readonly string[]): [string, ToolAdapter] {
    const found = providers.find((p) => this.has(p));
    if (found === undefined) throw new AdapterNotFoundError(providers, this.names());
    return [found, this.get(found)];
  }

  metadata(provider: string): AdapterMetadata {
    const registration = this.registrations.get(provider.toLowerCase());
    if (!registration) throw new AdapterNotFoundError(provider, this.names());
    return registration.metadata;
  }

  has(provider: string): boolean {
    return this.registrations.has(provider.toLowerCase());
  }

  names(): string[] {
    return [...this.registrations.keys()];
  }

  clearCache(): void {
    this.instances.clear();
  }
}

export function createDefaultAdapterRegistry(): AdapterRegistry {
  return new AdapterRegistry()
    .register("anthropic", () => new AnthropicAdapter())
    .register("openai", () => new OpenAIAdapter())
    .register("gemini", () => new GeminiAdapter());
}
