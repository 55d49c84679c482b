import type { z } from "zod";
import type { AICapability, UIHandle } from "../types/contracts.js";
import { ContextKeyMissingError, ContextTypeError } from "../errors.js";
import { KNOWN_KEYS, type KnownKey, type KnownShapes } from "./keys.js";

export interface ContextInit {
  data?: Record<string, unknown>;
  ai?: AICapability;
  ui?: UIHandle;
  signal?: AbortSignal;
}

/**
 * Per-run state threaded through every step and the agent loop.
 * Built once per run, never shared between concurrent runs.
 */
export class WorkflowContext {
  readonly data: Record<string, unknown>;
  readonly ai?: AICapability;
  readonly ui?: UIHandle;
  /** Cancellation for long-running step work; `runWorkflow` sets it from its own signal. */
  signal?: AbortSignal;

  constructor(init: ContextInit = {}) {
    this.data = { ...(init.data ?? {}) };
    this.ai = init.ai;
    this.ui = init.ui;
    this.signal = init.signal;
  }

  get(key: string): unknown {
    return this.data[key];
  }

  set(key: string, value: unknown): void {
    this.data[key] = value;
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.data, key) && this.data[key] !== undefined;
  }

  /** Shallow merge; incoming keys overwrite existing ones. */
  merge(values: Readonly<Record<string, unknown>>): void {
    Object.assign(this.data, values);
  }

  /** Reads a well-known key, validating its type. Absent keys yield `undefined`. */
  read<K extends KnownKey>(key: K): KnownShapes[K] | undefined {
    return this.readAs(key, KNOWN_KEYS[key]);
  }

  require<K extends KnownKey>(key: K): KnownShapes[K] {
    const value = this.read(key);
    if (value === undefined) throw new ContextKeyMissingError(key);
    return value;
  }

  /** Reads any key against a caller-supplied schema. */
  readAs<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
    if (!this.has(key)) return undefined;
    const parsed = schema.safeParse(this.data[key]);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
      throw new ContextTypeError(key, detail);
    }
    return parsed.data;
  }
}
