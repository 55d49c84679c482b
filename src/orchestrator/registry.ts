import type { StepFn } from "../types/contracts.js";
import { StepNotFoundError } from "../errors.js";

export interface RegisterOptions {
  /**
   * Default for entries that reference this step without saying otherwise.
   * `false` makes such entries optional. Defaults to `true`.
   */
  required?: boolean;
  description?: string;
}

export interface RegisteredStep {
  readonly ref: string;
  readonly fn: StepFn;
  readonly required: boolean;
  readonly description?: string;
}

/** Static `(namespace, stepId) -> Step` table, filled at startup. */
export class StepRegistry {
  private steps = new Map<string, RegisteredStep>();

  static refOf(namespace: string, stepId: string): string {
    return `${namespace}.${stepId}`;
  }

  register(namespace: string, stepId: string, fn: StepFn, options: RegisterOptions = {}): this {
    if (!namespace || namespace.includes(".")) throw new Error(`Invalid step namespace "${namespace}"`);
    if (!stepId) throw new Error(`Missing step id in namespace "${namespace}"`);
    const ref = StepRegistry.refOf(namespace, stepId);
    if (this.steps.has(ref)) throw new Error(`Step "${ref}" is already registered`);
    this.steps.set(ref, Object.freeze({ ref, fn, required: options.required ?? true, description: options.description }));
    return this;
  }

  /** Accepts `namespace.stepId`; the step id itself may contain dots. */
  resolve(ref: string): RegisteredStep {
    const found = this.steps.get(ref);
    if (!found) throw new StepNotFoundError(ref);
    return found;
  }

  has(ref: string): boolean {
    return this.steps.has(ref);
  }

  refs(): string[] {
    return [...this.steps.keys()];
  }

  get size(): number {
    return this.steps.size;
  }
}
