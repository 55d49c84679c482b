import type { StepEntry, WorkflowDefinition } from "../types/contracts.js";
import type { RegisteredStep, StepRegistry } from "./registry.js";
import { WorkflowDefinitionError, StepNotFoundError, errorMessage } from "../errors.js";
import { parseWorkflowSource } from "../workflow/loader.js";
import type { WorkflowSourceInput } from "../workflow/schema.js";

function cloneParams(params: Record<string, unknown>, where: string): Record<string, unknown> {
  try {
    return structuredClone(params);
  } catch (e) {
    throw new WorkflowDefinitionError(`${where} must be plain data: ${errorMessage(e)}`, e);
  }
}

function resolveRef(registry: StepRegistry, stepId: string, ref: string): RegisteredStep {
  try {
    return registry.resolve(ref);
  } catch (e) {
    if (e instanceof StepNotFoundError) {
      throw new WorkflowDefinitionError(`Step "${stepId}" references unknown step "${ref}"`, e);
    }
    throw e;
  }
}

/**
 * Turns a workflow document into an executable, immutable definition:
 * validates the shape, rejects duplicate step ids and resolves every ref
 * against the registry.
 */
export function compileWorkflow(source: WorkflowSourceInput, registry: StepRegistry): WorkflowDefinition {
  const draft = parseWorkflowSource(source, `workflow "${source.name || "(unnamed)"}"`);

  const seen = new Set<string>();
  const steps: StepEntry[] = [];
  for (const step of draft.steps) {
    if (seen.has(step.id)) {
      throw new WorkflowDefinitionError(`Duplicate step id "${step.id}" in workflow "${draft.name}"`);
    }
    seen.add(step.id);

    const registered = resolveRef(registry, step.id, step.ref);

    steps.push(
      Object.freeze({
        id: step.id,
        ref: registered.ref,
        fn: registered.fn,
        optional: step.optional ?? !registered.required,
        with: Object.freeze(cloneParams(step.with, `"with" of step "${step.id}"`)),
      }),
    );
  }

  return Object.freeze({
    name: draft.name,
    description: draft.description,
    params: Object.freeze(cloneParams(draft.params, `params of workflow "${draft.name}"`)),
    steps: Object.freeze(steps),
  });
}

export interface InlineStep {
  id: string;
  fn: StepEntry["fn"];
  optional?: boolean;
  with?: Record<string, unknown>;
}

export interface InlineWorkflow {
  name: string;
  description?: string;
  params?: Record<string, unknown>;
  steps: InlineStep[];
}

/** Builds a definition from step functions directly, without a registry. */
export function defineWorkflow(spec: InlineWorkflow): WorkflowDefinition {
  const seen = new Set<string>();
  const steps = spec.steps.map((step): StepEntry => {
    if (!step.id) throw new WorkflowDefinitionError(`Workflow "${spec.name}" has a step without an id`);
    if (seen.has(step.id)) {
      throw new WorkflowDefinitionError(`Duplicate step id "${step.id}" in workflow "${spec.name}"`);
    }
    seen.add(step.id);
    return Object.freeze({
      id: step.id,
      ref: `inline.${step.id}`,
      fn: step.fn,
      optional: step.optional ?? false,
      with: Object.freeze(cloneParams(step.with ?? {}, `"with" of step "${step.id}"`)),
    });
  });
  return Object.freeze({
    name: spec.name,
    description: spec.description ?? "",
    params: Object.freeze(cloneParams(spec.params ?? {}, `params of workflow "${spec.name}"`)),
    steps: Object.freeze(steps),
  });
}
