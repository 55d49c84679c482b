import { z } from "zod";

const StepIdSchema = z
  .string()
  .min(1, "step id must not be empty")
  .regex(/^[A-Za-z0-9_.-]+$/, "step id may only contain letters, digits, '_', '.' and '-'");

export const WorkflowStepSchema = z
  .object({
    id: StepIdSchema,
    ref: z.string().min(1, "step ref must not be empty"),
    optional: z.boolean().optional(),
    with: z.record(z.unknown()).default({}),
  })
  .strict();

export const WorkflowSourceSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().default(""),
    params: z.record(z.unknown()).default({}),
    steps: z.array(WorkflowStepSchema).default([]),
  })
  .strict();

export type WorkflowStepSource = z.infer<typeof WorkflowStepSchema>;
export type WorkflowSource = z.infer<typeof WorkflowSourceSchema>;
/** What authors write; defaults not yet applied. */
export type WorkflowSourceInput = z.input<typeof WorkflowSourceSchema>;
