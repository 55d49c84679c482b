import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";
import { WorkflowDefinitionError, errorMessage } from "../errors.js";
import { WorkflowSourceSchema, type WorkflowSource } from "./schema.js";

export type SourceFormat = "yaml" | "json";

/** Validates an already-parsed workflow document. */
export function parseWorkflowSource(raw: unknown, origin = "workflow"): WorkflowSource {
  const parsed = WorkflowSourceSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new WorkflowDefinitionError(`Invalid ${origin}:\n  - ${issues.join("\n  - ")}`, parsed.error);
  }
  return parsed.data;
}

/** JSON is a subset of YAML, but JSON input gets JSON.parse for sharper errors. */
export function parseWorkflowText(text: string, format: SourceFormat = "yaml", origin = "workflow"): WorkflowSource {
  let raw: unknown;
  try {
    raw = format === "json" ? JSON.parse(text) : parseYaml(text);
  } catch (e) {
    throw new WorkflowDefinitionError(`Failed to parse ${origin}: ${errorMessage(e)}`, e);
  }
  return parseWorkflowSource(raw, origin);
}

export async function loadWorkflowFile(path: string): Promise<WorkflowSource> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    throw new WorkflowDefinitionError(`Failed to read workflow file ${path}: ${errorMessage(e)}`, e);
  }
  const format: SourceFormat = extname(path).toLowerCase() === ".json" ? "json" : "yaml";
  return parseWorkflowText(text, format, path);
}
