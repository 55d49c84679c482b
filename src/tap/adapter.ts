import type { CanonicalParameterType, Tool, ToolParameter } from "../types/tools.js";
import { ToolNotFoundError, UnsupportedParameterTypeError } from "../errors.js";
import { normalizeParameterType } from "../tools/define.js";

/**
 * Translates Tools into one provider family's function-declaration format
 * and dispatches the calls that provider issues back onto the Tools.
 */
export interface ToolAdapter<TSchema = unknown> {
  readonly provider: string;
  convertTool(tool: Tool): TSchema;
  convertTools(tools: readonly Tool[]): TSchema[];
  executeTool(name: string, input: Record<string, unknown>, availableTools: readonly Tool[]): Promise<unknown>;
}

export interface JsonSchemaProperty {
  type: CanonicalParameterType;
  description: string;
  items?: { type: CanonicalParameterType } | Record<string, never>;
}

export interface JsonObjectSchema {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

export abstract class BaseToolAdapter<TSchema> implements ToolAdapter<TSchema> {
  abstract readonly provider: string;

  abstract convertTool(tool: Tool): TSchema;

  convertTools(tools: readonly Tool[]): TSchema[] {
    return tools.map((tool) => this.convertTool(tool));
  }

  /** Exact, case-sensitive lookup. ToolExecutionError from the tool propagates as is. */
  async executeTool(name: string, input: Record<string, unknown>, availableTools: readonly Tool[]): Promise<unknown> {
    const tool = availableTools.find((t) => t.name === name);
    if (!tool) throw new ToolNotFoundError(name, availableTools.map((t) => t.name));
    return tool.execute(input);
  }

  protected canonicalType(tool: Tool, name: string, type: string): CanonicalParameterType {
    const canonical = normalizeParameterType(type);
    if (!canonical) throw new UnsupportedParameterTypeError(this.provider, tool.name, name, type);
    return canonical;
  }

  protected requiredNames(tool: Tool): string[] {
    return Object.entries(tool.parameters)
      .filter(([, p]) => p.required)
      .map(([name]) => name);
  }

  /** JSON Schema `object` describing a tool's parameters, shared by the JSON-Schema-based providers. */
  protected jsonObjectSchema(tool: Tool): JsonObjectSchema {
    const properties: Record<string, JsonSchemaProperty> = {};
    for (const [name, param] of Object.entries(tool.parameters)) {
      properties[name] = this.jsonProperty(tool, name, param);
    }
    return { type: "object", properties, required: this.requiredNames(tool) };
  }

  private jsonProperty(tool: Tool, name: string, param: ToolParameter): JsonSchemaProperty {
    const type = this.canonicalType(tool, name, param.type);
    const property: JsonSchemaProperty = { type, description: param.description };
    if (type === "array") {
      property.items = param.items ? { type: this.canonicalType(tool, `${name}[]`, param.items) } : {};
    }
    return property;
  }
}
