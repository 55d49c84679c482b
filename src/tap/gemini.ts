import type { CanonicalParameterType, Tool } from "../types/tools.js";
import { UnsupportedParameterTypeError } from "../errors.js";
import { BaseToolAdapter } from "./adapter.js";

type GeminiScalar = "STRING" | "INTEGER" | "NUMBER" | "BOOLEAN";
export type GeminiType = GeminiScalar | "ARRAY" | "OBJECT";

export interface GeminiProperty {
  type: GeminiType;
  description: string;
  items?: { type: GeminiScalar };
}

export interface GeminiFunctionDeclaration {
  name: string;
  description: string;
  parameters: {
    type: "OBJECT";
    properties: Record<string, GeminiProperty>;
    required: string[];
  };
}

const SCALARS: Partial<Record<CanonicalParameterType, GeminiScalar>> = {
  string: "STRING",
  integer: "INTEGER",
  number: "NUMBER",
  boolean: "BOOLEAN",
};

/**
 * Gemini `functionDeclarations` use the OpenAPI subset with upper-case type
 * names. Free-form objects and arrays without an element type have no
 * equivalent there.
 */
export class GeminiAdapter extends BaseToolAdapter<GeminiFunctionDeclaration> {
  readonly provider = "gemini";

  convertTool(tool: Tool): GeminiFunctionDeclaration {
    const properties: Record<string, GeminiProperty> = {};
    for (const [name, param] of Object.entries(tool.parameters)) {
      const type = this.canonicalType(tool, name, param.type);
      if (type === "array") {
        const itemType = param.items ? SCALARS[this.canonicalType(tool, `${name}[]`, param.items)] : undefined;
        if (!itemType) throw new UnsupportedParameterTypeError(this.provider, tool.name, name, `array<${param.items ?? "?"}>`);
        properties[name] = { type: "ARRAY", description: param.description, items: { type: itemType } };
        continue;
      }
      const scalar = SCALARS[type];
      if (!scalar) throw new UnsupportedParameterTypeError(this.provider, tool.name, name, param.type);
      properties[name] = { type: scalar, description: param.description };
    }
    return {
      name: tool.name,
      description: tool.description,
      parameters: { type: "OBJECT", properties, required: this.requiredNames(tool) },
    };
  }
}
