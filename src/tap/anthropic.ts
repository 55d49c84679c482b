import type { Tool } from "../types/tools.js";
import { BaseToolAdapter, type JsonObjectSchema } from "./adapter.js";

export interface AnthropicToolSchema {
  name: string;
  description: string;
  input_schema: JsonObjectSchema;
}

/** Messages API `tools` entries. */
export class AnthropicAdapter extends BaseToolAdapter<AnthropicToolSchema> {
  readonly provider = "anthropic";

  convertTool(tool: Tool): AnthropicToolSchema {
    return {
      name: tool.name,
      description: tool.description,
      input_schema: this.jsonObjectSchema(tool),
    };
  }
}
