import type { Tool } from "../types/tools.js";
import { BaseToolAdapter, type JsonObjectSchema } from "./adapter.js";

export interface OpenAIToolSchema {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: JsonObjectSchema;
  };
}

/** Chat Completions function tools. */
export class OpenAIAdapter extends BaseToolAdapter<OpenAIToolSchema> {
  readonly provider = "openai";

  convertTool(tool: Tool): OpenAIToolSchema {
    return {
      type: "function",
      function: {
        name: tool.name,
        description: tool.description,
        parameters: this.jsonObjectSchema(tool),
      },
    };
  }
}
