export type CanonicalParameterType = "string" | "integer" | "number" | "boolean" | "array" | "object";

export interface ToolParameter {
  /** One of the canonical types, or an alias such as `str`, `int`, `float`, `bool`, `list`, `dict`. */
  type: string;
  description: string;
  required: boolean;
  /** Element type for `array` parameters. */
  items?: string;
}

export interface ToolSpec {
  name: string;
  description: string;
  parameters: Record<string, ToolParameter>;
}

export interface Tool extends ToolSpec {
  execute(args: Record<string, unknown>): Promise<unknown>;
}

export interface ToolCallRecord {
  readonly toolName: string;
  readonly input: Readonly<Record<string, unknown>>;
  readonly output?: unknown;
  readonly error?: string;
  readonly iterationIndex: number;
}
