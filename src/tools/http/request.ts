import { defineTool } from "../define.js";
import { errorMessage } from "../../errors.js";

// Headers travel as JSON text: not every provider can declare a free-form object parameter.
function toHeaders(value: unknown): Record<string, string> {
  const headers: Record<string, string> = {};
  if (typeof value !== "string" || !value.trim()) return headers;
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (e) {
    throw new Error(`headers must be a JSON object: ${errorMessage(e)}`);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error("headers must be a JSON object");
  }
  for (const [k, v] of Object.entries(parsed)) headers[k] = String(v);
  return headers;
}

export const httpRequest = defineTool(
  {
    name: "http_request",
    description: "Perform an HTTP request and return status, headers and body text.",
    parameters: {
      url: { type: "string", description: "Absolute URL", required: true },
      method: { type: "string", description: "HTTP method (default GET)", required: false },
      headers: {
        type: "string",
        description: 'Request headers as a JSON object, e.g. {"accept":"application/json"}',
        required: false,
      },
      body: { type: "string", description: "Request body text", required: false },
    },
  },
  async (args) => {
    const url = String(args.url);
    const method = typeof args.method === "string" ? args.method.toUpperCase() : "GET";
    const headers = toHeaders(args.headers);
    const body = typeof args.body === "string" ? args.body : undefined;
    const res = await fetch(url, { method, headers, body });
    const text = await res.text();
    const hdrs: Record<string, string> = {};
    res.headers.forEach((v, k) => {
      hdrs[k] = v;
    });
    return { status: res.status, ok: res.ok, headers: hdrs, body: text };
  },
);
