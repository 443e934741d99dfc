import { ZodError } from "zod";
import { errorSubject, isEngineError } from "@esg-credit/engine";

/** Keys whose string values are identifiers or periods, never numbers. */
const PRESERVED_KEYS = new Set(["name", "id", "supplierId", "period", "as_of_period", "industry", "sizeClass", "location"]);

/**
 * Recursively coerce string values that look like numbers into actual numbers.
 * The MCP SDK sometimes passes numeric arguments as strings. Identifier fields
 * keep their string form (a supplier id of "007" stays "007").
 */
export function coerceNumbers(obj: unknown, key?: string): unknown {
  if (typeof obj === "string") {
    if (key !== undefined && PRESERVED_KEYS.has(key)) return obj;
    if (obj === "" || obj === "true" || obj === "false" || obj === "null") return obj;
    const n = Number(obj);
    if (!isNaN(n) && obj.trim() !== "") return n;
    return obj;
  }
  if (Array.isArray(obj)) return obj.map(item => coerceNumbers(item, key));
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      result[k] = coerceNumbers(v, k);
    }
    return result;
  }
  return obj;
}

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

function describeError(err: Error): Record<string, unknown> {
  if (isEngineError(err)) {
    return { error: err.message, type: err.name, subject: errorSubject(err) };
  }
  if (err instanceof ZodError) {
    const issue = err.issues[0];
    const field = issue.path.join(".");
    return { error: field ? `${field}: ${issue.message}` : issue.message, type: "ValidationError", subject: field || "input" };
  }
  return { error: err.message, type: err.name };
}

export function wrapResponse(result: unknown): ToolResponse {
  if (result instanceof Error) {
    return {
      content: [{ type: "text" as const, text: JSON.stringify(describeError(result)) }],
      isError: true,
    };
  }
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, jsonReplacer, 2) }],
  };
}

/** Run a tool body; thrown errors become isError responses. */
export async function runTool(body: () => unknown): Promise<ToolResponse> {
  try {
    return wrapResponse(await body());
  } catch (err) {
    return wrapResponse(err instanceof Error ? err : new Error(String(err)));
  }
}

// NaN marks a missing rolling window; JSON has no NaN, so it goes out as null.
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "number" && !Number.isFinite(value) ? null : value;
}
