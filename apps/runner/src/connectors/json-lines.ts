import type { JsonValue, ParsedLine } from "../jobs/types.js";

export function parseJsonLine(line: string): JsonValue | undefined {
  try {
    const value: JsonValue = JSON.parse(line);
    return value;
  } catch {
    return undefined;
  }
}

export function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** `{"type": "result", ...}` is the final answer; any other JSON is progress output. */
export function classifyJson(value: JsonValue): ParsedLine {
  const isResult = isJsonObject(value) && value.type === "result";
  return { kind: isResult ? "result" : "output", payload: value };
}
