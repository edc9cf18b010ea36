import type { ConnectorConfig } from "../config/index.js";
import type { ParsedLine } from "../jobs/types.js";
import { classifyJson, parseJsonLine } from "./json-lines.js";
import type { Connector, ConnectorCommand } from "./types.js";

// Gemini prints plain text unless asked for JSON; both are accepted.
export class GeminiConnector implements Connector {
  constructor(private readonly config: ConnectorConfig) {}

  name(): string {
    return "gemini";
  }

  isAvailable(): boolean {
    return this.config.available;
  }

  buildCommand(prompt: string): ConnectorCommand {
    return { executable: this.config.command, args: [...this.config.args, "-p", prompt] };
  }

  parseLine(line: string): ParsedLine | null {
    const trimmed = line.trim();
    if (!trimmed) return null;
    const value = trimmed.startsWith("{") ? parseJsonLine(trimmed) : undefined;
    if (value !== undefined) return classifyJson(value);
    return { kind: "output", payload: { text: line } };
  }
}
