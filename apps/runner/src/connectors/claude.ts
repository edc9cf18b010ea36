import type { ConnectorConfig } from "../config/index.js";
import type { ParsedLine } from "../jobs/types.js";
import { classifyJson, isJsonObject, parseJsonLine } from "./json-lines.js";
import type { Connector, ConnectorCommand } from "./types.js";

/**
 * Claude CLI in print mode. Expects `--output-format stream-json`, one JSON
 * object per line; anything else, including JSON arrays and scalars, is dropped.
 */
export class ClaudeConnector implements Connector {
  constructor(private readonly config: ConnectorConfig) {}

  name(): string {
    return "claude";
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
    const value = parseJsonLine(trimmed);
    if (value === undefined || !isJsonObject(value)) return null;
    return classifyJson(value);
  }
}
