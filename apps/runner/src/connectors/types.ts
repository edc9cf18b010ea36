import type { ParsedLine } from "../jobs/types.js";

export interface ConnectorCommand {
  executable: string;
  args: string[];
}

/**
 * Strategy for one external CLI: how to invoke it and how to read its output.
 * `parseLine` returns null for lines that carry no event and must not throw
 * on malformed input.
 */
export interface Connector {
  name(): string;
  isAvailable(): boolean;
  buildCommand(prompt: string): ConnectorCommand;
  parseLine(line: string): ParsedLine | null;
}
