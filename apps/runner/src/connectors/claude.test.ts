import { describe, expect, it } from "vitest";
import { ClaudeConnector } from "./claude.js";

const connector = new ClaudeConnector({
  command: "/usr/local/bin/claude",
  args: ["--output-format", "stream-json", "--verbose"],
  available: true,
});

describe("ClaudeConnector", () => {
  it("passes the prompt after the configured args", () => {
    expect(connector.buildCommand("summarize README.md")).toEqual({
      executable: "/usr/local/bin/claude",
      args: ["--output-format", "stream-json", "--verbose", "-p", "summarize README.md"],
    });
  });

  it("classifies a result object as a result event", () => {
    expect(connector.parseLine('{"type":"result","subtype":"success","result":"4"}')).toEqual({
      kind: "result",
      payload: { type: "result", subtype: "success", result: "4" },
    });
  });

  it("classifies any other JSON as output", () => {
    expect(connector.parseLine('  {"type":"assistant","message":{"content":[]}}  ')).toEqual({
      kind: "output",
      payload: { type: "assistant", message: { content: [] } },
    });
  });

  it.each(["", "   ", "not json", "{broken", "[1,2]", "42", '"text"', "null"])("ignores %j", (line) => {
    expect(connector.parseLine(line)).toBeNull();
  });

  it("reports availability from its configuration", () => {
    const disabled = new ClaudeConnector({ command: "claude", args: [], available: false });

    expect(connector.isAvailable()).toBe(true);
    expect(disabled.isAvailable()).toBe(false);
    expect(disabled.name()).toBe("claude");
  });
});
