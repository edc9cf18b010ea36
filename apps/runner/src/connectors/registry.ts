import type { RunnerConfig } from "../config/index.js";
import { ConnectorNotFoundError, ConnectorUnavailableError } from "../errors.js";
import { ClaudeConnector } from "./claude.js";
import { GeminiConnector } from "./gemini.js";
import type { Connector } from "./types.js";

export class ConnectorRegistry {
  private connectors = new Map<string, Connector>();

  register(connector: Connector): void {
    this.connectors.set(connector.name(), connector);
  }

  /** Returns an available connector or throws. */
  get(name: string): Connector {
    const connector = this.connectors.get(name);
    if (!connector) throw new ConnectorNotFoundError(name);
    if (!connector.isAvailable()) throw new ConnectorUnavailableError(name);
    return connector;
  }

  names(): string[] {
    return [...this.connectors.keys()];
  }

  available(): string[] {
    return [...this.connectors.values()].filter((c) => c.isAvailable()).map((c) => c.name());
  }

  static fromConfig(config: RunnerConfig): ConnectorRegistry {
    const registry = new ConnectorRegistry();
    registry.register(new ClaudeConnector(config.connectors.claude));
    registry.register(new GeminiConnector(config.connectors.gemini));
    return registry;
  }
}
