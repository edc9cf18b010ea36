import { z } from "zod";
import { LOG_LEVELS } from "../logging/logger.js";

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

export const connectorConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  available: z.boolean().default(true),
});

export const configSchema = z.object({
  server: z
    .object({
      host: z.string().min(1).default("localhost"),
      port: z.number().int().min(0).max(65535).default(8080),
      sseKeepAliveMs: nonNegativeInt.default(30_000),
    })
    .default({}),
  process: z
    .object({
      defaultTimeoutMs: positiveInt.default(30 * 60 * 1000),
      maxConcurrent: positiveInt.default(10),
      cleanupIntervalMs: positiveInt.default(5 * 60 * 1000),
      bufferSize: positiveInt.default(8192),
      subscriberBufferSize: positiveInt.default(100),
      resultCacheTtlMs: positiveInt.default(10 * 60 * 1000),
      resourceSampleMs: nonNegativeInt.default(5_000),
    })
    .default({}),
  connectors: z
    .object({
      claude: connectorConfigSchema.default({
        command: "claude",
        args: ["--output-format", "stream-json", "--verbose"],
      }),
      gemini: connectorConfigSchema.default({
        command: "gemini",
        available: false,
      }),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default("info"),
      format: z.enum(["text", "json"]).default("text"),
    })
    .default({}),
});

export type RunnerConfig = z.infer<typeof configSchema>;
export type ConnectorConfig = z.infer<typeof connectorConfigSchema>;
