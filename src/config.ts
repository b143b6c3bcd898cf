import * as v from "valibot";
import type { LogLevel } from "./logging";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const envSchema = v.object({
  LOG_LEVEL: v.optional(v.picklist(LOG_LEVELS), "info"),
  LOG_PRETTY: v.optional(
    v.pipe(
      v.picklist(["true", "false", "1", "0"]),
      v.transform((s) => s === "true" || s === "1"),
    ),
    "false",
  ),
  MAX_PROOF_DEPTH: v.optional(
    v.pipe(
      v.string(),
      v.regex(/^\d+$/, "MAX_PROOF_DEPTH must be a non-negative integer"),
      v.transform(Number),
      v.minValue(1),
      v.maxValue(256),
    ),
    "64",
  ),
});

export type GatewayConfig = {
  logLevel: LogLevel;
  logPretty: boolean;
  maxProofDepth: number;
};

export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): GatewayConfig => {
  const parsed = v.parse(envSchema, {
    LOG_LEVEL: env.LOG_LEVEL,
    LOG_PRETTY: env.LOG_PRETTY,
    MAX_PROOF_DEPTH: env.MAX_PROOF_DEPTH,
  });
  return {
    logLevel: parsed.LOG_LEVEL,
    logPretty: parsed.LOG_PRETTY,
    maxProofDepth: parsed.MAX_PROOF_DEPTH,
  };
};
