import { z } from "zod";

import { DEFAULT_GUESS, DEFAULT_TOLERANCE, ITERATION_MODES } from "@ratekit/rate-engine";
import type { IterationMode } from "@ratekit/rate-engine";

// CONTRACTS_DIR is read by the engine itself when it loads the request schema.
const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  MCP_PATH: z.string().startsWith("/").default("/mcp"),
  RATE_ITERATION_MODE: z.enum(ITERATION_MODES).default("early-exit"),
  RATE_DEFAULT_GUESS: z.coerce.number().finite().default(DEFAULT_GUESS),
  RATE_DEFAULT_TOLERANCE: z.coerce.number().positive().default(DEFAULT_TOLERANCE),
});

export interface ServerConfig {
  port: number;
  mcpPath: string;
  iterationMode: IterationMode;
  defaultGuess: number;
  defaultTolerance: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid server configuration: ${issues.join("; ")}`);
  }

  return {
    port: parsed.data.PORT,
    mcpPath: parsed.data.MCP_PATH,
    iterationMode: parsed.data.RATE_ITERATION_MODE,
    defaultGuess: parsed.data.RATE_DEFAULT_GUESS,
    defaultTolerance: parsed.data.RATE_DEFAULT_TOLERANCE,
  };
}
