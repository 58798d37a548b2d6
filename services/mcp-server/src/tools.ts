import { z } from "zod";

import { RateEngineRuntime, irr, isInvalidInputError, npv, xirr, xnpv } from "@ratekit/rate-engine";

import type { ServerConfig } from "./config.js";
import { log } from "./logger.js";

const cashflows = z.array(z.number()).min(1).describe("Cash flow amounts; negative = outflow, positive = inflow");
const dates = z.array(z.string().min(1)).min(1).describe("ISO dates (YYYY-MM-DD), one per cash flow");

// Tool input schemas (Zod raw shapes for McpServer.registerTool)
export const irrInputShape = {
  cashflows: cashflows.describe("Evenly spaced cash flows; index 0 is now"),
  guess: z.number().optional().describe("Starting rate estimate"),
  tol: z.number().positive().optional().describe("Convergence tolerance on the NPV residual"),
};

export const xirrInputShape = {
  cashflows,
  dates,
  guess: z.number().optional().describe("Starting rate estimate"),
  tol: z.number().positive().optional().describe("Convergence tolerance on the XNPV residual"),
};

export const npvInputShape = {
  rate: z.number().describe("Discount rate per period"),
  cashflows,
};

export const xnpvInputShape = {
  rate: z.number().describe("Annual discount rate"),
  cashflows,
  dates,
};

export const runInputShape = {
  request: z.record(z.unknown()).describe("A RATE_V1 request: { contract, options?, calculations }"),
};

const irrArgs = z.object(irrInputShape);
const xirrArgs = z.object(xirrInputShape);
const npvArgs = z.object(npvInputShape);
const xnpvArgs = z.object(xnpvInputShape);
const runArgs = z.object(runInputShape);

export type IrrArgs = z.infer<typeof irrArgs>;
export type XirrArgs = z.infer<typeof xirrArgs>;
export type NpvArgs = z.infer<typeof npvArgs>;
export type XnpvArgs = z.infer<typeof xnpvArgs>;
export type RunArgs = z.infer<typeof runArgs>;

export type ToolResponse = {
  content: { type: "text"; text: string }[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
};

function buildToolResponse(payload: Record<string, unknown>): ToolResponse {
  return {
    content: [{ type: "text", text: JSON.stringify(payload) }],
    structuredContent: payload,
  };
}

function buildErrorResponse(path: string, message: string): ToolResponse {
  const payload = { status: "invalid", error: { path, message } };
  return {
    content: [{ type: "text", text: JSON.stringify(payload) }],
    structuredContent: payload,
    isError: true,
  };
}

function runTool(tool: string, compute: () => Record<string, unknown>): ToolResponse {
  try {
    return buildToolResponse(compute());
  } catch (error) {
    if (isInvalidInputError(error)) {
      log.warn("Rejected tool input", { tool, path: error.path, message: error.message });
      return buildErrorResponse(error.path, error.message);
    }
    log.error("Tool failed", { tool, error: String(error) });
    throw error;
  }
}

function warnIfNotConverged(tool: string, converged: boolean, iterations: number): void {
  if (!converged) {
    log.warn("Rate solve did not converge", { tool, iterations });
  }
}

export function handleIrr(args: IrrArgs, config: ServerConfig): ToolResponse {
  return runTool("rates.irr", () => {
    const result = irr(
      args.cashflows,
      args.guess ?? config.defaultGuess,
      args.tol ?? config.defaultTolerance,
      { mode: config.iterationMode },
    );
    warnIfNotConverged("rates.irr", result.converged, result.iterations);
    return { ...result };
  });
}

export function handleXirr(args: XirrArgs, config: ServerConfig): ToolResponse {
  return runTool("rates.xirr", () => {
    const result = xirr(
      args.cashflows,
      args.dates,
      args.guess ?? config.defaultGuess,
      args.tol ?? config.defaultTolerance,
      { mode: config.iterationMode },
    );
    warnIfNotConverged("rates.xirr", result.converged, result.iterations);
    return { ...result };
  });
}

export function handleNpv(args: NpvArgs): ToolResponse {
  return runTool("rates.npv", () => ({ npv: npv(args.rate, args.cashflows) }));
}

export function handleXnpv(args: XnpvArgs): ToolResponse {
  return runTool("rates.xnpv", () => ({ xnpv: xnpv(args.rate, args.cashflows, args.dates) }));
}

const requestOptions = z.record(z.unknown());

// Options that are not an object are left for contract validation to reject
function withServerMode(request: RunArgs["request"], config: ServerConfig): Record<string, unknown> {
  if (request.options === undefined) {
    return { ...request, options: { iteration_mode: config.iterationMode } };
  }
  const options = requestOptions.safeParse(request.options);
  if (!options.success) {
    return request;
  }
  return { ...request, options: { iteration_mode: config.iterationMode, ...options.data } };
}

// Full RATE_V1 batch; the server's iteration mode applies unless the request sets one
export function handleRun(args: RunArgs, config: ServerConfig): ToolResponse {
  return runTool("rates.run", () => {
    const request = withServerMode(args.request, config);
    const result = new RateEngineRuntime(request).run();

    if (!result.validation.valid) {
      log.warn("Rejected rate request", { errors: result.validation.errors });
    }
    for (const warning of result.warnings) {
      log.warn(warning);
    }

    return { status: result.validation.valid ? "ok" : "invalid", ...result };
  });
}
