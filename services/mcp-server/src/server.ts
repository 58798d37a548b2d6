import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { ServerConfig } from "./config.js";
import {
  handleIrr,
  handleNpv,
  handleRun,
  handleXirr,
  handleXnpv,
  irrInputShape,
  npvInputShape,
  runInputShape,
  xirrInputShape,
  xnpvInputShape,
} from "./tools.js";

const READ_ONLY = {
  readOnlyHint: true,
  destructiveHint: false,
  openWorldHint: false,
  idempotentHint: true,
};

export const SERVER_NAME = "ratekit-mcp";
export const SERVER_VERSION = "0.1.0";

export function createRateServer(config: ServerConfig): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    "rates.irr",
    {
      title: "Internal Rate of Return",
      description:
        "Solve the per-period rate that zeroes the NPV of evenly spaced cash flows. Returns irr = null with converged = false when no root is found within the iteration bound.",
      inputSchema: irrInputShape,
      annotations: READ_ONLY,
    },
    async (args) => handleIrr(args, config),
  );

  server.registerTool(
    "rates.xirr",
    {
      title: "Extended Internal Rate of Return",
      description:
        "Solve the annual rate that zeroes the NPV of dated cash flows (Actual/365 from the earliest date). Dates need not be sorted.",
      inputSchema: xirrInputShape,
      annotations: READ_ONLY,
    },
    async (args) => handleXirr(args, config),
  );

  server.registerTool(
    "rates.npv",
    {
      title: "Net Present Value",
      description: "Discount evenly spaced cash flows at a per-period rate; the first flow is not discounted.",
      inputSchema: npvInputShape,
      annotations: READ_ONLY,
    },
    async (args) => handleNpv(args),
  );

  server.registerTool(
    "rates.xnpv",
    {
      title: "Net Present Value (dated)",
      description: "Discount dated cash flows at an annual rate using Actual/365 year fractions.",
      inputSchema: xnpvInputShape,
      annotations: READ_ONLY,
    },
    async (args) => handleXnpv(args),
  );

  server.registerTool(
    "rates.run",
    {
      title: "Run Rate Calculations",
      description:
        "Evaluate a RATE_V1 request: a batch of irr, xirr, npv, xnpv, mirr, fv, pv, pmt, nper, ipmt, ppmt and amortization calculations.",
      inputSchema: runInputShape,
      annotations: READ_ONLY,
    },
    async (args) => handleRun(args, config),
  );

  return server;
}
