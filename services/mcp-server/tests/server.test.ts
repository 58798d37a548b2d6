import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { loadConfig } from "../src/config.js";
import { createRateServer } from "../src/server.js";

describe("rate MCP server", () => {
  let client: Client;
  let close: () => Promise<void>;

  beforeEach(async () => {
    const server = createRateServer(loadConfig({}));
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "test-client", version: "0.0.0" });

    await server.connect(serverTransport);
    await client.connect(clientTransport);

    close = async () => {
      await client.close();
      await server.close();
    };
  });

  afterEach(async () => {
    await close();
  });

  it("lists the rate tools", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "rates.irr",
      "rates.npv",
      "rates.run",
      "rates.xirr",
      "rates.xnpv",
    ]);
  });

  it("solves IRR through a tool call", async () => {
    const result = await client.callTool({
      name: "rates.irr",
      arguments: { cashflows: [-100, 110] },
    });

    expect(result).toMatchObject({
      structuredContent: { irr: 0.1, iterations: 0, converged: true },
    });
  });

  it("solves XIRR through a tool call", async () => {
    const result = await client.callTool({
      name: "rates.xirr",
      arguments: { cashflows: [-1000, 1100], dates: ["2025-01-01", "2026-01-01"] },
    });

    expect(result).toMatchObject({
      structuredContent: { xirr: 0.1, iterations: 0, converged: true },
    });
  });
});
