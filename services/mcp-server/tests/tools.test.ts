import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { ServerConfig } from "../src/config.js";
import { handleIrr, handleNpv, handleRun, handleXirr, handleXnpv } from "../src/tools.js";

const config: ServerConfig = {
  port: 0,
  mcpPath: "/mcp",
  iterationMode: "early-exit",
  defaultGuess: 0.1,
  defaultTolerance: 1e-7,
};

describe("tool handlers", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the IRR as text and structured content", () => {
    const response = handleIrr({ cashflows: [-100, 110] }, config);

    expect(response.isError).toBeUndefined();
    expect(response.structuredContent).toEqual({ irr: 0.1, iterations: 0, converged: true });
    expect(response.content).toEqual([
      { type: "text", text: '{"irr":0.1,"iterations":0,"converged":true}' },
    ]);
  });

  it("uses the configured iteration mode", () => {
    const response = handleIrr({ cashflows: [-1, 1] }, { ...config, iterationMode: "fixed" });

    expect(response.structuredContent).toMatchObject({ iterations: 16, converged: true });
  });

  it("logs and reports a non-converged solve", () => {
    const response = handleIrr({ cashflows: [100, 50, 25] }, config);

    expect(response.structuredContent).toEqual({ irr: null, iterations: 16, converged: false });
    expect(console.warn).toHaveBeenCalledWith(
      "[WARN] Rate solve did not converge",
      '{"tool":"rates.irr","iterations":16}',
    );
  });

  it("solves XIRR", () => {
    const response = handleXirr(
      { cashflows: [-1000, 1100], dates: ["2025-01-01", "2026-01-01"] },
      config,
    );

    expect(response.structuredContent).toEqual({ xirr: 0.1, iterations: 0, converged: true });
  });

  it("turns invalid input into an error result", () => {
    const response = handleXirr({ cashflows: [-1, 1], dates: ["2025-01-01"] }, config);

    expect(response.isError).toBe(true);
    expect(response.structuredContent).toEqual({
      status: "invalid",
      error: { path: "dates", message: "cashflows and dates must have the same length (2 vs 1)" },
    });
  });

  it("computes NPV and XNPV", () => {
    expect(handleNpv({ rate: 0, cashflows: [-100, 30, 30, 30] }).structuredContent).toEqual({ npv: -10 });
    expect(handleXnpv({ rate: -1, cashflows: [-1, 1], dates: ["2025-01-01", "2026-01-01"] })).toMatchObject({
      isError: true,
      structuredContent: { error: { path: "rate", message: "rate must be greater than -1" } },
    });
  });

  it("runs a batch request with the server's iteration mode", () => {
    const response = handleRun(
      {
        request: {
          contract: { contract_version: "RATE_V1" },
          calculations: [{ id: "one-period", kind: "irr", cashflows: [-1, 1] }],
        },
      },
      { ...config, iterationMode: "fixed" },
    );

    expect(response.structuredContent).toMatchObject({
      status: "ok",
      results: [{ id: "one-period", ok: true, value: { iterations: 16, converged: true } }],
    });
  });

  it("applies the server's iteration mode when request options are empty", () => {
    const response = handleRun(
      {
        request: {
          contract: { contract_version: "RATE_V1" },
          options: {},
          calculations: [{ id: "one-period", kind: "irr", cashflows: [-1, 1] }],
        },
      },
      { ...config, iterationMode: "fixed" },
    );

    expect(response.structuredContent).toMatchObject({
      status: "ok",
      results: [{ id: "one-period", ok: true, value: { iterations: 16, converged: true } }],
    });
  });

  it("keeps the iteration mode a request sets itself", () => {
    const response = handleRun(
      {
        request: {
          contract: { contract_version: "RATE_V1" },
          options: { iteration_mode: "early-exit" },
          calculations: [{ id: "one-period", kind: "irr", cashflows: [-1, 1] }],
        },
      },
      { ...config, iterationMode: "fixed" },
    );

    expect(response.structuredContent).toMatchObject({
      results: [{ id: "one-period", ok: true, value: { iterations: 3, converged: true } }],
    });
  });

  it("reports an invalid batch request", () => {
    const response = handleRun({ request: { calculations: [] } }, config);

    expect(response.structuredContent).toMatchObject({ status: "invalid", results: [] });
  });
});
