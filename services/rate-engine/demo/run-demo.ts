/**
 * Rate Engine Demo Script
 *
 * Run with: npx tsx demo/run-demo.ts
 */

import { RateEngineRuntime, amortizationSchedule, irr, xirr, xnpv } from "../src/index.js";
import type { RateRequestV1 } from "../src/index.js";

const fundDates = ["2021-03-15", "2021-11-01", "2022-06-30", "2023-12-20", "2024-09-01"];
const fundFlows = [-2_500_000, -750_000, 400_000, 1_250_000, 3_100_000];

const request: RateRequestV1 = {
  contract: { contract_version: "RATE_V1" },
  calculations: [
    { id: "project", kind: "irr", cashflows: [-100, 39, 59, 55, 20] },
    { id: "fund", kind: "xirr", cashflows: fundFlows, dates: fundDates },
    { id: "reinvested", kind: "mirr", cashflows: [-100, 50, -60, 70], finance_rate: 0.1, reinvest_rate: 0.12 },
    { id: "mortgage-payment", kind: "pmt", rate: 0.065 / 12, nper: 360, pv: 400_000 },
  ],
};

function formatPct(value: number | null): string {
  return value === null ? "n/a" : `${(value * 100).toFixed(4)}%`;
}

console.log("=== Direct calls ===");
const project = irr([-100, 39, 59, 55, 20]);
console.log(`IRR:  ${formatPct(project.irr)} after ${project.iterations} steps`);

const fund = xirr(fundFlows, fundDates);
console.log(`XIRR: ${formatPct(fund.xirr)} (converged: ${fund.converged})`);
if (fund.xirr !== null) {
  console.log(`XNPV at XIRR: ${xnpv(fund.xirr, fundFlows, fundDates).toExponential(3)}`);
}

console.log("\n=== RATE_V1 request ===");
const result = new RateEngineRuntime(request).run();
if (!result.validation.valid) {
  console.error(result.validation.errors.join("\n"));
  process.exit(1);
}
for (const outcome of result.results) {
  console.log(outcome.id, JSON.stringify(outcome.ok ? outcome.value : outcome.error));
}
result.warnings.forEach((warning) => console.warn(`warning: ${warning}`));

console.log("\n=== First year of a 30-year mortgage ===");
for (const row of amortizationSchedule(0.065 / 12, 360, 400_000).slice(0, 12)) {
  console.log(
    `${String(row.period).padStart(3)}  pay ${row.payment.toFixed(2)}  int ${row.interest.toFixed(2)}  ` +
      `prin ${row.principal.toFixed(2)}  bal ${row.remainingBalance.toFixed(2)}`,
  );
}
