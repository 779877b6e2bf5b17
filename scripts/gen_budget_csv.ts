// scripts/gen_budget_csv.ts
// Generate a sample budget vs actual CSV for trying the analysis endpoints

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

const OUTPUT_DIR = join(process.cwd(), "scripts", "output");

const DEPARTMENTS = ["Finance", "Marketing", "Operations", "Engineering", "Sales", "People"];

const ACCOUNTS = [
  "Salaries",
  "Contractors",
  "Travel",
  "Software",
  "Rent",
  "Training",
  "Advertising",
  "Equipment",
];

const PERIODS = ["2025-07", "2025-08", "2025-09"];

function randomBudget(min: number, max: number): number {
  return Math.round(Math.random() * (max - min) + min);
}

// Actual lands within +/- spread of budget; a few rows get a bigger swing
function randomActual(budget: number, spread: number): number {
  const swing = Math.random() < 0.15 ? spread * 3 : spread;
  const factor = 1 + (Math.random() * 2 - 1) * swing;
  return Math.round(budget * factor * 100) / 100;
}

function generateBudgetVsActual(): string {
  const lines: string[] = [];
  lines.push("department,account,period,budget,actual");

  for (const period of PERIODS) {
    for (const dept of DEPARTMENTS) {
      for (const account of ACCOUNTS) {
        // Not every department books every account
        if (Math.random() < 0.3) continue;
        const budget = Math.random() < 0.05 ? 0 : randomBudget(1_000, 250_000);
        const actual = budget === 0 ? randomBudget(100, 5_000) : randomActual(budget, 0.08);
        lines.push(`${dept},${account},${period},${budget},${actual.toFixed(2)}`);
      }
    }
  }

  // One malformed row so the drop path shows up in row_count
  lines.push(`Sales,Travel,${PERIODS[0]},n/a,1200`);

  return lines.join("\n");
}

mkdirSync(OUTPUT_DIR, { recursive: true });
const file = join(OUTPUT_DIR, "budget_vs_actual_sample.csv");
writeFileSync(file, generateBudgetVsActual());

console.log("Generated sample CSV file:");
console.log(`  ${file}`);
console.log(`\nPeriods: ${PERIODS.join(", ")}`);
