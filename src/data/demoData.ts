import type { RawTable, RawTableCell } from "../lib/import/types";

const DEMO_ROWS = 100;
const DEMO_MISSING_SATISFACTION = 10;
const DEMO_SEED = 42;

const regions = ["North", "South", "East", "West"];
const productCategories = ["A", "B", "C"];

// mulberry32
const createRandom = (seed: number) => {
  let state = seed >>> 0;
  return (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

const normal = (random: () => number, mean: number, sd: number): number => {
  const u = 1 - random();
  const v = random();
  return mean + sd * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
};

const pick = <T>(random: () => number, options: readonly T[]): T =>
  options[Math.floor(random() * options.length)];

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/**
 * Sales/marketing sample with two numeric normals, one bounded numeric column
 * (with gaps) and two categorical columns. The same seed always yields the same table.
 */
export const createDemoTable = (seed = DEMO_SEED): RawTable => {
  const random = createRandom(seed);
  const rows: RawTableCell[][] = Array.from({ length: DEMO_ROWS }).map(() => [
    round(normal(random, 1000, 200), 2),
    round(normal(random, 500, 100), 2),
    round(1 + random() * 4, 2),
    pick(random, regions),
    pick(random, productCategories)
  ]);

  const blanked = new Set<number>();
  while (blanked.size < DEMO_MISSING_SATISFACTION) {
    blanked.add(Math.floor(random() * DEMO_ROWS));
  }
  blanked.forEach((rowIndex) => {
    rows[rowIndex][2] = null;
  });

  return {
    sheetName: "demo_data.csv",
    headers: ["Sales", "Marketing_Spend", "Customer_Satisfaction", "Region", "Product_Category"],
    rows
  };
};
