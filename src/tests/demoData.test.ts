import { describe, expect, it } from "vitest";
import { createDemoTable } from "../data/demoData";

describe("demo dataset", () => {
  it("is reproducible for a seed", () => {
    expect(createDemoTable()).toEqual(createDemoTable());
    expect(createDemoTable(7)).not.toEqual(createDemoTable());
  });

  it("has 100 rows with ten satisfaction gaps", () => {
    const table = createDemoTable();
    expect(table.headers).toEqual([
      "Sales",
      "Marketing_Spend",
      "Customer_Satisfaction",
      "Region",
      "Product_Category"
    ]);
    expect(table.rows).toHaveLength(100);
    expect(table.rows.filter((row) => row[2] === null)).toHaveLength(10);
    table.rows.forEach((row) => {
      expect(["North", "South", "East", "West"]).toContain(row[3]);
      expect(["A", "B", "C"]).toContain(row[4]);
    });
  });
});
