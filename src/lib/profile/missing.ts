import type { MissingCount, MissingReport, ResolvedColumn } from "./types";

const toPercentage = (count: number, total: number): number =>
  total === 0 ? 0 : (count / total) * 100;

export const countMissing = (column: ResolvedColumn): number =>
  column.cells.reduce((count, cell) => (cell.kind === "missing" ? count + 1 : count), 0);

export const analyzeMissing = (
  columns: readonly ResolvedColumn[],
  rowCount: number
): MissingReport => {
  const perColumn: [string, MissingCount][] = [];
  let totalMissing = 0;

  columns.forEach((column) => {
    const count = countMissing(column);
    totalMissing += count;
    perColumn.push([column.name, { count, percentage: toPercentage(count, rowCount) }]);
  });

  return {
    columns: Object.fromEntries(perColumn),
    total: {
      count: totalMissing,
      percentage: toPercentage(totalMissing, rowCount * columns.length)
    }
  };
};
