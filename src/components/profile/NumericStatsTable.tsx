import { formatNumber } from "../../lib/format";
import type { FrozenProfile, NumericStats } from "../../lib/profile";

type NumericStatsTableProps = {
  numeric: FrozenProfile["numeric"];
  outliers: FrozenProfile["outliers"];
};

const measures: { key: keyof NumericStats; label: string }[] = [
  { key: "count", label: "Count" },
  { key: "mean", label: "Mean" },
  { key: "std", label: "Std" },
  { key: "min", label: "Min" },
  { key: "q1", label: "25%" },
  { key: "median", label: "50%" },
  { key: "q3", label: "75%" },
  { key: "max", label: "Max" },
  { key: "skewness", label: "Skewness" },
  { key: "kurtosis", label: "Kurtosis" }
];

export const NumericStatsTable = ({ numeric, outliers }: NumericStatsTableProps) => {
  const names = Object.keys(numeric);
  if (names.length === 0) {
    return <p className="muted">No numerical columns.</p>;
  }

  return (
    <table className="profile-table numeric-stats">
      <thead>
        <tr>
          <th>Column</th>
          {measures.map((measure) => (
            <th key={measure.key}>{measure.label}</th>
          ))}
          <th>Outliers</th>
        </tr>
      </thead>
      <tbody>
        {names.map((name) => {
          const report = outliers[name];
          return (
            <tr key={name} data-column={name}>
              <th scope="row">{name}</th>
              {measures.map((measure) => (
                <td key={measure.key}>{formatNumber(numeric[name][measure.key])}</td>
              ))}
              <td
                title={
                  report && report.lowerFence !== null && report.upperFence !== null
                    ? `Fences ${formatNumber(report.lowerFence)} … ${formatNumber(report.upperFence)}`
                    : "Too few values for IQR fences"
                }
              >
                {report ? report.count : 0}
              </td>
            </tr>
          );
        })}
      </tbody>
    </table>
  );
};
