import { formatNumber } from "../../lib/format";
import type { FrozenProfile } from "../../lib/profile";

type CorrelationTableProps = {
  matrix: FrozenProfile["correlation"];
};

// red for negative, blue for positive, intensity by magnitude
const cellTone = (value: number | null): string | undefined => {
  if (value === null) {
    return undefined;
  }
  const hue = value < 0 ? 0 : 215;
  const lightness = 96 - Math.round(Math.abs(value) * 40);
  return `hsl(${hue}, 70%, ${lightness}%)`;
};

export const CorrelationTable = ({ matrix }: CorrelationTableProps) => {
  if (matrix.columns.length < 2) {
    return <p className="muted">At least two numerical columns are needed for correlations.</p>;
  }

  return (
    <table className="profile-table correlation-table">
      <thead>
        <tr>
          <th />
          {matrix.columns.map((name) => (
            <th key={name}>{name}</th>
          ))}
        </tr>
      </thead>
      <tbody>
        {matrix.columns.map((rowName, rowIndex) => (
          <tr key={rowName}>
            <th scope="row">{rowName}</th>
            {matrix.coefficients[rowIndex].map((value, columnIndex) => (
              <td
                key={`${rowName}-${matrix.columns[columnIndex]}`}
                style={{ backgroundColor: cellTone(value) }}
              >
                {formatNumber(value)}
              </td>
            ))}
          </tr>
        ))}
      </tbody>
    </table>
  );
};
