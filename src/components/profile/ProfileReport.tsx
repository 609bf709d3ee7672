import { formatNumber, formatPercentage } from "../../lib/format";
import type { ColumnClassification, FrozenProfile, StorageType } from "../../lib/profile";
import { JsonOutputBox } from "../common/JsonOutputBox";
import { CategoricalStatsList } from "./CategoricalStatsList";
import { CorrelationTable } from "./CorrelationTable";
import { NumericStatsTable } from "./NumericStatsTable";

const classificationLabel: Record<ColumnClassification, string> = {
  numerical: "Numerical",
  categorical: "Categorical"
};

const storageLabel: Record<StorageType, string> = {
  integer: "int",
  float: "float",
  text: "text",
  empty: "empty"
};

type ProfileReportProps = {
  profile: FrozenProfile;
  fileName?: string | null;
};

export const ProfileReport = ({ profile, fileName }: ProfileReportProps) => {
  const numericCount = profile.correlation.columns.length;
  const flagged = Object.entries(profile.outliers).filter(([, report]) => report.count > 0);

  return (
    <section className="profile-report">
      <header className="panel-header">
        <div>
          <p className="eyebrow">Profile</p>
          <h3>{fileName ?? "Dataset"}</h3>
        </div>
      </header>

      <div className="summary-grid">
        <div>
          <p className="muted">Rows</p>
          <p className="strong">{profile.rowCount}</p>
        </div>
        <div>
          <p className="muted">Columns</p>
          <p className="strong">{profile.columnCount}</p>
        </div>
        <div>
          <p className="muted">Numerical / categorical</p>
          <p className="strong">
            {numericCount} / {profile.columnCount - numericCount}
          </p>
        </div>
        <div>
          <p className="muted">Missing cells</p>
          <p className="strong">
            {profile.missing.total.count} ({formatPercentage(profile.missing.total.percentage)})
          </p>
        </div>
      </div>

      <h4>Columns</h4>
      <table className="profile-table column-overview">
        <thead>
          <tr>
            <th>Column</th>
            <th>Type</th>
            <th>Storage</th>
            <th>Missing</th>
            <th>Missing %</th>
          </tr>
        </thead>
        <tbody>
          {profile.columns.map((column) => {
            const missing = profile.missing.columns[column.name];
            return (
              <tr key={column.name} data-column={column.name}>
                <th scope="row">{column.name}</th>
                <td>{classificationLabel[column.classification]}</td>
                <td>{storageLabel[column.storageType]}</td>
                <td>{missing.count}</td>
                <td>{formatPercentage(missing.percentage)}</td>
              </tr>
            );
          })}
        </tbody>
      </table>

      <h4>Numerical statistics</h4>
      <NumericStatsTable numeric={profile.numeric} outliers={profile.outliers} />

      {flagged.length > 0 && (
        <div className="outlier-details">
          <h4>IQR outliers</h4>
          <ul>
            {flagged.map(([name, report]) => (
              <li key={name}>
                <strong>{name}</strong>:{" "}
                {report.outliers
                  .map((point) => `row ${point.rowIndex + 1} = ${formatNumber(point.value)}`)
                  .join(", ")}
              </li>
            ))}
          </ul>
        </div>
      )}

      <h4>Categorical statistics</h4>
      <CategoricalStatsList categorical={profile.categorical} />

      <h4>Correlation matrix</h4>
      <CorrelationTable matrix={profile.correlation} />

      <JsonOutputBox title="Profile JSON" value={profile} />
    </section>
  );
};
