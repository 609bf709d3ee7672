import type { FrozenProfile } from "../../lib/profile";

type CategoricalStatsListProps = {
  categorical: FrozenProfile["categorical"];
  maxValues?: number;
};

export const CategoricalStatsList = ({ categorical, maxValues = 10 }: CategoricalStatsListProps) => {
  const names = Object.keys(categorical);
  if (names.length === 0) {
    return <p className="muted">No categorical columns.</p>;
  }

  return (
    <div className="categorical-stats">
      {names.map((name) => {
        const stats = categorical[name];
        const shown = stats.frequencies.slice(0, maxValues);
        return (
          <article key={name} className="categorical-card" data-column={name}>
            <header>
              <h4>{name}</h4>
              <span className="pill muted-pill">{stats.distinctCount} distinct</span>
            </header>
            <p className="meta">
              {stats.mostFrequent
                ? `Most frequent: ${stats.mostFrequent.value} (${stats.mostFrequent.count})`
                : "No values"}
            </p>
            {shown.length > 0 && (
              <ul className="frequency-list">
                {shown.map((entry) => (
                  <li key={entry.value}>
                    <span className="frequency-value">{entry.value}</span>
                    <span className="frequency-count">{entry.count}</span>
                  </li>
                ))}
              </ul>
            )}
            {stats.frequencies.length > shown.length && (
              <p className="muted subtle">+{stats.frequencies.length - shown.length} more values</p>
            )}
          </article>
        );
      })}
    </div>
  );
};
