import { useMemo, useState } from "react";
import "./App.css";
import { ProfileReport } from "./components/profile/ProfileReport";
import { createDemoTable } from "./data/demoData";
import { parseFile, SUPPORTED_EXTENSIONS } from "./lib/import/parseFile";
import type { RawTable } from "./lib/import/types";
import { profileRawTable, type FrozenProfile } from "./lib/profile";

type ProfileState =
  | { status: "idle" }
  | { status: "ready"; fileName: string; profile: FrozenProfile }
  | { status: "error"; fileName: string | null; message: string };

const acceptedExtensions = SUPPORTED_EXTENSIONS.map((extension) => `.${extension}`).join(",");

const App = () => {
  const [rawTables, setRawTables] = useState<RawTable[]>([]);
  const [selectedSheet, setSelectedSheet] = useState<string | null>(null);
  const [state, setState] = useState<ProfileState>({ status: "idle" });
  const [isDragging, setIsDragging] = useState(false);

  const sheetNames = useMemo(
    () => rawTables.map((table) => table.sheetName ?? "Sheet"),
    [rawTables]
  );

  const runProfile = (table: RawTable, fileName: string) => {
    try {
      setState({ status: "ready", fileName, profile: profileRawTable(table) });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown profiling error.";
      setState({ status: "error", fileName, message });
    }
  };

  const handleFileUpload = async (file: File) => {
    setRawTables([]);
    setSelectedSheet(null);
    try {
      const result = await parseFile(file);
      setRawTables(result.rawTables);
      setSelectedSheet(result.activeTable.sheetName ?? null);
      runProfile(result.activeTable, file.name);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown parse error.";
      setState({ status: "error", fileName: file.name, message });
    }
  };

  const handleSheetChange = (sheetName: string) => {
    const table = rawTables.find((entry) => entry.sheetName === sheetName);
    if (!table) {
      return;
    }
    setSelectedSheet(sheetName);
    runProfile(table, state.status === "ready" ? state.fileName : sheetName);
  };

  const handleDemo = () => {
    const table = createDemoTable();
    setRawTables([]);
    setSelectedSheet(null);
    runProfile(table, table.sheetName ?? "demo_data.csv");
  };

  return (
    <div className="app-shell">
      <header className="app-header">
        <h1>Data Profiler</h1>
        <p className="muted">
          Upload a table to see column types, missing values, summary statistics, outliers and
          correlations.
        </p>
      </header>

      <section className="panel">
        <div
          className={`upload-zone ${isDragging ? "dragging" : ""}`}
          onDragOver={(event) => {
            event.preventDefault();
            setIsDragging(true);
          }}
          onDragLeave={() => setIsDragging(false)}
          onDrop={(event) => {
            event.preventDefault();
            setIsDragging(false);
            const file = event.dataTransfer.files[0];
            if (file) {
              void handleFileUpload(file);
            }
          }}
        >
          <h3>Upload CSV, TXT, Excel or JSON</h3>
          <div className="upload-actions">
            <label className="primary file-picker">
              Choose file
              <input
                type="file"
                accept={acceptedExtensions}
                onChange={(event) => {
                  const file = event.target.files?.[0];
                  if (file) {
                    void handleFileUpload(file);
                  }
                  event.target.value = "";
                }}
              />
            </label>
            <button type="button" className="secondary" onClick={handleDemo}>
              Load demo data
            </button>
          </div>
          {state.status === "error" && (
            <div className="callout error-callout" role="alert">
              {state.message}
            </div>
          )}
          {sheetNames.length > 1 && (
            <label className="sheet-select-row">
              Sheet
              <select
                value={selectedSheet ?? ""}
                onChange={(event) => handleSheetChange(event.target.value)}
              >
                {sheetNames.map((sheet) => (
                  <option key={sheet} value={sheet}>
                    {sheet}
                  </option>
                ))}
              </select>
            </label>
          )}
        </div>
      </section>

      {state.status === "ready" && (
        <section className="panel">
          <ProfileReport profile={state.profile} fileName={state.fileName} />
        </section>
      )}
    </div>
  );
};

export default App;
