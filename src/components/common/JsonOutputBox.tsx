import { EMPTY_MARK } from "../../lib/format";

type JsonOutputBoxProps = {
  title: string;
  value: unknown;
  defaultOpen?: boolean;
};

const serialize = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }
  if (value === null || value === undefined) {
    return "";
  }
  try {
    return JSON.stringify(value, null, 2);
  } catch (error) {
    return `[[unserializable value]] ${String(error)}`;
  }
};

export const JsonOutputBox = ({ title, value, defaultOpen = false }: JsonOutputBoxProps) => (
  <details className="json-output-box" open={defaultOpen}>
    <summary className="json-output-header">{title}</summary>
    <pre className="json-output-content">{serialize(value) || EMPTY_MARK}</pre>
  </details>
);
