import { randomUUID } from "crypto";
import { z } from "zod";
import { profileRawTable, TableShapeError, type FrozenProfile } from "../src/lib/profile";
import { loadProfileConfig, type ProfileConfig } from "./config";

export type ProfileHttpRequest = AsyncIterable<Buffer | string> & {
  method?: string;
  body?: unknown;
};

export type ProfileHttpResponse = {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(chunk: string): unknown;
};

export type ProfileResponse =
  | { ok: true; requestId: string; fileName: string | null; profile: FrozenProfile }
  | { ok: false; requestId: string; error: string; details?: string };

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const requestSchema = z
  .object({
    fileName: z.string().max(255).optional(),
    table: z
      .object({
        headers: z.array(z.string()),
        rows: z.array(z.array(cellSchema))
      })
      .strict()
  })
  .strict();

class PayloadTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes.`);
    this.name = "PayloadTooLargeError";
  }
}

const jsonResponse = (res: ProfileHttpResponse, statusCode: number, payload: ProfileResponse) => {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload));
};

const createRequestId = (): string => {
  try {
    return randomUUID();
  } catch {
    return `req-${Math.random().toString(36).slice(2, 10)}`;
  }
};

const readRequestBody = async (req: ProfileHttpRequest, maxBytes: number): Promise<unknown> => {
  if (req.body !== undefined && req.body !== null) {
    if (typeof req.body === "string") {
      if (Buffer.byteLength(req.body, "utf8") > maxBytes) {
        throw new PayloadTooLargeError(maxBytes);
      }
      return JSON.parse(req.body);
    }
    if (Buffer.isBuffer(req.body)) {
      if (req.body.length > maxBytes) {
        throw new PayloadTooLargeError(maxBytes);
      }
      return JSON.parse(req.body.toString("utf8"));
    }
    return req.body;
  }

  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    size += buffer.length;
    if (size > maxBytes) {
      throw new PayloadTooLargeError(maxBytes);
    }
    chunks.push(buffer);
  }
  if (chunks.length === 0) {
    return null;
  }
  return JSON.parse(Buffer.concat(chunks).toString("utf8"));
};

const logStart = (payload: {
  requestId: string;
  method: string | undefined;
  rowCount: number | null;
  columnCount: number | null;
}) => {
  console.info("[profile] start", payload);
};

const logSuccess = (requestId: string, profile: FrozenProfile) => {
  console.info("[profile] success", {
    requestId,
    rows: profile.rowCount,
    columns: profile.columnCount,
    numericColumns: profile.correlation.columns.length
  });
};

const logFailure = (requestId: string, error: unknown, fallbackMessage: string) => {
  const payload =
    error instanceof Error
      ? { message: error.message, stack: error.stack }
      : { message: fallbackMessage, stack: undefined };
  console.error("[profile] fail", { requestId, ...payload });
};

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
    .join("; ");

export const createProfileHandler =
  (settings: ProfileConfig) =>
  async (req: ProfileHttpRequest, res: ProfileHttpResponse): Promise<void> => {
    const requestId = createRequestId();

    if (req.method !== "POST") {
      logFailure(requestId, null, `Method ${req.method ?? "unknown"} not allowed`);
      res.setHeader("Allow", "POST");
      return jsonResponse(res, 405, { ok: false, error: "Method not allowed", requestId });
    }

    let parsedBody: unknown;
    try {
      parsedBody = await readRequestBody(req, settings.maxBodyBytes);
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        logFailure(requestId, error, "Payload too large");
        return jsonResponse(res, 413, {
          ok: false,
          error: "Payload too large",
          requestId,
          details: error.message
        });
      }
      logFailure(requestId, error, "Invalid JSON");
      return jsonResponse(res, 400, { ok: false, error: "Invalid JSON", requestId });
    }

    const validated = requestSchema.safeParse(parsedBody);
    logStart({
      requestId,
      method: req.method,
      rowCount: validated.success ? validated.data.table.rows.length : null,
      columnCount: validated.success ? validated.data.table.headers.length : null
    });

    if (!validated.success) {
      logFailure(requestId, validated.error, "Invalid request");
      return jsonResponse(res, 400, {
        ok: false,
        error: "Invalid request",
        requestId,
        details: describeIssues(validated.error)
      });
    }

    const { table, fileName } = validated.data;
    if (table.rows.length > settings.maxRows || table.headers.length > settings.maxColumns) {
      const details = `Limits are ${settings.maxRows} rows and ${settings.maxColumns} columns; got ${table.rows.length} rows and ${table.headers.length} columns.`;
      logFailure(requestId, null, details);
      return jsonResponse(res, 413, { ok: false, error: "Table too large", requestId, details });
    }

    try {
      const profile = profileRawTable(table);
      logSuccess(requestId, profile);
      return jsonResponse(res, 200, { ok: true, requestId, fileName: fileName ?? null, profile });
    } catch (error) {
      if (error instanceof TableShapeError) {
        logFailure(requestId, error, "Malformed table");
        return jsonResponse(res, 400, {
          ok: false,
          error: "Malformed table",
          requestId,
          details: error.message
        });
      }
      logFailure(requestId, error, "Profiling failed");
      return jsonResponse(res, 500, { ok: false, error: "Profiling failed", requestId });
    }
  };

export default async function handler(req: ProfileHttpRequest, res: ProfileHttpResponse) {
  let settings: ProfileConfig;
  try {
    settings = loadProfileConfig();
  } catch (error) {
    const requestId = createRequestId();
    logFailure(requestId, error, "Invalid configuration");
    return jsonResponse(res, 500, { ok: false, error: "Server misconfigured", requestId });
  }
  return createProfileHandler(settings)(req, res);
}
