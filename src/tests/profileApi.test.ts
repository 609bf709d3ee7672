// @vitest-environment node
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadProfileConfig, type ProfileConfig } from "../../api/config";
import {
  createProfileHandler,
  type ProfileHttpRequest,
  type ProfileResponse
} from "../../api/profile";

const settings: ProfileConfig = { maxRows: 100, maxColumns: 10, maxBodyBytes: 10_000 };

const createRequest = (body: unknown, method = "POST"): ProfileHttpRequest => ({
  method,
  body,
  async *[Symbol.asyncIterator]() {}
});

const createStreamRequest = (chunks: string[]): ProfileHttpRequest => ({
  method: "POST",
  async *[Symbol.asyncIterator]() {
    for (const chunk of chunks) {
      yield Buffer.from(chunk);
    }
  }
});

const createResponse = () => {
  const headers: Record<string, string> = {};
  let payload = "";
  const res = {
    statusCode: 0,
    setHeader(name: string, value: string) {
      headers[name] = value;
    },
    end(chunk: string) {
      payload = chunk;
    }
  };
  const body = (): ProfileResponse => JSON.parse(payload);
  return { res, headers, body };
};

const run = async (req: ProfileHttpRequest, config: ProfileConfig = settings) => {
  const response = createResponse();
  await createProfileHandler(config)(req, response.res);
  return response;
};

describe("profile endpoint", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("profiles a posted table", async () => {
    const { res, headers, body } = await run(
      createRequest({
        fileName: "pairs.csv",
        table: { headers: ["x", "y"], rows: [[1, 2], [2, 4], [3, 6]] }
      })
    );

    expect(res.statusCode).toBe(200);
    expect(headers["Content-Type"]).toBe("application/json");
    const payload = body();
    expect(payload.ok).toBe(true);
    if (payload.ok) {
      expect(payload.fileName).toBe("pairs.csv");
      expect(payload.profile.rowCount).toBe(3);
      expect(payload.profile.numeric.y.mean).toBe(4);
      expect(payload.profile.correlation.coefficients[0][1]).toBeCloseTo(1, 12);
    }
    expect(console.info).toHaveBeenCalledWith(
      "[profile] success",
      expect.objectContaining({ rows: 3, columns: 2, numericColumns: 2 })
    );
  });

  it("reads a streamed JSON body", async () => {
    const json = JSON.stringify({ table: { headers: ["a"], rows: [["x"], [null]] } });
    const { res, body } = await run(createStreamRequest([json.slice(0, 10), json.slice(10)]));

    expect(res.statusCode).toBe(200);
    const payload = body();
    expect(payload.ok && payload.profile.missing.columns.a.count).toBe(1);
  });

  it("rejects methods other than POST", async () => {
    const { res, headers, body } = await run(createRequest(null, "GET"));
    expect(res.statusCode).toBe(405);
    expect(headers.Allow).toBe("POST");
    expect(body()).toMatchObject({ ok: false, error: "Method not allowed" });
  });

  it("rejects bodies that fail validation", async () => {
    const { res, body } = await run(createRequest({ table: { headers: "x", rows: [] } }));
    expect(res.statusCode).toBe(400);
    expect(body()).toMatchObject({ ok: false, error: "Invalid request" });
  });

  it("rejects unparsable JSON", async () => {
    const { res, body } = await run(createStreamRequest(["{"]));
    expect(res.statusCode).toBe(400);
    expect(body()).toMatchObject({ ok: false, error: "Invalid JSON" });
  });

  it("reports malformed tables", async () => {
    const ragged = await run(createRequest({ table: { headers: ["a", "b"], rows: [[1]] } }));
    expect(ragged.res.statusCode).toBe(400);
    expect(ragged.body()).toMatchObject({
      ok: false,
      error: "Malformed table",
      details: "Row 1 has 1 cells, expected 2."
    });

    const duplicate = await run(createRequest({ table: { headers: ["a", "a"], rows: [[1, 2]] } }));
    expect(duplicate.res.statusCode).toBe(400);
    expect(duplicate.body()).toMatchObject({
      ok: false,
      error: "Malformed table",
      details: 'Column name "a" appears more than once (position 2).'
    });
  });

  it("enforces row and column limits", async () => {
    const { res, body } = await run(
      createRequest({ table: { headers: ["a"], rows: [[1], [2], [3]] } }),
      { ...settings, maxRows: 2 }
    );
    expect(res.statusCode).toBe(413);
    expect(body()).toMatchObject({
      ok: false,
      error: "Table too large",
      details: "Limits are 2 rows and 10 columns; got 3 rows and 1 columns."
    });
  });

  it("stops reading bodies over the byte limit", async () => {
    const { res, body } = await run(createStreamRequest(["{\"table\":", "{\"headers\":[]}}"]), {
      ...settings,
      maxBodyBytes: 12
    });
    expect(res.statusCode).toBe(413);
    expect(body()).toMatchObject({
      ok: false,
      error: "Payload too large",
      details: "Request body exceeds 12 bytes."
    });
  });

  it("applies the byte limit to bodies a framework already read", async () => {
    const text = JSON.stringify({ table: { headers: ["a"], rows: [[1], [2]] } });
    const limited = { ...settings, maxBodyBytes: 12 };

    for (const body of [text, Buffer.from(text)]) {
      const { res, body: payload } = await run(createRequest(body), limited);
      expect(res.statusCode).toBe(413);
      expect(payload()).toMatchObject({
        ok: false,
        error: "Payload too large",
        details: "Request body exceeds 12 bytes."
      });
    }

    const accepted = await run(createRequest(text));
    expect(accepted.res.statusCode).toBe(200);
  });
});

describe("profile configuration", () => {
  it("falls back to defaults", () => {
    expect(loadProfileConfig({})).toEqual({
      maxRows: 100_000,
      maxColumns: 500,
      maxBodyBytes: 16 * 1024 * 1024
    });
  });

  it("reads limits from the environment", () => {
    expect(loadProfileConfig({ PROFILE_MAX_ROWS: "50", PROFILE_MAX_COLUMNS: "5" })).toMatchObject({
      maxRows: 50,
      maxColumns: 5
    });
  });

  it("rejects invalid values", () => {
    expect(() => loadProfileConfig({ PROFILE_MAX_ROWS: "many" })).toThrow(/PROFILE_MAX_ROWS/);
  });
});
