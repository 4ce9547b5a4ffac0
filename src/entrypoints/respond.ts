import { isPipeError, PipeErrorCode } from "../domain/errors";

export interface JsonResult {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

const STATUS_BY_CODE: Record<PipeErrorCode, number> = {
  CONFIGURATION_ERROR: 400,
  INPUT_TYPE_ERROR: 400,
  KEY_EXTRACTION_ERROR: 422,
};

export function jsonResult(statusCode: number, payload: unknown): JsonResult {
  return {
    statusCode,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value)),
  };
}

export function errorResult(err: unknown): JsonResult {
  if (isPipeError(err)) {
    return jsonResult(STATUS_BY_CODE[err.code], {
      ok: false,
      error: err.message,
      code: err.code,
      details: err.details,
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return jsonResult(500, { ok: false, error: message });
}

/** An empty body parses to undefined; malformed JSON is reported, not thrown. */
export function parseJsonBody(raw: string | null | undefined): { ok: true; value: unknown } | { ok: false } {
  if (!raw) return { ok: true, value: undefined };
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/** Header lookup that ignores case; API Gateway keeps the client's casing. */
export function headerValue(headers: Record<string, string | undefined> | null | undefined, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers || {})) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}
