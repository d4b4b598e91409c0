import type { Result } from "../asserts/types.js";
import { ApiError, DecodeError } from "./errors.js";
import type { Change, Envelope, ErrorEnvelope, ErrorResult } from "./types.js";

type Json = Record<string, unknown>;

export function parseEnvelope(
  text: string,
  httpStatus: number,
): Result<Envelope, DecodeError> {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (error) {
    return {
      ok: false,
      error: new DecodeError("cannot decode response body as JSON", {
        cause: error,
      }),
    };
  }

  if (!isRecord(doc)) {
    return fail("response body is not a JSON object");
  }

  const rawStatusCode = doc["status-code"];
  let statusCode = httpStatus;
  if (typeof rawStatusCode === "number") {
    statusCode = rawStatusCode;
  } else if (rawStatusCode !== undefined) {
    return fail(`invalid status-code: ${JSON.stringify(rawStatusCode)}`);
  }
  const status = typeof doc.status === "string" ? doc.status : undefined;

  switch (doc.type) {
    case "sync":
      return {
        ok: true,
        value: { type: "sync", statusCode, status, result: doc.result },
      };
    case "async": {
      const change = doc.change;
      if (typeof change !== "string" || change.length === 0) {
        return fail("async response without change reference");
      }
      return {
        ok: true,
        value: { type: "async", statusCode, status, result: doc.result, change },
      };
    }
    case "error": {
      const result = parseErrorResult(doc.result);
      if (!result) {
        return fail("error response without a message");
      }
      return { ok: true, value: { type: "error", statusCode, status, result } };
    }
    default:
      return fail(`unknown response type: ${JSON.stringify(doc.type)}`);
  }
}

export function toApiError(envelope: ErrorEnvelope): ApiError {
  return new ApiError(envelope.result.message, {
    statusCode: envelope.statusCode,
    status: envelope.status,
    kind: envelope.result.kind,
    value: envelope.result.value,
  });
}

export function parseChange(result: unknown): Result<Change, DecodeError> {
  if (!isRecord(result)) {
    return fail("change result is not a JSON object");
  }
  const { id, kind, summary, status, ready, err } = result;
  if (typeof id !== "string" || id.length === 0) {
    return fail("change without id");
  }
  if (typeof status !== "string" || typeof ready !== "boolean") {
    return fail(`change ${id} has no status`);
  }
  return {
    ok: true,
    value: {
      id,
      kind: typeof kind === "string" ? kind : "",
      summary: typeof summary === "string" ? summary : "",
      status,
      ready,
      err: typeof err === "string" && err.length > 0 ? err : undefined,
      spawnTime: optionalString(result["spawn-time"]),
      readyTime: optionalString(result["ready-time"]),
    },
  };
}

function parseErrorResult(value: unknown): ErrorResult | null {
  if (!isRecord(value) || typeof value.message !== "string") {
    return null;
  }
  return {
    message: value.message,
    kind: typeof value.kind === "string" ? value.kind : undefined,
    value: value.value,
  };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail<T>(message: string): Result<T, DecodeError> {
  return { ok: false, error: new DecodeError(message) };
}
