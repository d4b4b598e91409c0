import {
  Assertion,
  findAssertionType,
  ModelAssertion,
  SerialAssertion,
} from "./assertion.js";
import { parseHeaders } from "./headers.js";
import type { AssertionParts, AssertionType, HeaderMap, Result } from "./types.js";

const BLANK_LINE = new Uint8Array([0x0a, 0x0a]);
const DIGEST_BYTES = 48;
const TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|[+-](\d{2}):(\d{2}))$/;

export type AssertionDecoder = (data: Uint8Array | string) => Result<Assertion>;

export const decodeAssertion: AssertionDecoder = (data) => {
  try {
    return { ok: true, value: decode(data) };
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error : new Error("Assertion decode failed"),
    };
  }
};

export function encodeAssertion(assertion: Assertion): Uint8Array {
  const encoded = new Uint8Array(
    assertion.content.length + BLANK_LINE.length + assertion.signature.length,
  );
  encoded.set(assertion.content, 0);
  encoded.set(BLANK_LINE, assertion.content.length);
  encoded.set(assertion.signature, assertion.content.length + BLANK_LINE.length);
  return encoded;
}

function decode(data: Uint8Array | string): Assertion {
  const snapshot =
    typeof data === "string"
      ? new TextEncoder().encode(data)
      : Uint8Array.from(data);

  const contentEnd = lastIndexOf(snapshot, BLANK_LINE);
  if (contentEnd === -1) {
    throw new Error("assertion content/signature separator not found");
  }
  const content = snapshot.slice(0, contentEnd);
  const signature = snapshot.slice(contentEnd + BLANK_LINE.length);

  const headEnd = indexOf(content, BLANK_LINE);
  let head = content;
  let body: Uint8Array | null = null;
  if (headEnd !== -1) {
    head = content.slice(0, headEnd);
    const rest = content.slice(headEnd + BLANK_LINE.length);
    body = rest.length > 0 ? rest : null;
  }

  let headers: HeaderMap;
  try {
    headers = parseHeaders(decodeUtf8(head, "header"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`parsing assertion headers: ${message}`, { cause: error });
  }

  return assemble({ headers, body, content, signature });
}

function assemble(parts: AssertionParts): Assertion {
  const { headers, body, signature } = parts;

  const bodyLength = checkInteger(headers, "body-length");
  const actualLength = body?.length ?? 0;
  if (bodyLength !== actualLength) {
    throw new Error(
      `assertion body length and declared body-length don't match: ${actualLength} != ${bodyLength}`,
    );
  }
  if (body) {
    decodeUtf8(body, "body");
  }

  checkDigest(headers, "sign-key-sha3-384");

  const typeName = checkNotEmptyString(headers, "type");
  const assertionType = findAssertionType(typeName);
  if (!assertionType) {
    throw new Error(`unknown assertion type: ${JSON.stringify(typeName)}`);
  }
  checkNotEmptyString(headers, "authority-id");

  const format = checkInteger(headers, "format");
  const revision = checkInteger(headers, "revision");

  if (signature.length === 0) {
    throw new Error("empty assertion signature");
  }

  try {
    return assembleType(assertionType, parts, format, revision);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`assertion ${assertionType.name}: ${message}`, {
      cause: error,
    });
  }
}

function assembleType(
  assertionType: AssertionType,
  parts: AssertionParts,
  format: number,
  revision: number,
): Assertion {
  const { headers } = parts;
  switch (assertionType.name) {
    case "model": {
      checkNotEmptyString(headers, "series");
      checkNotEmptyString(headers, "brand-id");
      checkNotEmptyString(headers, "model");
      checkStringList(headers, "required-snaps");
      const timestamp = checkTimestamp(headers, "timestamp");
      return new ModelAssertion(assertionType, parts, format, revision, timestamp);
    }
    case "serial": {
      checkNotEmptyString(headers, "brand-id");
      checkNotEmptyString(headers, "model");
      checkNotEmptyString(headers, "serial");
      checkNotEmptyString(headers, "device-key");
      checkDigest(headers, "device-key-sha3-384");
      const timestamp = checkTimestamp(headers, "timestamp");
      return new SerialAssertion(assertionType, parts, format, revision, timestamp);
    }
    default:
      return new Assertion(assertionType, parts, format, revision);
  }
}

function checkNotEmptyString(headers: HeaderMap, name: string): string {
  const value = headers[name];
  if (value === undefined) {
    throw new Error(`"${name}" header is mandatory`);
  }
  if (typeof value !== "string") {
    throw new Error(`"${name}" header must be a string`);
  }
  if (value.length === 0) {
    throw new Error(`"${name}" header should not be empty`);
  }
  return value;
}

function checkInteger(headers: HeaderMap, name: string): number {
  const value = headers[name];
  if (value === undefined) {
    return 0;
  }
  if (typeof value !== "string" || !/^(0|[1-9][0-9]*)$/.test(value)) {
    throw new Error(`"${name}" header is not an integer: ${JSON.stringify(value)}`);
  }
  return Number(value);
}

function checkDigest(headers: HeaderMap, name: string): void {
  const value = checkNotEmptyString(headers, name);
  if (!/^[A-Za-z0-9_-]+$/.test(value) || value.length % 4 === 1) {
    throw new Error(`"${name}" header cannot be decoded`);
  }
  const decoded = Buffer.from(value, "base64url");
  if (decoded.length !== DIGEST_BYTES) {
    throw new Error(
      `"${name}" header does not have the expected bit length: ${decoded.length * 8}`,
    );
  }
}

function checkStringList(headers: HeaderMap, name: string): void {
  const value = headers[name];
  if (value === undefined) {
    return;
  }
  if (!Array.isArray(value) || !value.every((item) => typeof item === "string")) {
    throw new Error(`"${name}" header must be a list of strings`);
  }
}

function checkTimestamp(headers: HeaderMap, name: string): Date {
  const value = checkNotEmptyString(headers, name);
  const match = TIMESTAMP.exec(value);
  if (!match || !validTimestampFields(match)) {
    throw new Error(
      `"${name}" header is not a RFC3339 date: ${JSON.stringify(value)}`,
    );
  }
  const [, year, month, day, hour, minute, second] = match;
  const fraction = (match[7] ?? "").padEnd(3, "0").slice(0, 3);
  return new Date(
    `${year}-${month}-${day}T${hour}:${minute}:${second}.${fraction}${match[8]}`,
  );
}

// Date would roll 2024-02-31 over to March instead of rejecting it.
function validTimestampFields(match: RegExpExecArray): boolean {
  const [year, month, day, hour, minute, second] = match
    .slice(1, 7)
    .map(Number);
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth || hour > 23 || minute > 59 || second > 59) {
    return false;
  }
  const offsetHour = Number(match[9] ?? 0);
  const offsetMinute = Number(match[10] ?? 0);
  return offsetHour <= 23 && offsetMinute <= 59;
}

function decodeUtf8(bytes: Uint8Array, what: string): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    throw new Error(`${what} is not utf8`);
  }
}

function indexOf(haystack: Uint8Array, needle: Uint8Array): number {
  return Buffer.from(haystack.buffer, haystack.byteOffset, haystack.length).indexOf(
    needle,
  );
}

function lastIndexOf(haystack: Uint8Array, needle: Uint8Array): number {
  return Buffer.from(
    haystack.buffer,
    haystack.byteOffset,
    haystack.length,
  ).lastIndexOf(needle);
}
