import { describe, expect, it } from "vitest";
import {
  ModelAssertion,
  SerialAssertion,
} from "../../src/asserts/assertion.js";
import {
  decodeAssertion,
  encodeAssertion,
} from "../../src/asserts/decoder.js";
import { parseHeaders } from "../../src/asserts/headers.js";
import { loadFixture, SIGN_KEY } from "../fixtures.js";

const ACCOUNT_HEADERS = [
  "type: account",
  "authority-id: acme",
  "account-id: acme",
  `sign-key-sha3-384: ${SIGN_KEY}`,
].join("\n");

function decodeError(text: string): string {
  const result = decodeAssertion(text);
  if (result.ok) {
    throw new Error("expected decoding to fail");
  }
  return result.error.message;
}

describe("assertion decoding", () => {
  it("decodes a model assertion", async () => {
    const text = await loadFixture("model.assertion");
    const result = decodeAssertion(text);
    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }

    const model = result.value;
    expect(model).toBeInstanceOf(ModelAssertion);
    if (!(model instanceof ModelAssertion)) {
      return;
    }
    expect(model.type).toBe("model");
    expect(model.authorityId).toBe("acme");
    expect(model.signKeyId).toBe(SIGN_KEY);
    expect(model.series).toBe("16");
    expect(model.brandId).toBe("acme");
    expect(model.model).toBe("test-gateway");
    expect(model.architecture).toBe("arm64");
    expect(model.base).toBe("core22");
    expect(model.gadget).toBe("gateway-gadget=22");
    expect(model.kernel).toBe("gateway-kernel=22");
    expect(model.requiredSnaps).toEqual(["network-agent", "telemetry"]);
    expect(model.timestamp.toISOString()).toBe("2024-03-01T12:00:00.000Z");
    expect(model.primaryKey).toEqual(["16", "acme", "test-gateway"]);
    expect(model.revision).toBe(0);
    expect(model.format).toBe(0);
    expect(model.body).toBeNull();
  });

  it("decodes a serial assertion with a multiline device key", async () => {
    const text = await loadFixture("serial.assertion");
    const result = decodeAssertion(text);
    expect(result.ok).toBe(true);
    if (!result.ok || !(result.value instanceof SerialAssertion)) {
      throw new Error("expected a serial assertion");
    }

    const serial = result.value;
    expect(serial.serial).toBe("gw-000123");
    expect(serial.brandId).toBe("acme");
    expect(serial.model).toBe("test-gateway");
    expect(serial.deviceKey).toBe(
      "AcZrBFplaceholderDeviceKeyLineOne0000000000000000000000000000000000000000000\n" +
        "bGluZVR3b09mVGhlUGxhY2Vob2xkZXJEZXZpY2VLZXk=",
    );
    expect(serial.timestamp.toISOString()).toBe("2024-03-02T13:30:00.000Z");
    expect(serial.primaryKey).toEqual(["acme", "test-gateway", "gw-000123"]);
  });

  it("re-encodes to the exact input", async () => {
    const text = await loadFixture("model.assertion");
    const result = decodeAssertion(text);
    if (!result.ok) {
      throw result.error;
    }
    expect(new TextDecoder().decode(encodeAssertion(result.value))).toBe(text);
  });

  it("reads a body whose length matches body-length", () => {
    const result = decodeAssertion(
      `${ACCOUNT_HEADERS}\nbody-length: 5\n\nhello\n\nc2ln`,
    );
    if (!result.ok) {
      throw result.error;
    }
    expect(new TextDecoder().decode(result.value.body ?? new Uint8Array())).toBe(
      "hello",
    );
    expect(new TextDecoder().decode(result.value.signature)).toBe("c2ln");
  });

  it("accepts bytes as well as text", () => {
    const result = decodeAssertion(
      new TextEncoder().encode(`${ACCOUNT_HEADERS}\nrevision: 3\n\nc2ln`),
    );
    if (!result.ok) {
      throw result.error;
    }
    expect(result.value.type).toBe("account");
    expect(result.value.revision).toBe(3);
    expect(result.value.primaryKey).toEqual(["acme"]);
  });

  it("rejects malformed documents", () => {
    expect(decodeError("type: account")).toBe(
      "assertion content/signature separator not found",
    );
    expect(decodeError(`${ACCOUNT_HEADERS}\nbody-length: 3\n\nhello\n\nc2ln`)).toBe(
      "assertion body length and declared body-length don't match: 5 != 3",
    );
    expect(decodeError(`${ACCOUNT_HEADERS}\n\n`)).toBe(
      "empty assertion signature",
    );
    expect(
      decodeError(ACCOUNT_HEADERS.replace("type: account", "type: widget") + "\n\nc2ln"),
    ).toBe('unknown assertion type: "widget"');
    expect(
      decodeError(ACCOUNT_HEADERS.replace("authority-id: acme\n", "") + "\n\nc2ln"),
    ).toBe('"authority-id" header is mandatory');
    expect(decodeError(`${ACCOUNT_HEADERS}\ntype: model\n\nc2ln`)).toBe(
      'parsing assertion headers: repeated header: "type"',
    );
    expect(decodeError(`${ACCOUNT_HEADERS}\nrevision: -1\n\nc2ln`)).toBe(
      '"revision" header is not an integer: "-1"',
    );
    expect(
      decodeError(ACCOUNT_HEADERS.replace(SIGN_KEY, "abc") + "\n\nc2ln"),
    ).toBe('"sign-key-sha3-384" header does not have the expected bit length: 16');
  });

  it("applies model header checks", () => {
    const text = [
      "type: model",
      "authority-id: acme",
      "series: 16",
      "model: test-gateway",
      "timestamp: 2024-03-01T12:00:00Z",
      `sign-key-sha3-384: ${SIGN_KEY}`,
      "",
      "c2ln",
    ].join("\n");
    expect(decodeError(text)).toBe(
      'assertion model: "brand-id" header is mandatory',
    );
    expect(
      decodeError(
        text
          .replace("series: 16", "series: 16\nbrand-id: acme")
          .replace("2024-03-01T12:00:00Z", "yesterday"),
      ),
    ).toBe('assertion model: "timestamp" header is not a RFC3339 date: "yesterday"');
  });

  it("rejects timestamps with out of range fields", () => {
    const text = [
      "type: model",
      "authority-id: acme",
      "series: 16",
      "brand-id: acme",
      "model: test-gateway",
      "timestamp: 2024-03-01T12:00:00Z",
      `sign-key-sha3-384: ${SIGN_KEY}`,
      "",
      "c2ln",
    ].join("\n");
    for (const bad of [
      "2024-02-31T12:00:00Z",
      "2024-03-01T24:00:00Z",
      "2024-13-01T12:00:00Z",
      "2024-03-01T12:60:00Z",
      "2024-03-01T12:00:00+25:00",
    ]) {
      expect(decodeError(text.replace("2024-03-01T12:00:00Z", bad))).toBe(
        `assertion model: "timestamp" header is not a RFC3339 date: "${bad}"`,
      );
    }
  });

  it("accepts leap days and offsets", () => {
    const text = [
      "type: model",
      "authority-id: acme",
      "series: 16",
      "brand-id: acme",
      "model: test-gateway",
      "timestamp: 2024-02-29T23:30:00.5+02:00",
      `sign-key-sha3-384: ${SIGN_KEY}`,
      "",
      "c2ln",
    ].join("\n");
    const result = decodeAssertion(text);
    if (!result.ok) {
      throw result.error;
    }
    expect(result.value).toBeInstanceOf(ModelAssertion);
    if (!(result.value instanceof ModelAssertion)) {
      return;
    }
    expect(result.value.timestamp.toISOString()).toBe(
      "2024-02-29T21:30:00.500Z",
    );
  });
});

describe("header parsing", () => {
  it("parses lists, maps and multiline text", () => {
    const head = [
      "name: x",
      "list:",
      "  - a",
      "  -",
      "      multi",
      "      line",
      "map:",
      "  key: v",
      "  other:",
      "    - z",
    ].join("\n");
    expect(parseHeaders(head)).toEqual({
      name: "x",
      list: ["a", "multi\nline"],
      map: { key: "v", other: ["z"] },
    });
  });

  it("rejects bad entries", () => {
    expect(() => parseHeaders("novalue")).toThrow(
      'header entry missing \':\' separator: "novalue"',
    );
    expect(() => parseHeaders("Bad: x")).toThrow('invalid header name: "Bad"');
    expect(() => parseHeaders("a:b")).toThrow(
      "header entry should have a space or newline",
    );
    expect(() => parseHeaders("a:")).toThrow(
      'expected map, list or multiline text after: "a:"',
    );
  });
});
