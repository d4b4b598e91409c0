import type {
  AssertionParts,
  AssertionType,
  HeaderMap,
  HeaderValue,
} from "./types.js";

/**
 * A decoded assertion. Headers, body and signature are kept exactly as they
 * were received so the document can be re-encoded byte for byte.
 */
export class Assertion {
  readonly type: string;
  readonly headers: HeaderMap;
  readonly body: Uint8Array | null;
  readonly content: Uint8Array;
  readonly signature: Uint8Array;
  readonly format: number;
  readonly revision: number;

  constructor(
    assertionType: AssertionType,
    parts: AssertionParts,
    format: number,
    revision: number,
  ) {
    this.type = assertionType.name;
    this.headers = parts.headers;
    this.body = parts.body;
    this.content = parts.content;
    this.signature = parts.signature;
    this.format = format;
    this.revision = revision;
  }

  header(name: string): HeaderValue | undefined {
    return this.headers[name];
  }

  headerString(name: string): string {
    const value = this.headers[name];
    return typeof value === "string" ? value : "";
  }

  get authorityId(): string {
    return this.headerString("authority-id");
  }

  get signKeyId(): string {
    return this.headerString("sign-key-sha3-384");
  }

  get primaryKey(): string[] {
    const assertionType = findAssertionType(this.type);
    return (assertionType?.primaryKey ?? []).map((name) =>
      this.headerString(name),
    );
  }
}

export class ModelAssertion extends Assertion {
  readonly timestamp: Date;

  constructor(
    assertionType: AssertionType,
    parts: AssertionParts,
    format: number,
    revision: number,
    timestamp: Date,
  ) {
    super(assertionType, parts, format, revision);
    this.timestamp = timestamp;
  }

  get series(): string {
    return this.headerString("series");
  }

  get brandId(): string {
    return this.headerString("brand-id");
  }

  get model(): string {
    return this.headerString("model");
  }

  get architecture(): string {
    return this.headerString("architecture");
  }

  get base(): string {
    return this.headerString("base");
  }

  get gadget(): string {
    return this.headerString("gadget");
  }

  get kernel(): string {
    return this.headerString("kernel");
  }

  get requiredSnaps(): string[] {
    const value = this.headers["required-snaps"];
    if (!Array.isArray(value)) {
      return [];
    }
    return value.filter((item): item is string => typeof item === "string");
  }
}

export class SerialAssertion extends Assertion {
  readonly timestamp: Date;

  constructor(
    assertionType: AssertionType,
    parts: AssertionParts,
    format: number,
    revision: number,
    timestamp: Date,
  ) {
    super(assertionType, parts, format, revision);
    this.timestamp = timestamp;
  }

  get brandId(): string {
    return this.headerString("brand-id");
  }

  get model(): string {
    return this.headerString("model");
  }

  get serial(): string {
    return this.headerString("serial");
  }

  get deviceKey(): string {
    return this.headerString("device-key");
  }

  get deviceKeyId(): string {
    return this.headerString("device-key-sha3-384");
  }
}

export const ASSERTION_TYPES: readonly AssertionType[] = [
  { name: "account", primaryKey: ["account-id"] },
  { name: "account-key", primaryKey: ["public-key-sha3-384"] },
  { name: "base-declaration", primaryKey: ["series"] },
  { name: "model", primaryKey: ["series", "brand-id", "model"] },
  { name: "serial", primaryKey: ["brand-id", "model", "serial"] },
  { name: "serial-request", primaryKey: [] },
  { name: "snap-declaration", primaryKey: ["series", "snap-id"] },
  { name: "snap-revision", primaryKey: ["snap-sha3-384"] },
  { name: "store", primaryKey: ["store"] },
  { name: "system-user", primaryKey: ["brand-id", "email"] },
  {
    name: "validation",
    primaryKey: [
      "series",
      "snap-id",
      "approved-snap-id",
      "approved-snap-revision",
    ],
  },
];

export function findAssertionType(name: string): AssertionType | undefined {
  return ASSERTION_TYPES.find((candidate) => candidate.name === name);
}
