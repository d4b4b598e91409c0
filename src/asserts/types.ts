export type HeaderValue = string | HeaderValue[] | HeaderMap;

export interface HeaderMap {
  readonly [name: string]: HeaderValue;
}

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export interface AssertionParts {
  readonly headers: HeaderMap;
  readonly body: Uint8Array | null;
  readonly content: Uint8Array;
  readonly signature: Uint8Array;
}

export interface AssertionType {
  readonly name: string;
  readonly primaryKey: readonly string[];
}
