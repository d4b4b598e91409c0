import type { HeaderMap, HeaderValue } from "./types.js";

const HEADER_NAME = /^[a-z](?:-?[a-z0-9])*$/;
const LIST_MARK = "  -";
const NESTED_INDENT = "  ";
const MULTILINE_INDENT = "    ";

interface Parsed<T> {
  readonly value: T;
  readonly next: number;
}

export function parseHeaders(head: string): HeaderMap {
  const lines = head.split("\n");
  const headers: Record<string, HeaderValue> = {};
  let index = 0;

  while (index < lines.length) {
    const entry = lines[index];
    const separator = entry.indexOf(":");
    if (separator === -1) {
      throw new Error(`header entry missing ':' separator: ${JSON.stringify(entry)}`);
    }
    const name = entry.slice(0, separator);
    if (!HEADER_NAME.test(name)) {
      throw new Error(`invalid header name: ${JSON.stringify(name)}`);
    }
    const parsed = parseEntry(lines, index, separator + 1, 0);
    if (Object.hasOwn(headers, name)) {
      throw new Error(`repeated header: ${JSON.stringify(name)}`);
    }
    headers[name] = parsed.value;
    index = parsed.next;
  }

  return headers;
}

function parseEntry(
  lines: readonly string[],
  first: number,
  consumed: number,
  baseIndent: number,
): Parsed<HeaderValue> {
  const entry = lines[first];
  const next = first + 1;

  if (consumed < entry.length) {
    if (entry[consumed] !== " ") {
      throw new Error(
        `header entry should have a space or newline (for multiline) before value: ${JSON.stringify(entry)}`,
      );
    }
    return { value: entry.slice(consumed + 1), next };
  }

  const basePrefix = " ".repeat(baseIndent);
  const following = next < lines.length ? lines[next] : undefined;
  if (following === undefined) {
    throw new Error(
      `expected map, list or multiline text after: ${JSON.stringify(entry)}`,
    );
  }
  if (following.startsWith(basePrefix + MULTILINE_INDENT)) {
    return parseMultilineText(lines, next, baseIndent + MULTILINE_INDENT.length);
  }
  if (following.startsWith(basePrefix + LIST_MARK)) {
    return parseList(lines, next, baseIndent);
  }
  if (following.startsWith(basePrefix + NESTED_INDENT)) {
    return parseMap(lines, next, baseIndent);
  }
  throw new Error(
    `expected map, list or multiline text after: ${JSON.stringify(entry)}`,
  );
}

function parseMultilineText(
  lines: readonly string[],
  first: number,
  indent: number,
): Parsed<string> {
  const prefix = " ".repeat(indent);
  const collected: string[] = [];
  let index = first;
  while (index < lines.length && lines[index].startsWith(prefix)) {
    collected.push(lines[index].slice(indent));
    index += 1;
  }
  return { value: collected.join("\n"), next: index };
}

function parseList(
  lines: readonly string[],
  first: number,
  baseIndent: number,
): Parsed<HeaderValue[]> {
  const prefix = " ".repeat(baseIndent) + LIST_MARK;
  const items: HeaderValue[] = [];
  let index = first;
  while (index < lines.length && lines[index].startsWith(prefix)) {
    const parsed = parseEntry(
      lines,
      index,
      prefix.length,
      baseIndent + NESTED_INDENT.length,
    );
    items.push(parsed.value);
    index = parsed.next;
  }
  return { value: items, next: index };
}

function parseMap(
  lines: readonly string[],
  first: number,
  baseIndent: number,
): Parsed<HeaderMap> {
  const prefix = " ".repeat(baseIndent) + NESTED_INDENT;
  const entries: Record<string, HeaderValue> = {};
  let index = first;
  while (index < lines.length && lines[index].startsWith(prefix)) {
    const entry = lines[index];
    const separator = entry.indexOf(":");
    if (separator === -1) {
      throw new Error(`map entry missing ':' separator: ${JSON.stringify(entry)}`);
    }
    const key = entry.slice(prefix.length, separator);
    if (!HEADER_NAME.test(key)) {
      throw new Error(`invalid map entry key: ${JSON.stringify(key)}`);
    }
    const parsed = parseEntry(lines, index, separator + 1, prefix.length);
    if (Object.hasOwn(entries, key)) {
      throw new Error(`repeated map entry: ${JSON.stringify(key)}`);
    }
    entries[key] = parsed.value;
    index = parsed.next;
  }
  return { value: entries, next: index };
}
