import type { Assertion } from "../asserts/assertion.js";

export function renderJsonHeaders(assertion: Assertion): string {
  return JSON.stringify(assertion.headers, null, 2);
}
