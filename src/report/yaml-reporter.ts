import yaml from "js-yaml";
import type { Assertion } from "../asserts/assertion.js";

export function renderYamlHeaders(assertion: Assertion): string {
  return yaml.dump(assertion.headers, { lineWidth: 120, noRefs: true }).trimEnd();
}
