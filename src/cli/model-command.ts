import { encodeAssertion } from "../asserts/decoder.js";
import type { Assertion } from "../asserts/assertion.js";
import type { DaemonClient } from "../client/client.js";
import { ApiError } from "../client/errors.js";
import { renderJsonHeaders } from "../report/json-reporter.js";
import { renderSummary } from "../report/text-reporter.js";
import type { OutputFormat } from "../report/types.js";
import { renderYamlHeaders } from "../report/yaml-reporter.js";

export interface ModelOptions {
  readonly serial?: boolean;
  readonly assertion?: boolean;
  readonly format?: OutputFormat;
}

export async function runModelCommand(
  client: DaemonClient,
  options: ModelOptions = {},
): Promise<string> {
  if (options.assertion) {
    const assertion = options.serial
      ? await client.currentSerialAssertion()
      : await client.currentModelAssertion();
    return new TextDecoder().decode(encodeAssertion(assertion)).trimEnd();
  }

  const format = options.format ?? "text";
  if (format !== "text") {
    const assertion = options.serial
      ? await client.currentSerialAssertion()
      : await client.currentModelAssertion();
    return format === "json"
      ? renderJsonHeaders(assertion)
      : renderYamlHeaders(assertion);
  }

  if (options.serial) {
    const serial = await client.currentSerialAssertion();
    return renderSummary({
      brand: serial.headerString("brand-id"),
      model: serial.headerString("model"),
      serial: serial.headerString("serial"),
    });
  }

  const model = await client.currentModelAssertion();
  const serial = await optionalSerial(client);
  return renderSummary({
    brand: model.headerString("brand-id"),
    model: model.headerString("model"),
    serial: serial ? serial.headerString("serial") : null,
  });
}

export function parseFormat(value: string): OutputFormat {
  if (value === "text" || value === "json" || value === "yaml") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

async function optionalSerial(client: DaemonClient): Promise<Assertion | null> {
  try {
    return await client.currentSerialAssertion();
  } catch (error) {
    if (error instanceof ApiError && error.kind === "assertion-not-found") {
      return null;
    }
    throw error;
  }
}
