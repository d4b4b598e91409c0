import fs from "node:fs/promises";
import type { DaemonClient } from "../client/client.js";
import type { Change } from "../client/types.js";

export interface RemodelOptions {
  readonly file: string;
  readonly wait?: boolean;
  readonly pollInterval?: number;
  readonly timeout?: number;
}

export interface RemodelResult {
  readonly changeId: string;
  readonly change?: Change;
}

export async function runRemodelCommand(
  client: DaemonClient,
  options: RemodelOptions,
): Promise<RemodelResult> {
  if (options.timeout !== undefined) {
    checkTimeout(options.timeout, String(options.timeout));
  }
  const data = await fs.readFile(options.file);
  const changeId = await client.remodel(new Uint8Array(data));
  if (options.wait === false) {
    return { changeId };
  }

  const change = await client.waitChange(changeId, {
    pollInterval: options.pollInterval,
    timeout: options.timeout,
  });
  return { changeId, change };
}

export function parseTimeout(value: string): number {
  return checkTimeout(value.trim() === "" ? Number.NaN : Number(value), value);
}

function checkTimeout(timeout: number, raw: string): number {
  if (!Number.isFinite(timeout) || timeout < 0) {
    throw new Error(`Invalid timeout: ${raw}`);
  }
  return timeout;
}
