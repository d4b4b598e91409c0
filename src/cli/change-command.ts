import type { DaemonClient } from "../client/client.js";
import { renderChange } from "../report/text-reporter.js";

export async function runChangeCommand(
  client: DaemonClient,
  id: string,
): Promise<string> {
  const change = await client.change(id);
  return renderChange(change);
}
