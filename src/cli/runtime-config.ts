import { DEFAULT_SOCKET_PATH } from "../client/client.js";
import type { DaemonClientOptions } from "../client/client.js";

export interface ConnectionOptions {
  readonly socket?: string;
  readonly url?: string;
  readonly verbose?: boolean;
}

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Flags win over DEVMGR_URL / DEVMGR_SOCKET, which win over the default
 * socket. A URL, from either source, wins over a socket from the same source.
 */
export function resolveClientOptions(
  options: ConnectionOptions,
  env: Environment = process.env,
  debug?: (message: string) => void,
): DaemonClientOptions {
  const verboseHook = options.verbose ? debug : undefined;

  if (options.url) {
    return { baseUrl: options.url, debug: verboseHook };
  }
  if (options.socket) {
    return { socketPath: options.socket, debug: verboseHook };
  }
  if (env.DEVMGR_URL) {
    return { baseUrl: env.DEVMGR_URL, debug: verboseHook };
  }
  return {
    socketPath: env.DEVMGR_SOCKET || DEFAULT_SOCKET_PATH,
    debug: verboseHook,
  };
}
