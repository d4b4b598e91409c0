import http from "node:http";
import type { Transport, TransportRequest, TransportResponse } from "./types.js";

export interface HttpTransportOptions {
  readonly socketPath?: string;
  readonly baseUrl?: string;
}

/**
 * Talks HTTP/1.1 to the daemon, either over its unix socket or over TCP.
 * Errors from the socket are passed through untouched.
 */
export class HttpTransport implements Transport {
  private readonly socketPath?: string;
  private readonly baseUrl: URL;

  constructor(options: HttpTransportOptions) {
    if (!options.socketPath && !options.baseUrl) {
      throw new Error("HttpTransport needs a socketPath or a baseUrl");
    }
    this.socketPath = options.baseUrl ? undefined : options.socketPath;
    this.baseUrl = new URL(options.baseUrl ?? "http://localhost");
  }

  send(request: TransportRequest): Promise<TransportResponse> {
    const url = new URL(request.path, this.baseUrl);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = { ...request.headers };
    if (request.body !== undefined) {
      headers["Content-Length"] = String(Buffer.byteLength(request.body));
    }

    const options: http.RequestOptions = this.socketPath
      ? { socketPath: this.socketPath, path: url.pathname + url.search }
      : {
          hostname: url.hostname,
          port: url.port,
          path: url.pathname + url.search,
        };

    return new Promise<TransportResponse>((resolve, reject) => {
      const req = http.request(
        { ...options, method: request.method, headers },
        (res) => {
          const chunks: Buffer[] = [];
          res.on("data", (chunk: Buffer) => chunks.push(chunk));
          res.on("error", reject);
          res.on("end", () => {
            resolve({
              status: res.statusCode ?? 0,
              statusText: res.statusMessage,
              headers: flattenHeaders(res.headers),
              body: new Uint8Array(Buffer.concat(chunks)),
            });
          });
        },
      );
      req.on("error", reject);
      req.end(request.body);
    });
  }
}

function flattenHeaders(
  headers: http.IncomingHttpHeaders,
): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(", ") : value;
  }
  return flat;
}
