import type { Assertion } from "../asserts/assertion.js";
import { decodeAssertion } from "../asserts/decoder.js";
import type { AssertionDecoder } from "../asserts/decoder.js";
import { parseChange, parseEnvelope, toApiError } from "./envelope.js";
import { ChangeError, DecodeError, RequestError } from "./errors.js";
import { HttpTransport } from "./transport.js";
import type {
  Change,
  Envelope,
  HttpMethod,
  Transport,
  TransportRequest,
  TransportResponse,
  WaitOptions,
} from "./types.js";

export const DEFAULT_SOCKET_PATH = "/run/devmgr.socket";

const MODEL_PATH = "/v2/model";
const SERIAL_PATH = "/v2/model/serial";
const CHANGES_PATH = "/v2/changes";

export interface DaemonClientOptions {
  transport?: Transport;
  socketPath?: string;
  baseUrl?: string;
  decoder?: AssertionDecoder;
  debug?: (message: string) => void;
}

export class DaemonClient {
  private readonly transport: Transport;
  private readonly decoder: AssertionDecoder;
  private readonly debug?: (message: string) => void;

  constructor(options: DaemonClientOptions = {}) {
    this.transport =
      options.transport ??
      new HttpTransport({
        socketPath: options.socketPath ?? DEFAULT_SOCKET_PATH,
        baseUrl: options.baseUrl,
      });
    this.decoder = options.decoder ?? decodeAssertion;
    this.debug = options.debug;
  }

  // The new model is sent as given; the daemon does the validation.
  async remodel(newModel: string | Uint8Array): Promise<string> {
    const data =
      typeof newModel === "string"
        ? newModel
        : new TextDecoder().decode(newModel);
    const body = JSON.stringify({ "new-model": data });
    return this.doAsync("POST", MODEL_PATH, body);
  }

  async currentModelAssertion(): Promise<Assertion> {
    return this.currentAssertion(MODEL_PATH);
  }

  async currentSerialAssertion(): Promise<Assertion> {
    return this.currentAssertion(SERIAL_PATH);
  }

  async change(id: string): Promise<Change> {
    const result = await this.doSync(
      "GET",
      `${CHANGES_PATH}/${encodeURIComponent(id)}`,
    );
    const parsed = parseChange(result);
    if (!parsed.ok) {
      throw parsed.error;
    }
    return parsed.value;
  }

  async waitChange(id: string, options: WaitOptions = {}): Promise<Change> {
    const pollInterval = options.pollInterval ?? 1000;
    const timeout = options.timeout ?? 300000;
    const deadline = Date.now() + timeout;

    for (;;) {
      const change = await this.change(id);
      if (change.ready) {
        if (change.err) {
          throw new ChangeError(id, change.err);
        }
        return change;
      }
      const remaining = deadline - Date.now();
      if (!(remaining > 0)) {
        break;
      }
      await new Promise((resolve) =>
        setTimeout(resolve, Math.min(pollInterval, remaining)),
      );
    }

    throw new ChangeError(
      id,
      `change ${id} did not complete within ${timeout}ms`,
    );
  }

  private async currentAssertion(path: string): Promise<Assertion> {
    const response = await this.send({ method: "GET", path, headers: {} });
    if (response.status !== 200) {
      throw this.responseError(response);
    }
    const decoded = this.decoder(response.body);
    if (!decoded.ok) {
      throw new DecodeError(
        `failed to decode assertion: ${decoded.error.message}`,
        { cause: decoded.error },
      );
    }
    return decoded.value;
  }

  private async doSync(method: HttpMethod, path: string): Promise<unknown> {
    const envelope = await this.request(method, path);
    if (envelope.type !== "sync") {
      throw new DecodeError(
        `expected sync response for ${method} on ${path}, got ${envelope.type}`,
      );
    }
    return envelope.result;
  }

  private async doAsync(
    method: HttpMethod,
    path: string,
    body: string,
  ): Promise<string> {
    const envelope = await this.request(method, path, body);
    if (envelope.type !== "async") {
      throw new DecodeError(
        `expected async response for ${method} on ${path}, got ${envelope.type}`,
      );
    }
    return envelope.change;
  }

  private async request(
    method: HttpMethod,
    path: string,
    body?: string,
  ): Promise<Envelope> {
    const headers: Record<string, string> =
      body === undefined ? {} : { "Content-Type": "application/json" };
    const response = await this.send({ method, path, headers, body });
    const parsed = parseEnvelope(
      new TextDecoder().decode(response.body),
      response.status,
    );
    if (!parsed.ok) {
      throw parsed.error;
    }
    if (parsed.value.type === "error") {
      throw toApiError(parsed.value);
    }
    return parsed.value;
  }

  private async send(request: TransportRequest): Promise<TransportResponse> {
    this.debug?.(`${request.method} ${request.path}`);
    let response: TransportResponse;
    try {
      response = await this.transport.send(request);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RequestError(`cannot communicate with server: ${message}`, {
        cause: error,
      });
    }
    this.debug?.(`${request.method} ${request.path} -> ${response.status}`);
    return response;
  }

  private responseError(response: TransportResponse): Error {
    const contentType = response.headers["content-type"] ?? "";
    if (contentType.startsWith("application/json")) {
      const parsed = parseEnvelope(
        new TextDecoder().decode(response.body),
        response.status,
      );
      if (parsed.ok && parsed.value.type === "error") {
        return toApiError(parsed.value);
      }
    }
    return new DecodeError(`server error: ${describeStatus(response)}`);
  }
}

function describeStatus(response: TransportResponse): string {
  return response.statusText
    ? `${response.status} ${response.statusText}`
    : String(response.status);
}
