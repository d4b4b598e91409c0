export type HttpMethod = "GET" | "POST";

export interface TransportRequest {
  readonly method: HttpMethod;
  readonly path: string;
  readonly query?: Readonly<Record<string, string>>;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string;
}

export interface TransportResponse {
  readonly status: number;
  readonly statusText?: string;
  // lower-case names
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Uint8Array;
}

export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export interface ErrorResult {
  readonly message: string;
  readonly kind?: string;
  readonly value?: unknown;
}

interface EnvelopeBase {
  readonly statusCode: number;
  readonly status?: string;
}

export interface SyncEnvelope extends EnvelopeBase {
  readonly type: "sync";
  readonly result: unknown;
}

export interface AsyncEnvelope extends EnvelopeBase {
  readonly type: "async";
  readonly result: unknown;
  readonly change: string;
}

export interface ErrorEnvelope extends EnvelopeBase {
  readonly type: "error";
  readonly result: ErrorResult;
}

export type Envelope = SyncEnvelope | AsyncEnvelope | ErrorEnvelope;

export interface Change {
  readonly id: string;
  readonly kind: string;
  readonly summary: string;
  readonly status: string;
  readonly ready: boolean;
  readonly err?: string;
  readonly spawnTime?: string;
  readonly readyTime?: string;
}

export interface WaitOptions {
  readonly pollInterval?: number;
  readonly timeout?: number;
}
