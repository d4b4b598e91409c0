export class ClientError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ClientError";
  }
}

export class RequestError extends ClientError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RequestError";
  }
}

export interface ApiErrorDetails {
  readonly statusCode: number;
  readonly status?: string;
  readonly kind?: string;
  readonly value?: unknown;
}

export class ApiError extends ClientError {
  readonly statusCode: number;
  readonly status?: string;
  readonly kind?: string;
  readonly value?: unknown;

  constructor(message: string, details: ApiErrorDetails) {
    super(message);
    this.name = "ApiError";
    this.statusCode = details.statusCode;
    this.status = details.status;
    this.kind = details.kind;
    this.value = details.value;
  }
}

export class DecodeError extends ClientError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DecodeError";
  }
}

export class ChangeError extends ClientError {
  readonly changeId: string;

  constructor(changeId: string, message: string) {
    super(message);
    this.name = "ChangeError";
    this.changeId = changeId;
  }
}

export function isWrapper(error: unknown): error is Error & { cause: unknown } {
  return error instanceof Error && error.cause !== undefined;
}

export function rootCause(error: unknown): unknown {
  let current = error;
  const seen = new Set<unknown>();
  while (isWrapper(current) && !seen.has(current)) {
    seen.add(current);
    current = current.cause;
  }
  return current;
}
