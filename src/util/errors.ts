/**
 * Error taxonomy for the Protect integration client.
 * Every failure in the request/decode/lookup chain surfaces as one of these.
 */

import { STATUS_CODES } from "node:http";

export class ProtectError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProtectError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Connection, DNS, timeout or malformed-envelope failure. */
export class TransportError extends ProtectError {
  public readonly code: string | undefined;

  constructor(message: string, code?: string, cause?: unknown) {
    super(message, { cause });
    this.name = "TransportError";
    this.code = code;
  }
}

/**
 * Non-2xx answer from the controller. The response body is never attached.
 * `code` is the HTTP status; on TransportError it is the socket error code instead.
 */
export class HTTPStatusError extends ProtectError {
  public readonly status: number;
  public readonly reason: string;

  get code(): number {
    return this.status;
  }

  constructor(status: number) {
    const reason = reasonPhrase(status);
    super(`HTTP ${status} ${reason}`);
    this.name = "HTTPStatusError";
    this.status = status;
    this.reason = reason;
  }
}

export class DecodingError extends ProtectError {
  public readonly resource: string;
  public readonly path: string | undefined;

  constructor(resource: string, detail: string, path?: string) {
    super(
      path
        ? `Failed to decode ${resource} at ${path}: ${detail}`
        : `Failed to decode ${resource}: ${detail}`
    );
    this.name = "DecodingError";
    this.resource = resource;
    this.path = path;
  }
}

export class NotFoundError extends ProtectError {
  public readonly resource: string;
  public readonly key: string;

  constructor(resource: string, key: string) {
    const label = resource.charAt(0).toUpperCase() + resource.slice(1);
    super(`${label} '${key}' not found`);
    this.name = "NotFoundError";
    this.resource = resource;
    this.key = key;
  }
}

export function reasonPhrase(status: number): string {
  return STATUS_CODES[status] ?? "Unknown Status";
}
