import axios, { type AxiosInstance, type AxiosResponse, type Method } from "axios";
import { randomUUID } from "node:crypto";
import { HTTPStatusError, TransportError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

// ============ TYPES ============

export const MIME_TYPES = {
  json: "application/json",
  jpeg: "image/jpeg",
} as const;

export interface ProtectConnection {
  /** Controller host, optionally with a port: "192.168.1.1" or "nvr.local:7443". */
  host: string;
  apiKey: string;
  /** Transport. Defaults to a fresh axios instance. */
  http?: AxiosInstance;
  logger?: Logger;
}

type RequestTarget =
  | { path: string; url?: undefined }
  | { url: string; path?: undefined };

export type RequestOptions = RequestTarget & {
  /** Replaces the default headers entirely when given. */
  headers?: Record<string, string>;
  method?: Method;
  body?: string | Buffer;
  /** Expected response type, sent as Accept. */
  accepting?: string;
};

// ============ CLIENT ============

/**
 * Sends single authenticated requests to the Protect integration API.
 * Status validation happens here, never in the transport.
 */
export class ProtectClient {
  readonly baseUrl: string;
  private apiKey: string;
  private http: AxiosInstance;
  private logger: Logger;

  constructor(connection: ProtectConnection) {
    this.baseUrl = `http://${connection.host}/proxy/protect/integration/v1`;
    this.apiKey = connection.apiKey;
    this.http = connection.http ?? axios.create();
    this.logger = connection.logger ?? createLogger("ProtectClient");
  }

  buildUrl(path: string): string {
    return `${this.baseUrl}/${path.replace(/^\/+/, "")}`;
  }

  async request(options: RequestOptions): Promise<Buffer> {
    const requestId = `Req ${randomUUID().slice(0, 6)}`;
    const target = options.path !== undefined ? this.buildUrl(options.path) : options.url;
    const method = options.method ?? "GET";
    const headers = options.headers ?? {
      "X-API-KEY": this.apiKey,
      "Content-Type": MIME_TYPES.json,
      Accept: options.accepting ?? MIME_TYPES.json,
    };

    this.logger.trace(`[${requestId}] Request headers`, redact(headers));
    this.logger.info(`[${requestId}] Sending ${method} ${target}`);

    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await this.http.request<ArrayBuffer>({
        url: target,
        method,
        headers,
        data: options.body,
        responseType: "arraybuffer",
        validateStatus: () => true,
      });
    } catch (err) {
      this.logger.warn(`[${requestId}] Transport failure`, { error: String(err) });
      if (axios.isAxiosError(err)) {
        throw new TransportError(`${method} ${target} failed: ${err.message}`, err.code, err);
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`${method} ${target} failed: ${message}`, undefined, err);
    }

    this.logger.debug(`[${requestId}] Received response: ${response.status}`);
    if (response.status < 200 || response.status > 299) {
      throw new HTTPStatusError(response.status);
    }

    const body = response.data ? Buffer.from(response.data) : Buffer.alloc(0);
    this.logger.trace(`[${requestId}] Response body (first 200 chars): ${body.subarray(0, 200).toString("utf8")}`);
    return body;
  }
}

function redact(headers: Record<string, string>): Record<string, string> {
  const copy = { ...headers };
  for (const key of Object.keys(copy)) {
    if (key.toLowerCase() === "x-api-key") copy[key] = "***";
  }
  return copy;
}
