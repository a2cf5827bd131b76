/**
 * In-process stand-in for the controller: an axios instance whose adapter
 * records every request and answers from a handler.
 */

import axios, {
  type AxiosAdapter,
  type AxiosHeaders,
  type AxiosInstance,
  type InternalAxiosRequestConfig,
} from 'axios';

export interface FakeReply {
  status?: number;
  /** Objects are sent as JSON. */
  body?: string | Buffer | object;
}

export interface RecordedRequest {
  url: string | undefined;
  method: string | undefined;
  headers: AxiosHeaders;
  data: unknown;
}

export type FakeHandler = (config: InternalAxiosRequestConfig) => FakeReply | Promise<FakeReply>;

export interface FakeHttp {
  http: AxiosInstance;
  requests: RecordedRequest[];
}

function toBuffer(body: FakeReply['body']): Buffer {
  if (body === undefined) return Buffer.alloc(0);
  if (Buffer.isBuffer(body)) return body;
  return Buffer.from(typeof body === 'string' ? body : JSON.stringify(body), 'utf8');
}

export function createFakeHttp(handler: FakeHandler): FakeHttp {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    requests.push({
      url: config.url,
      method: config.method,
      headers: config.headers,
      data: config.data,
    });
    const reply = await handler(config);
    return {
      data: toBuffer(reply.body),
      status: reply.status ?? 200,
      statusText: '',
      headers: {},
      config,
      request: {},
    };
  };

  return { http: axios.create({ adapter }), requests };
}

/** Answers by URL suffix; anything unrouted gets a 404. */
export function routeBySuffix(routes: Record<string, FakeReply>): FakeHandler {
  return (config) => {
    const url = config.url ?? '';
    const match = Object.keys(routes).find((suffix) => url.endsWith(suffix));
    return match === undefined ? { status: 404 } : routes[match] ?? { status: 404 };
  };
}
