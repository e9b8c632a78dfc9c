import type { AxiosRequestConfig } from 'axios';
import type { HttpClient, HttpResponse } from '../../src/utils/http';

export interface RecordedRequest {
  method: 'get' | 'post';
  url: string;
  data?: unknown;
  config?: AxiosRequestConfig;
}

export type Responder = (request: RecordedRequest) => HttpResponse | Promise<HttpResponse>;

export function respond(data: unknown, status = 200, headers: Record<string, unknown> = {}): HttpResponse {
  return { data, status, headers };
}

/** Records every request and answers from `responder`. */
export class FakeHttp implements HttpClient {
  readonly requests: RecordedRequest[] = [];

  constructor(private readonly responder: Responder) {}

  async get(url: string, config?: AxiosRequestConfig): Promise<HttpResponse> {
    const request: RecordedRequest = { method: 'get', url, config };
    this.requests.push(request);
    return this.responder(request);
  }

  async post(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<HttpResponse> {
    const request: RecordedRequest = { method: 'post', url, data, config };
    this.requests.push(request);
    return this.responder(request);
  }
}

export function paramOf(request: RecordedRequest, name: string): unknown {
  const params: unknown = request.config?.params;
  if (typeof params !== 'object' || params === null) return undefined;
  return Object.getOwnPropertyDescriptor(params, name)?.value;
}

export function formOf(request: RecordedRequest): URLSearchParams {
  return new URLSearchParams(typeof request.data === 'string' ? request.data : '');
}

export function headerOf(request: RecordedRequest, name: string): unknown {
  const headers: unknown = request.config?.headers;
  if (typeof headers !== 'object' || headers === null) return undefined;
  return Object.getOwnPropertyDescriptor(headers, name)?.value;
}
