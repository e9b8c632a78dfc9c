import axios from 'axios';
import type { AxiosRequestConfig } from 'axios';

export interface HttpResponse {
  data: unknown;
  status: number;
  headers: unknown;
}

/**
 * The slice of an axios instance the indexer and download-client adapters use.
 * Tests hand the adapters an in-process stand-in with the same shape.
 */
export interface HttpClient {
  get(url: string, config?: AxiosRequestConfig): Promise<HttpResponse>;
  post(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<HttpResponse>;
}

export function createHttpClient(baseURL: string | undefined, timeoutMs: number): HttpClient {
  const instance = axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { 'User-Agent': 'tomefetch/0.1' },
  });
  return {
    get: (url, config) => instance.get(url, config),
    post: (url, data, config) => instance.post(url, data, config),
  };
}

/** First `set-cookie` header value, trimmed to its name=value pair. */
export function readCookie(headers: unknown, name: string): string | null {
  if (typeof headers !== 'object' || headers === null) return null;
  const raw = Object.getOwnPropertyDescriptor(headers, 'set-cookie')?.value;
  const values: unknown[] = Array.isArray(raw) ? raw : typeof raw === 'string' ? [raw] : [];
  for (const value of values) {
    if (typeof value !== 'string') continue;
    const pair = value.split(';')[0].trim();
    if (pair.startsWith(`${name}=`)) return pair;
  }
  return null;
}

/** Header value from an axios headers object or a plain record. */
export function readHeader(headers: unknown, name: string): string | null {
  if (typeof headers !== 'object' || headers === null) return null;
  const value = Object.getOwnPropertyDescriptor(headers, name.toLowerCase())?.value;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}
