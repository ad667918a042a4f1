/**
 * HTTP layer shared by the sync engine and the resource managers
 */

import axios, { type AxiosAdapter, type AxiosInstance, type Method } from 'axios';
import { CONSTANTS } from './constants';
import {
  ApiError,
  AuthError,
  ForbiddenError,
  NotFoundError,
  RateLimitError,
  TransportError,
} from './errors';
import type { AuthMode } from './types';

export interface ApiResponse {
  status: number;
  data: unknown;
  /** True when the server sent no body (or only whitespace). */
  empty: boolean;
}

export interface RequestOptions {
  params?: Record<string, string | number | boolean | undefined>;
  data?: unknown;
}

export interface ApiClientOptions {
  baseUrl?: string;
  token?: string;
  authMode?: AuthMode;
  timeoutMs?: number;
  /** Replaces the network adapter; tests use it to serve responses in-process. */
  adapter?: AxiosAdapter;
}

const DEVICE_HEADER = JSON.stringify({
  platform: 'web',
  os: 'macOS 10.15.7',
  device: 'Chrome 120.0.0.0',
  name: '',
  version: 6010,
  id: 'web_client',
  channel: 'website',
  campaign: '',
  websocket: '',
});

export function isEmptyBody(data: unknown): boolean {
  if (data === undefined || data === null) return true;
  if (typeof data === 'string') return data.trim() === '';
  return false;
}

function describeBody(data: unknown): string {
  if (typeof data === 'string') return data.substring(0, 500);
  try {
    return (JSON.stringify(data) ?? '').substring(0, 500);
  } catch {
    return String(data);
  }
}

function readString(source: unknown, key: string): string {
  if (typeof source === 'object' && source !== null && key in source) {
    const value: unknown = Reflect.get(source, key);
    return typeof value === 'string' ? value : '';
  }
  return '';
}

export class ApiClient {
  private client: AxiosInstance;
  readonly authMode: AuthMode;

  constructor(options: ApiClientOptions = {}) {
    this.authMode = options.authMode ?? 'session';
    this.client = axios.create({
      baseURL: (options.baseUrl ?? CONSTANTS.BASE_URL).replace(/\/$/, ''),
      timeout: options.timeoutMs ?? CONSTANTS.REQUEST_TIMEOUT_MS,
      headers: {
        'User-Agent':
          'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 ' +
          '(KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
        'Accept': 'application/json, text/plain, */*',
        'Content-Type': 'application/json',
        'x-device': DEVICE_HEADER,
        'Origin': 'https://ticktick.com',
        'Referer': 'https://ticktick.com/',
      },
      ...(options.adapter && { adapter: options.adapter }),
    });

    if (options.token) {
      this.setToken(options.token);
    }
  }

  /**
   * Attach credentials: the web session cookie, or a bearer token for API-token mode
   */
  setToken(token: string): void {
    if (this.authMode === 'session') {
      this.client.defaults.headers.common['Cookie'] = `t=${token}`;
      delete this.client.defaults.headers.common['Authorization'];
    } else {
      this.client.defaults.headers.common['Authorization'] = `Bearer ${token}`;
      delete this.client.defaults.headers.common['Cookie'];
    }
  }

  async request(method: Method, endpoint: string, options: RequestOptions = {}): Promise<ApiResponse> {
    try {
      const response = await this.client.request({
        method,
        url: endpoint,
        params: options.params,
        data: options.data,
      });
      return {
        status: response.status,
        data: response.data,
        empty: isEmptyBody(response.data),
      };
    } catch (error) {
      throw this.translateError(method, endpoint, error);
    }
  }

  get(endpoint: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('GET', endpoint, options);
  }

  post(endpoint: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('POST', endpoint, options);
  }

  put(endpoint: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('PUT', endpoint, options);
  }

  delete(endpoint: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('DELETE', endpoint, options);
  }

  private translateError(method: string, endpoint: string, error: unknown): TransportError {
    if (!axios.isAxiosError(error) || !error.response) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`HTTP ${method} ${endpoint} failed: ${message}`);
      const code = axios.isAxiosError(error) && error.code === 'ECONNABORTED' ? 'TIMEOUT' : 'TRANSPORT_ERROR';
      return new TransportError(`${method} ${endpoint} failed: ${message}`, error, code);
    }

    const { status, data, headers } = error.response;
    console.error(`HTTP ${method} ${endpoint} -> ${status}: ${describeBody(data)}`);

    const text = describeBody(data).substring(0, 200);
    switch (status) {
      case 401:
        return new AuthError(`Authentication failed: ${text}`, error);
      case 403:
        return new ForbiddenError(`Access denied: ${text}`, error);
      case 404:
        return new NotFoundError(`Resource not found: ${text}`, error);
      case 429: {
        const raw: unknown = headers['retry-after'];
        const retryAfter = typeof raw === 'string' || typeof raw === 'number' ? parseInt(String(raw), 10) : NaN;
        return new RateLimitError(Number.isNaN(retryAfter) ? null : retryAfter, error);
      }
      default: {
        const errorCode = readString(data, 'errorCode');
        const errorMessage = readString(data, 'errorMessage') || (typeof data === 'string' ? text : '');
        return new ApiError(status, errorCode, errorMessage, error);
      }
    }
  }
}
