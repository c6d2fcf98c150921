/**
 * Control plane API client
 * @module @tidewater/cli/api-client
 */

export const DEFAULT_API_URL = 'http://127.0.0.1:9000';

export interface ApiClientOptions {
  apiUrl?: string;
  /** Sent as a Bearer token when set */
  token?: string;
}

/**
 * Non-2xx answer from the control plane
 */
export class ApiRequestError extends Error {
  readonly status: number;
  readonly code?: string;

  constructor(message: string, status: number, code?: string) {
    super(message);
    this.name = 'ApiRequestError';
    this.status = status;
    this.code = code;
  }
}

function describeFailure(status: number, body: unknown): ApiRequestError {
  if (typeof body === 'object' && body !== null && 'error' in body) {
    const { error } = body;
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return new ApiRequestError(error.message, status, code);
    }
  }
  return new ApiRequestError(`Request failed with status ${status}`, status);
}

export interface ApiClient {
  get(path: string): Promise<unknown>;
}

export function createApiClient(options: ApiClientOptions = {}): ApiClient {
  const baseUrl = (options.apiUrl ?? process.env.TIDEWATER_API_URL ?? DEFAULT_API_URL).replace(/\/+$/, '');
  const token = options.token ?? process.env.TIDEWATER_API_TOKEN;

  const headers: Record<string, string> = { Accept: 'application/json' };
  if (token) {
    headers['Authorization'] = `Bearer ${token}`;
  }

  return {
    get: async (path: string) => {
      const response = await fetch(`${baseUrl}${path}`, { method: 'GET', headers });
      const text = await response.text();
      let body: unknown;
      try {
        body = text.length > 0 ? JSON.parse(text) : null;
      } catch {
        body = text;
      }
      if (!response.ok) {
        throw describeFailure(response.status, body);
      }
      return body;
    },
  };
}
