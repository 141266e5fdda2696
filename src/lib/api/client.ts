import { API_URL } from '@/lib/constants';

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export class ApiClientError extends Error {
  constructor(
    public status: number,
    public code: string,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiClientError';
  }
}

export interface RequestOptions extends RequestInit {
  params?: Record<string, string | number | boolean | undefined>;
}

let accessToken: string | null = null;

/**
 * Bearer token sent to the market-data API, if it requires one.
 */
export function setAccessToken(token: string | null) {
  accessToken = token;
}

function isApiError(value: unknown): value is ApiError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    typeof value.code === 'string' &&
    typeof value.message === 'string'
  );
}

async function readError(response: Response): Promise<ApiError> {
  const fallback: ApiError = {
    code: 'UNKNOWN_ERROR',
    message: response.statusText || 'An unknown error occurred',
  };
  try {
    const body: unknown = await response.json();
    return isApiError(body) ? body : fallback;
  } catch {
    return fallback;
  }
}

async function handleResponse<T>(response: Response): Promise<T> {
  if (!response.ok) {
    const errorBody = await readError(response);
    throw new ApiClientError(
      response.status,
      errorBody.code,
      errorBody.message,
      errorBody.details
    );
  }

  // Handle 204 No Content
  if (response.status === 204) {
    throw new ApiClientError(204, 'EMPTY_RESPONSE', 'Expected a response body');
  }

  return response.json();
}

export async function apiClient<T>(
  endpoint: string,
  options: RequestOptions = {}
): Promise<T> {
  const { params, ...fetchOptions } = options;

  // Build URL with query params
  const url = new URL(`${API_URL}${endpoint}`);
  if (params) {
    Object.entries(params).forEach(([key, value]) => {
      if (value !== undefined) {
        url.searchParams.append(key, String(value));
      }
    });
  }

  const headers = new Headers(fetchOptions.headers);
  headers.set('Accept', 'application/json');
  if (!headers.has('Content-Type') && fetchOptions.body) {
    headers.set('Content-Type', 'application/json');
  }
  if (accessToken) {
    headers.set('Authorization', `Bearer ${accessToken}`);
  }

  const response = await fetch(url.toString(), {
    ...fetchOptions,
    headers,
  });

  return handleResponse<T>(response);
}

// Convenience methods
export const api = {
  get: <T>(endpoint: string, options?: RequestOptions) =>
    apiClient<T>(endpoint, { ...options, method: 'GET' }),
};
