export { api, apiClient, setAccessToken, ApiClientError } from './client';
export type { ApiError, RequestOptions } from './client';

export { sectorsApi } from './sectors';
