export { fetchWithTimeout, readBodySafely, RequestTimeoutError } from './http';
export type { FetchFn } from './http';
