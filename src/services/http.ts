import fetch, { FetchError } from 'node-fetch';
import type { RequestInit, Response } from 'node-fetch';
import { NetworkError } from '../models/errors';

export const USER_AGENT = 'questshelf/0.3';

/**
 * Transport used for every HTTP request; tests substitute their own
 */
export type FetchFunction = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchFunction = (url, init) => fetch(url, init);

/**
 * GET `url` and fail with NetworkError unless the status is 2xx.
 * A `timeoutMs` of 0 disables the timeout.
 */
export const fetchOk = async (
  fetchFn: FetchFunction,
  url: string,
  timeoutMs: number
): Promise<Response> => {
  let response: Response;
  try {
    response = await fetchFn(url, {
      headers: { 'User-Agent': USER_AGENT },
      timeout: timeoutMs
    });
  } catch (error) {
    throw toNetworkError(error, url);
  }

  if (!response.ok) {
    throw new NetworkError(`Request to ${url} failed: ${response.status} ${response.statusText}`, response.status);
  }
  return response;
};

/**
 * Classifies transport failures, including ones raised while reading a body
 */
export const toNetworkError = (error: unknown, url: string): NetworkError => {
  if (error instanceof NetworkError) {
    return error;
  }
  if (error instanceof FetchError && (error.type === 'request-timeout' || error.type === 'body-timeout')) {
    return new NetworkError(`Request to ${url} timed out`, undefined, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(`Request to ${url} failed: ${message}`, undefined, { cause: error });
};
