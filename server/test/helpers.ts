import { Headers, Response } from 'node-fetch';
import { vi } from 'vitest';
import type { FetchLike } from '../src/apiClient.js';
import { ApiError, isApiError } from '../src/errors.js';

export function json(body: unknown, status = 200, headers: Record<string, string> = {}) {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json', ...headers } });
}

export function text(body: string, status: number, headers: Record<string, string> = {}) {
  return new Response(body, { status, headers });
}

/** A fetch that answers with the queued responses (or throws the queued errors) in order. */
export function queueFetch(...responses: Array<Response | Error>) {
  const queue = [...responses];
  return vi.fn<FetchLike>(async () => {
    const next = queue.shift();
    if (next === undefined) throw new Error('unexpected request');
    if (next instanceof Error) throw next;
    return next;
  });
}

export function recordSleep() {
  const calls: number[] = [];
  const sleep = async (ms: number) => {
    calls.push(ms);
  };
  return { calls, sleep };
}

export function requestUrl(fetch: ReturnType<typeof queueFetch>, call: number) {
  return fetch.mock.calls[call][0];
}

export function requestHeaders(fetch: ReturnType<typeof queueFetch>, call: number) {
  return new Headers(fetch.mock.calls[call][1].headers);
}

export async function failure(promise: Promise<unknown>): Promise<ApiError> {
  try {
    await promise;
  } catch (err) {
    if (isApiError(err)) return err;
    throw err;
  }
  throw new Error('expected the call to fail');
}
