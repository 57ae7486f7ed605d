/**
 * Recorded request snapshot
 * @module types/request
 */

import { HeaderMap, type HeaderInit } from './headers.js';

/**
 * Parsed query string: each key keeps its values in order
 */
export type QueryParams = Readonly<Record<string, readonly string[]>>;

/**
 * Immutable snapshot of a request, captured when it reaches the server
 */
export interface RecordedRequest {
  /** Arrival number, starting at 1 for each server */
  readonly sequence: number;
  /** Method as received, upper-cased */
  readonly method: string;
  /** Raw request target: path plus query string */
  readonly url: string;
  /** Request target without the query string, not percent-decoded */
  readonly path: string;
  readonly query: QueryParams;
  readonly headers: HeaderMap;
  readonly body: Buffer;
  readonly receivedAt: Date;
}

/**
 * Plain description of a request, used to build a RecordedRequest
 */
export interface RecordedRequestInit {
  method: string;
  url: string;
  headers?: HeaderInit;
  body?: string | Uint8Array;
  sequence?: number;
  receivedAt?: Date;
}

/**
 * Split a request target into path and parsed query
 */
export function parseRequestTarget(url: string): { path: string; query: QueryParams } {
  const queryStart = url.indexOf('?');
  const path = queryStart === -1 ? url : url.slice(0, queryStart);
  const search = queryStart === -1 ? '' : url.slice(queryStart + 1);

  const query: Record<string, string[]> = Object.create(null);
  for (const [key, value] of new URLSearchParams(search)) {
    (query[key] ??= []).push(value);
  }
  for (const key of Object.keys(query)) {
    Object.freeze(query[key]);
  }

  return { path: path === '' ? '/' : path, query: Object.freeze(query) };
}

/**
 * Build an immutable RecordedRequest. The body is copied so later writes
 * to the caller's buffer do not reach the snapshot.
 */
export function createRecordedRequest(init: RecordedRequestInit): RecordedRequest {
  const { path, query } = parseRequestTarget(init.url);
  const body = typeof init.body === 'string'
    ? Buffer.from(init.body, 'utf8')
    : Buffer.from(init.body ?? new Uint8Array(0));

  return Object.freeze({
    sequence: init.sequence ?? 0,
    method: init.method.toUpperCase(),
    url: init.url,
    path,
    query,
    headers: init.headers instanceof HeaderMap ? init.headers : new HeaderMap(init.headers),
    body,
    receivedAt: init.receivedAt ?? new Date(),
  });
}

/**
 * Decode the body as UTF-8 text
 */
export function readBodyText(request: RecordedRequest): string {
  return request.body.toString('utf8');
}

/**
 * Parse the body as JSON; throws on malformed input
 */
export function readBodyJson(request: RecordedRequest): unknown {
  return JSON.parse(readBodyText(request));
}
