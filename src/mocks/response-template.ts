/**
 * Canned responses
 * @module mocks/response-template
 */

import { InvalidResponseError } from '../errors/index.js';
import { HeaderMap, type HeaderInit } from '../types/headers.js';

interface TemplateState {
  status: number;
  headers: HeaderMap;
  body: Buffer;
  delayMs: number;
}

/**
 * Immutable response template. Every builder method returns a new template,
 * so a template attached to a mounted rule can never change underneath it.
 *
 * @example
 * ```typescript
 * const created = ResponseTemplate.withStatus(201)
 *   .header('location', '/orders/42')
 *   .bodyJson({ id: 42 });
 * ```
 */
export class ResponseTemplate {
  readonly #state: TemplateState;

  private constructor(state: TemplateState) {
    this.#state = state;
    Object.freeze(this);
  }

  static withStatus(status: number): ResponseTemplate {
    return new ResponseTemplate({
      status: validateStatus(status),
      headers: new HeaderMap(),
      body: Buffer.alloc(0),
      delayMs: 0,
    });
  }

  static ok(): ResponseTemplate {
    return ResponseTemplate.withStatus(200);
  }

  /** The fallback for requests no rule answers: 404 with an empty body */
  static notFound(): ResponseTemplate {
    return ResponseTemplate.withStatus(404);
  }

  get status(): number {
    return this.#state.status;
  }

  get headers(): HeaderMap {
    return this.#state.headers;
  }

  /** A copy of the body bytes */
  get body(): Buffer {
    return Buffer.from(this.#state.body);
  }

  get delayMs(): number {
    return this.#state.delayMs;
  }

  // ==========================================================================
  // Builders
  // ==========================================================================

  statusCode(status: number): ResponseTemplate {
    return this.#with({ status: validateStatus(status) });
  }

  /** Replace every value of `name` with `value` */
  header(name: string, value: string | readonly string[]): ResponseTemplate {
    return this.#with({ headers: this.#state.headers.set(name, value) });
  }

  appendHeader(name: string, value: string): ResponseTemplate {
    return this.#with({ headers: this.#state.headers.append(name, value) });
  }

  headersFrom(init: HeaderInit): ResponseTemplate {
    let headers = this.#state.headers;
    for (const [name, values] of new HeaderMap(init)) {
      headers = headers.set(name, values);
    }
    return this.#with({ headers });
  }

  /** UTF-8 text body; sets content-type unless one was set already */
  bodyString(text: string, contentType = 'text/plain; charset=utf-8'): ResponseTemplate {
    return this.#withBody(Buffer.from(text, 'utf8'), contentType);
  }

  bodyJson(value: unknown): ResponseTemplate {
    const serialized = JSON.stringify(value);
    if (serialized === undefined) {
      throw new InvalidResponseError('Response body value is not JSON-serializable');
    }
    return this.#withBody(Buffer.from(serialized, 'utf8'), 'application/json');
  }

  bodyBytes(bytes: Uint8Array, contentType?: string): ResponseTemplate {
    return this.#withBody(Buffer.from(bytes), contentType);
  }

  /** Wait `ms` milliseconds before writing the response */
  delay(ms: number): ResponseTemplate {
    if (!Number.isInteger(ms) || ms < 0) {
      throw new InvalidResponseError(`Response delay must be a non-negative integer, got ${ms}`);
    }
    return this.#with({ delayMs: ms });
  }

  #withBody(body: Buffer, contentType: string | undefined): ResponseTemplate {
    const headers = contentType && !this.#state.headers.has('content-type')
      ? this.#state.headers.set('content-type', contentType)
      : this.#state.headers;
    return this.#with({ body, headers });
  }

  #with(changes: Partial<TemplateState>): ResponseTemplate {
    return new ResponseTemplate({ ...this.#state, ...changes });
  }
}

function validateStatus(status: number): number {
  if (!Number.isInteger(status) || status < 100 || status > 599) {
    throw new InvalidResponseError(`Response status must be an integer between 100 and 599, got ${status}`);
  }
  return status;
}
