/**
 * HTTP Transport
 * @module server/transport
 *
 * Fastify instance with a single catch-all route. Every request body is
 * read as raw bytes whatever its content type, turned into a
 * RecordedRequest and handed to the dispatcher.
 *
 * Fastify skips content-type parsing for GET and HEAD, so a payload sent
 * with those methods is read off the socket in the route itself.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { fastify, type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import { BindError, TransportError, toError } from '../errors/index.js';
import type { StructuredLogger } from '../logging/index.js';
import type { ResponseTemplate } from '../mocks/response-template.js';
import { HeaderMap } from '../types/headers.js';
import { createRecordedRequest, type RecordedRequest } from '../types/request.js';
import type { RuleId } from '../types/utility.js';
import errorHandler from './error-handler.js';

/**
 * What the dispatcher decided for one request
 */
export interface DispatchResult {
  /** The request as stamped and recorded */
  request: RecordedRequest;
  /** Rule that answered, absent when none matched */
  ruleId?: RuleId;
  response: ResponseTemplate;
}

export type Dispatcher = (request: RecordedRequest) => DispatchResult;

export interface BoundAddress {
  host: string;
  port: number;
  family: string;
}

export interface TransportOptions {
  bodyLimit: number;
  shutdownTimeoutMs: number;
  logger: StructuredLogger;
}

/**
 * Build the Fastify instance that feeds `dispatch`
 */
export async function buildTransportApp(dispatch: Dispatcher, options: TransportOptions): Promise<FastifyInstance> {
  const app = fastify({
    logger: false,
    disableRequestLogging: true,
    exposeHeadRoutes: false,
    bodyLimit: options.bodyLimit,
    forceCloseConnections: 'idle',
  });

  await app.register(errorHandler, { logger: options.logger });

  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  app.all('*', async (request: FastifyRequest, reply: FastifyReply) => {
    const unparsed = request.body === undefined ? await readUnparsedBody(request, options.bodyLimit) : undefined;
    const result = dispatch(toRecordedRequest(request, unparsed));
    const { response } = result;

    if (response.delayMs > 0) {
      await sleep(response.delayMs);
    }

    reply.code(response.status);
    for (const [name, values] of response.headers) {
      reply.header(name, values.length === 1 ? values[0] : [...values]);
    }
    return reply.send(response.body);
  });

  return app;
}

/**
 * Read a payload Fastify left on the stream. Resolves undefined when the
 * request announces no body.
 *
 * @throws TransportError with status 413 past `bodyLimit`
 */
export async function readUnparsedBody(request: FastifyRequest, bodyLimit: number): Promise<Buffer | undefined> {
  const { headers } = request.raw;
  const announced = Number(headers['content-length'] ?? 0);
  if (headers['transfer-encoding'] === undefined && !(announced > 0)) {
    return undefined;
  }
  if (announced > bodyLimit) {
    throw new TransportError(`Request body of ${announced} bytes exceeds the ${bodyLimit} byte limit`, 413);
  }

  const chunks: Buffer[] = [];
  let received = 0;
  for await (const chunk of request.raw) {
    const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    received += bytes.length;
    if (received > bodyLimit) {
      throw new TransportError(`Request body exceeds the ${bodyLimit} byte limit`, 413);
    }
    chunks.push(bytes);
  }
  return Buffer.concat(chunks);
}

/**
 * Snapshot the incoming request. Headers come from the raw header list so
 * repeated headers keep their order. `unparsed` stands in for a body Fastify
 * did not read.
 */
export function toRecordedRequest(request: FastifyRequest, unparsed?: Buffer): RecordedRequest {
  return createRecordedRequest({
    method: request.raw.method ?? request.method,
    url: request.raw.url ?? request.url,
    headers: request.raw.rawHeaders.length > 0
      ? HeaderMap.fromRawHeaders(request.raw.rawHeaders)
      : new HeaderMap(request.headers),
    body: Buffer.isBuffer(request.body) ? request.body : unparsed,
  });
}

/**
 * Fastify transport bound to one address for its whole life
 */
export class HttpTransport {
  private bound: BoundAddress | undefined;

  private constructor(
    private readonly app: FastifyInstance,
    private readonly options: TransportOptions
  ) {}

  static async create(dispatch: Dispatcher, options: TransportOptions): Promise<HttpTransport> {
    return new HttpTransport(await buildTransportApp(dispatch, options), options);
  }

  get address(): BoundAddress | undefined {
    return this.bound;
  }

  /**
   * Bind and start accepting connections
   *
   * @throws BindError
   */
  async listen(host: string, port: number): Promise<BoundAddress> {
    try {
      await this.app.listen({ host, port });
    } catch (error) {
      await this.app.close();
      throw new BindError(host, port, toError(error), { operation: 'listen' });
    }

    const address = this.app.server.address();
    if (address === null || typeof address === 'string') {
      await this.app.close();
      throw new BindError(host, port, new Error(`Unexpected listen address: ${String(address)}`), { operation: 'listen' });
    }

    this.bound = { host: address.address, port: address.port, family: address.family };
    return this.bound;
  }

  /**
   * Stop accepting connections and wait for in-flight requests. Connections
   * still open after the shutdown timeout are destroyed.
   */
  async close(): Promise<void> {
    const timer = setTimeout(() => {
      this.options.logger.warn(
        { timeoutMs: this.options.shutdownTimeoutMs },
        'Shutdown timeout reached, closing remaining connections'
      );
      this.app.server.closeAllConnections();
    }, this.options.shutdownTimeoutMs);
    timer.unref();

    try {
      await this.app.close();
    } finally {
      clearTimeout(timer);
    }
  }
}
