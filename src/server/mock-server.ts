/**
 * Mock Server
 * @module server/mock-server
 *
 * Lifecycle: created -> running -> stopping -> stopped. Mounting is refused
 * once stopping begins; unmounting and guard release stay allowed.
 */

import { AlreadyStoppedError, InvalidStateError, getErrorMessage } from '../errors/index.js';
import {
  ObjectConfigSource,
  loadConfig,
  resolveServerConfig,
  type BindOptions,
  type ServerConfig,
} from '../config/index.js';
import { createModuleLogger, withLogging, type StructuredLogger } from '../logging/index.js';
import { Mock, type MockDefinition } from '../mocks/mock.js';
import { ResponseTemplate } from '../mocks/response-template.js';
import type { RecordedRequest } from '../types/request.js';
import type { RuleId, RuleScope } from '../types/utility.js';
import { MountTable, type Rule } from './mount-table.js';
import { RequestLog } from './request-log.js';
import { ScopeGuard } from './scope-guard.js';
import { HttpTransport, type BoundAddress, type DispatchResult } from './transport.js';
import { VerificationReport } from './verification.js';

export type ServerState = 'created' | 'running' | 'stopping' | 'stopped';

export interface MockServerOptions extends Partial<ServerConfig> {
  /** Environment to read MOCK_SERVER_* variables from; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  logger?: StructuredLogger;
}

type Mountable = Mock | MockDefinition;

const NOT_FOUND = ResponseTemplate.notFound();

/**
 * Programmable HTTP mock server
 *
 * @example
 * ```typescript
 * const server = await MockServer.start();
 * server.mount(
 *   Mock.given(method('GET'), path('/health'))
 *     .respondWith(ResponseTemplate.ok().bodyString('up'))
 *     .expect(1)
 * );
 *
 * await fetch(`${server.uri()}/health`);
 * await server.stop(); // rejects with VerificationError on a miscount
 * ```
 */
export class MockServer {
  readonly config: ServerConfig;
  private readonly logger: StructuredLogger;
  private readonly table: MountTable;
  private readonly log: RequestLog;
  private transport: HttpTransport | undefined;
  private bound: BoundAddress | undefined;
  private currentState: ServerState = 'created';
  private starting: Promise<BoundAddress> | undefined;

  constructor(options: MockServerOptions = {}) {
    const { env, logger, ...configOptions } = options;
    this.config = resolveServerConfig(configOptions, env);
    this.logger = logger ?? createModuleLogger('mock-server');
    this.table = new MountTable(this.logger.child({ component: 'mount-table' }));
    this.log = new RequestLog(this.config.recordRequests);
  }

  /**
   * Construct and start a server in one step
   */
  static async start(options: MockServerOptions = {}): Promise<MockServer> {
    const server = new MockServer(options);
    await server.start();
    return server;
  }

  get state(): ServerState {
    return this.currentState;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Bind and start serving. Bind arguments override the configured address.
   *
   * @throws InvalidStateError unless the server was just created
   * @throws BindError when the address cannot be bound
   */
  async start(bind: BindOptions = {}): Promise<BoundAddress> {
    if (this.currentState !== 'created') {
      throw new InvalidStateError('start', this.currentState);
    }
    const { host, port } = loadConfig([
      new ObjectConfigSource('config', 0, this.config),
      new ObjectConfigSource('bind', 30, bind),
    ]);

    // Claim the transition before the first await so a second start() fails.
    this.currentState = 'running';
    const starting = this.bindTransport(host, port);
    this.starting = starting;
    try {
      return await starting;
    } finally {
      if (this.starting === starting) {
        this.starting = undefined;
      }
    }
  }

  /**
   * Stop accepting requests, drain in-flight ones, then verify every rule
   * still mounted.
   *
   * @throws AlreadyStoppedError when called on a stopped server
   * @throws InvalidStateError when a stop is already in progress
   * @throws VerificationError when any rule's expectation is not met
   */
  async stop(): Promise<VerificationReport> {
    if (this.currentState === 'stopped') {
      throw new AlreadyStoppedError({ operation: 'stop' });
    }
    if (this.currentState === 'stopping') {
      throw new InvalidStateError('stop', this.currentState);
    }

    const startTime = Date.now();
    this.currentState = 'stopping';
    this.logger.serverStopping(this.table.size);

    // A bind still in flight must finish first, or its listener outlives stop().
    // The caller of start() sees a bind failure; here it only means there is
    // nothing to drain.
    if (this.starting) {
      await this.starting.catch((error: unknown) => {
        this.logger.debug({ err: error }, `Start failed while stopping: ${getErrorMessage(error)}`);
      });
    }

    const transport = this.transport;
    try {
      if (transport) {
        await withLogging(this.logger, 'transport.drain', () => transport.close());
      }
    } catch (error) {
      this.logger.warn({ err: error }, `Transport close failed: ${getErrorMessage(error)}`);
    } finally {
      this.transport = undefined;
      this.currentState = 'stopped';
    }

    const report = VerificationReport.of(this.table.rules());
    this.logger.serverStopped(Date.now() - startTime, report.outcomes.length, report.violations.length);
    return report.assertSatisfied();
  }

  // ==========================================================================
  // Address
  // ==========================================================================

  /**
   * Bound address. Stays available after stop.
   *
   * @throws InvalidStateError before the server has started
   */
  address(): BoundAddress {
    if (!this.bound) {
      throw new InvalidStateError('read the address', this.currentState);
    }
    return { ...this.bound };
  }

  /** Base URI, e.g. `http://127.0.0.1:49152` */
  uri(): string {
    const { host, port, family } = this.address();
    return family === 'IPv6' ? `http://[${host}]:${port}` : `http://${host}:${port}`;
  }

  // ==========================================================================
  // Rules
  // ==========================================================================

  /**
   * Mount a rule until the server stops
   *
   * @throws InvalidStateError once the server is stopping
   */
  mount(mock: Mountable): Rule {
    return this.mountRule(mock, 'global');
  }

  /**
   * Mount a rule until the returned guard is released
   *
   * @throws InvalidStateError once the server is stopping
   */
  mountScoped(mock: Mountable): ScopeGuard {
    return new ScopeGuard(this.mountRule(mock, 'scoped'), this.table, this.log);
  }

  /**
   * Run `fn` with a scoped rule mounted, releasing it afterwards. An error
   * from `fn` takes precedence over a verification failure.
   */
  async withScopedMock<T>(mock: Mountable, fn: (guard: ScopeGuard) => T | Promise<T>): Promise<T> {
    const guard = this.mountScoped(mock);
    let result: T;
    try {
      result = await fn(guard);
    } catch (error) {
      guard.settle();
      throw error;
    }
    guard.release();
    return result;
  }

  unmount(id: RuleId): boolean {
    return this.table.unmount(id) !== undefined;
  }

  /** Mounted rules in mount order */
  rules(): Rule[] {
    return this.table.rules();
  }

  /**
   * Verify every mounted rule without stopping or throwing
   */
  verify(): VerificationReport {
    return VerificationReport.of(this.table.rules());
  }

  /**
   * Unmount every rule and start a fresh request log
   */
  reset(): void {
    this.table.clear();
    this.log.clear();
  }

  // ==========================================================================
  // Requests
  // ==========================================================================

  /** Copy of the request log in arrival order */
  requests(): RecordedRequest[] {
    return this.log.requests();
  }

  /**
   * Record the request, then pick and count the answering rule. Runs
   * synchronously, so no other request or mount interleaves.
   */
  handle(request: RecordedRequest): DispatchResult {
    const recorded = this.log.append(request);
    const rule = this.table.claim(recorded);

    if (!rule) {
      this.logger.requestUnmatched(recorded.method, recorded.path);
      return { request: recorded, response: NOT_FOUND };
    }

    this.logger.requestMatched(recorded.method, recorded.path, rule.id);
    return { request: recorded, ruleId: rule.id, response: rule.response };
  }

  private async bindTransport(host: string, port: number): Promise<BoundAddress> {
    let bound: BoundAddress;
    try {
      const transport = await HttpTransport.create((request) => this.handle(request), {
        bodyLimit: this.config.bodyLimit,
        shutdownTimeoutMs: this.config.shutdownTimeoutMs,
        logger: this.logger.child({ component: 'transport' }),
      });
      bound = await transport.listen(host, port);
      this.bound = bound;
      this.transport = transport;
    } catch (error) {
      // A stop() that arrived meanwhile owns the state from here on.
      if (this.currentState === 'running') {
        this.currentState = 'created';
      }
      throw error;
    }

    this.logger.serverStarted(this.uri(), this.config.recordRequests);
    return { ...bound };
  }

  private mountRule(mock: Mountable, scope: RuleScope): Rule {
    if (this.currentState === 'stopping' || this.currentState === 'stopped') {
      throw new InvalidStateError('mount a rule', this.currentState);
    }
    const definition = mock instanceof Mock ? mock.toDefinition() : mock;
    return this.table.mount(definition, scope);
  }
}
