/**
 * Structured Logger
 * @module logging/logger
 *
 * Pino logger with one method per server event. Each event is written with
 * an `event` field so log consumers can filter on it without parsing text.
 */

import pino, { type DestinationStream, type Level, type Logger, type LoggerOptions } from 'pino';

export interface LogContext {
  module?: string;
  component?: string;
  serverId?: string;
  ruleId?: string;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: string;
  pretty: boolean;
  service: string;
  version: string;
  environment: string;
}

export interface DomainLogMethods {
  serverStarted(address: string, recordRequests: boolean): void;
  serverStopping(mountedRules: number): void;
  serverStopped(durationMs: number, verifiedRules: number, violations: number): void;

  ruleMounted(ruleId: string, scope: string, description: string): void;
  ruleUnmounted(ruleId: string, callCount: number): void;

  requestMatched(method: string, path: string, ruleId: string): void;
  requestUnmatched(method: string, path: string): void;
  matcherFailed(ruleId: string, error: Error): void;
  transportError(error: Error, statusCode: number): void;

  performanceMetric(operation: string, durationMs: number, metadata?: Record<string, unknown>): void;
}

export type StructuredLogger = Omit<Logger, 'child'> & DomainLogMethods & {
  child(bindings: LogContext): StructuredLogger;
};

// Request headers end up in logs through recorded requests and errors.
const SENSITIVE_KEYS = ['authorization', 'proxy-authorization', 'cookie', 'set-cookie', 'password', 'token'];

const redactPaths = SENSITIVE_KEYS.flatMap((key) => {
  const field = /^[a-z]+$/.test(key) ? `.${key}` : `["${key}"]`;
  return [`headers${field}`, `*.headers${field}`, ...(field.startsWith('.') ? [key, `*${field}`] : [])];
});

/**
 * Read logger settings from the environment. Called per logger so tests
 * can change LOG_LEVEL between runs.
 */
export function resolveLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const environment = env.NODE_ENV ?? 'development';
  return {
    level: env.LOG_LEVEL ?? 'info',
    pretty: env.LOG_PRETTY === 'true' || environment === 'development',
    service: env.SERVICE_NAME ?? 'stubwire',
    version: env.SERVICE_VERSION ?? '0.1.0',
    environment,
  };
}

function codeOf(error: Error): unknown {
  return 'code' in error ? error.code : undefined;
}

function withDomainMethods(logger: Logger): StructuredLogger {
  const pinoChild = logger.child.bind(logger);
  const emit = (level: Level, event: string, fields: Record<string, unknown>, message: string): void => {
    logger[level]({ event, ...fields }, message);
  };

  const methods: DomainLogMethods & Pick<StructuredLogger, 'child'> = {
    serverStarted: (address, recordRequests) =>
      emit('info', 'server_started', { address, recordRequests }, `Mock server listening on ${address}`),
    serverStopping: (mountedRules) =>
      emit('debug', 'server_stopping', { mountedRules }, `Stopping with ${mountedRules} mounted rules`),
    serverStopped: (durationMs, verifiedRules, violations) =>
      emit(
        'info',
        'server_stopped',
        { durationMs, verifiedRules, violations },
        `Mock server stopped after ${durationMs}ms, ${violations} of ${verifiedRules} rules unsatisfied`
      ),

    ruleMounted: (ruleId, scope, description) =>
      emit('debug', 'rule_mounted', { ruleId, scope, description }, `Mounted ${scope} rule ${ruleId}`),
    ruleUnmounted: (ruleId, callCount) =>
      emit('debug', 'rule_unmounted', { ruleId, callCount }, `Unmounted rule ${ruleId} after ${callCount} calls`),

    requestMatched: (method, path, ruleId) =>
      emit('debug', 'request_matched', { method, path, ruleId }, `${method} ${path} matched rule ${ruleId}`),
    requestUnmatched: (method, path) =>
      emit('debug', 'request_unmatched', { method, path }, `${method} ${path} matched no rule`),
    matcherFailed: (ruleId, error) =>
      emit(
        'debug',
        'matcher_failed',
        { ruleId, err: error, errorCode: codeOf(error) },
        `Matcher of rule ${ruleId} threw, counted as no match: ${error.message}`
      ),
    transportError: (error, statusCode) =>
      emit(
        statusCode >= 500 ? 'error' : 'warn',
        'transport_error',
        { err: error, errorCode: codeOf(error), statusCode },
        `Request failed with ${statusCode}: ${error.message}`
      ),

    performanceMetric: (operation, durationMs, metadata) =>
      emit('debug', 'performance_metric', { operation, durationMs, ...metadata }, `${operation} took ${durationMs}ms`),

    child: (bindings) => withDomainMethods(pinoChild(bindings)),
  };

  return Object.assign(logger, methods);
}

/**
 * Create a logger. Pass `stream` to capture output; otherwise JSON goes to
 * stdout, or through pino-pretty outside production when pretty output is on.
 */
export function createLogger(name: string, baseContext?: LogContext, stream?: DestinationStream): StructuredLogger {
  const config = resolveLoggerConfig();

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: { level: (label) => ({ level: label }) },
    redact: { paths: redactPaths, censor: '[REDACTED]' },
    serializers: { err: pino.stdSerializers.err },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { service: config.service, version: config.version, env: config.environment },
  };

  const destination =
    stream ??
    (config.pretty && config.environment !== 'production'
      ? pino.transport({
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
        })
      : undefined);

  const base = destination ? pino(options, destination) : pino(options);
  return withDomainMethods(baseContext ? base.child(baseContext) : base);
}

let rootLogger: StructuredLogger | undefined;

/** Shared logger behind every module logger */
export function getLogger(): StructuredLogger {
  rootLogger ??= createLogger('stubwire');
  return rootLogger;
}

/** Replace the shared logger, e.g. to bind a test run id */
export function initLogger(context?: LogContext): StructuredLogger {
  rootLogger = createLogger('stubwire', context);
  return rootLogger;
}

export function resetLogger(): void {
  rootLogger = undefined;
}

export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().child({ module: moduleName });
}

/**
 * Time `fn` and report it as a performance metric, whether it resolves or
 * rejects.
 */
export async function withLogging<T>(logger: StructuredLogger, operation: string, fn: () => Promise<T>): Promise<T> {
  const startedAt = Date.now();
  let status = 'error';
  try {
    const result = await fn();
    status = 'success';
    return result;
  } finally {
    logger.performanceMetric(operation, Date.now() - startedAt, { status });
  }
}
