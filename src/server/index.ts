/**
 * Server Module
 * @module server
 */

export { MockServer, type MockServerOptions, type ServerState } from './mock-server.js';
export { MountTable, Rule } from './mount-table.js';
export { RequestLog } from './request-log.js';
export { ScopeGuard } from './scope-guard.js';
export {
  VerificationReport,
  verifyRule,
  type RuleVerification,
  type VerificationOutcome,
} from './verification.js';
export {
  HttpTransport,
  buildTransportApp,
  toRecordedRequest,
  type BoundAddress,
  type DispatchResult,
  type Dispatcher,
  type TransportOptions,
} from './transport.js';
