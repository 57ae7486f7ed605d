/**
 * Request Log
 * @module server/request-log
 */

import type { RecordedRequest } from '../types/request.js';

/**
 * Snapshot with its own copy of the body bytes. Freezing a request does not
 * freeze the Buffer inside it.
 */
function detach(request: RecordedRequest): RecordedRequest {
  return Object.freeze({ ...request, body: Buffer.from(request.body) });
}

/**
 * Append-only record of the requests a server received.
 *
 * Every request gets the next arrival number whether or not recording is
 * enabled; only recorded requests are kept. The log never hands out the
 * entries it stores, only copies.
 */
export class RequestLog {
  private entries: RecordedRequest[] = [];
  private arrivals = 0;

  constructor(readonly enabled: boolean = true) {}

  get size(): number {
    return this.entries.length;
  }

  /**
   * Stamp the request with its arrival number and keep it when recording
   */
  append(request: RecordedRequest): RecordedRequest {
    this.arrivals += 1;
    const stamped: RecordedRequest = Object.freeze({ ...request, sequence: this.arrivals });
    if (this.enabled) {
      this.entries.push(detach(stamped));
    }
    return stamped;
  }

  /** Copy of the log in arrival order */
  requests(): RecordedRequest[] {
    return this.entries.map(detach);
  }

  bySequence(sequences: readonly number[]): RecordedRequest[] {
    const wanted = new Set(sequences);
    return this.entries.filter((request) => wanted.has(request.sequence)).map(detach);
  }

  /**
   * Start a new, empty log. Arrival numbers keep counting.
   */
  clear(): void {
    this.entries = [];
  }
}
