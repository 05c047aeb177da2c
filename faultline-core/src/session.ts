import { uuidv7 } from 'uuidv7'
import { FaultlineValidationError } from './errors'
import { Report, SessionCountersSnapshot, SessionPayload } from './types'

const HANDLED_INDEX = 0
const UNHANDLED_INDEX = 1
const COUNTERS_BYTE_LENGTH = 2 * BigInt64Array.BYTES_PER_ELEMENT

/**
 * Handled and unhandled event counts for one session.
 *
 * Both counts live in a `SharedArrayBuffer` as 64-bit cells and are only ever changed with `Atomics.add`, each on
 * its own cell. `SessionEvents.fromBuffer` builds a second view over the same buffer (e.g. in a worker thread)
 * that sees and adds to the same counts. The two counters are independent of each other: a snapshot reads one and
 * then the other.
 */
export class SessionEvents {
  private sharedBuffer: SharedArrayBuffer
  private counts: BigInt64Array

  constructor(handled: number = 0, unhandled: number = 0) {
    validateCount('handled', handled)
    validateCount('unhandled', unhandled)
    this.sharedBuffer = new SharedArrayBuffer(COUNTERS_BYTE_LENGTH)
    this.counts = new BigInt64Array(this.sharedBuffer, 0, 2)
    Atomics.store(this.counts, HANDLED_INDEX, BigInt(handled))
    Atomics.store(this.counts, UNHANDLED_INDEX, BigInt(unhandled))
  }

  /**
   * Counts kept in a buffer another `SessionEvents` owns, as handed over to a worker thread.
   */
  static fromBuffer(buffer: SharedArrayBuffer): SessionEvents {
    if (buffer.byteLength < COUNTERS_BYTE_LENGTH) {
      throw new FaultlineValidationError('Session events buffer must hold two 64-bit counters')
    }
    const events = new SessionEvents()
    events.sharedBuffer = buffer
    events.counts = new BigInt64Array(buffer, 0, 2)
    return events
  }

  get buffer(): SharedArrayBuffer {
    return this.sharedBuffer
  }

  incrementHandled(): void {
    Atomics.add(this.counts, HANDLED_INDEX, 1n)
  }

  incrementUnhandled(): void {
    Atomics.add(this.counts, UNHANDLED_INDEX, 1n)
  }

  get handled(): number {
    return Number(Atomics.load(this.counts, HANDLED_INDEX))
  }

  get unhandled(): number {
    return Number(Atomics.load(this.counts, UNHANDLED_INDEX))
  }

  snapshot(): SessionCountersSnapshot {
    return { handled: this.handled, unhandled: this.unhandled }
  }
}

function validateCount(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new FaultlineValidationError(`Session ${name} count must be a non-negative integer, got ${value}`)
  }
}

export class Session {
  readonly id: string
  readonly startedAt: Date
  readonly events: SessionEvents

  constructor(startedAt: Date = new Date(), handled: number = 0, unhandled: number = 0) {
    this.id = uuidv7()
    this.startedAt = startedAt
    this.events = new SessionEvents(handled, unhandled)
  }

  addException(report: Pick<Report, 'handledState'>): void {
    if (report.handledState.unhandled) {
      this.events.incrementUnhandled()
    } else {
      this.events.incrementHandled()
    }
  }

  toPayload(): SessionPayload {
    return {
      id: this.id,
      startedAt: this.startedAt.toISOString(),
      events: this.events.snapshot(),
    }
  }
}
