import { Worker } from 'worker_threads'
import { FaultlineValidationError } from '../src/errors'
import { handledStateForHandledException, handledStateForUnhandledException } from '../src/handled-state'
import { Session, SessionEvents } from '../src/session'

const UUID_REGEXP = /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[0-9a-f]{4}-[0-9a-f]{12}$/

// Adds 1000 to one counter of the shared buffer from another thread
const WORKER_SOURCE = `
const { workerData, parentPort } = require('worker_threads')
const counts = new BigInt64Array(workerData.buffer, 0, 2)
for (let i = 0; i < 1000; i++) {
  Atomics.add(counts, workerData.index, 1n)
}
parentPort.postMessage('done')
`

const runWorker = async (buffer: SharedArrayBuffer, index: number): Promise<void> => {
  const worker = new Worker(WORKER_SOURCE, { eval: true, workerData: { buffer, index } })
  try {
    await new Promise<void>((resolve, reject) => {
      worker.once('message', () => resolve())
      worker.once('error', reject)
    })
  } finally {
    await worker.terminate()
  }
}

describe('session', () => {
  describe('SessionEvents', () => {
    it('should start at zero', () => {
      expect(new SessionEvents().snapshot()).toEqual({ handled: 0, unhandled: 0 })
    })

    it('should start from the given counts', () => {
      expect(new SessionEvents(3, 7).snapshot()).toEqual({ handled: 3, unhandled: 7 })
    })

    it('should increment each counter independently', () => {
      const events = new SessionEvents()
      events.incrementHandled()
      events.incrementHandled()
      events.incrementUnhandled()
      expect(events.handled).toEqual(2)
      expect(events.unhandled).toEqual(1)
    })

    it('should reject invalid initial counts', () => {
      expect(() => new SessionEvents(-1, 0)).toThrow(FaultlineValidationError)
      expect(() => new SessionEvents(0, 1.5)).toThrow('Session unhandled count must be a non-negative integer, got 1.5')
    })

    it('should keep counting past 32 bits', () => {
      const events = new SessionEvents(0x7fffffff, 0)
      events.incrementHandled()
      expect(events.snapshot()).toEqual({ handled: 2147483648, unhandled: 0 })
    })

    it('should reject a buffer too small for both counters', () => {
      expect(() => SessionEvents.fromBuffer(new SharedArrayBuffer(8))).toThrow(
        'Session events buffer must hold two 64-bit counters'
      )
    })

    it('should share counts with another view of the same buffer', () => {
      const events = new SessionEvents(1, 2)
      const view = SessionEvents.fromBuffer(events.buffer)
      view.incrementHandled()
      events.incrementUnhandled()
      expect(view.buffer).toBe(events.buffer)
      expect(events.snapshot()).toEqual({ handled: 2, unhandled: 3 })
      expect(view.snapshot()).toEqual({ handled: 2, unhandled: 3 })
    })

    it('should not lose updates made from several threads at once', async () => {
      const events = new SessionEvents()

      const workers = Promise.all([runWorker(events.buffer, 0), runWorker(events.buffer, 1)])
      for (let i = 0; i < 1000; i++) {
        events.incrementHandled()
      }
      await workers

      expect(events.snapshot()).toEqual({ handled: 2000, unhandled: 1000 })
    })
  })

  describe('Session', () => {
    it('should start a fresh session', () => {
      const session = new Session(new Date('2024-03-01T10:00:00.000Z'))
      expect(session.id).toMatch(UUID_REGEXP)
      expect(session.toPayload()).toEqual({
        id: session.id,
        startedAt: '2024-03-01T10:00:00.000Z',
        events: { handled: 0, unhandled: 0 },
      })
    })

    it('should give every session its own id', () => {
      expect(new Session().id).not.toEqual(new Session().id)
    })

    it('should resume with previous counts', () => {
      const session = new Session(new Date('2024-03-01T10:00:00.000Z'), 4, 2)
      expect(session.events.snapshot()).toEqual({ handled: 4, unhandled: 2 })
    })

    it('should count reports by their handled state', () => {
      const session = new Session()
      session.addException({ handledState: handledStateForHandledException() })
      session.addException({ handledState: handledStateForUnhandledException() })
      session.addException({ handledState: handledStateForUnhandledException() })
      expect(session.events.snapshot()).toEqual({ handled: 1, unhandled: 2 })
    })
  })
})
