import { version } from '../package.json'

import {
  ExceptionSource,
  FaultlineCore,
  FaultlineCoreOptions,
  ReportPayload,
  StackFrame,
  StackParser,
  defaultStackParser,
} from 'faultline-core'
import { NodeExceptionSource } from './error-source'
import { getAppMetadata, getDeviceMetadata } from './device'
import { addUncaughtExceptionListener, addUnhandledRejectionListener } from './autocapture'

const SHUTDOWN_TIMEOUT = 2000

// Client methods that sit between the reporting call site and the synthetic Error of a fallback stack trace
const SDK_METHODS = ['getFallbackStackTrace', 'notify', 'notifyUnhandled', 'notifyLogMessage']

export type FaultlineOptions = FaultlineCoreOptions & {
  /** Sends a report to the backend. Without one, reports are only logged in debug mode */
  transport?: (payload: ReportPayload) => Promise<void>
  /** Report uncaught exceptions and unhandled rejections as unhandled errors. Defaults to false */
  enableExceptionAutocapture?: boolean
  stackParser?: StackParser
}

export class Faultline extends FaultlineCore<unknown> {
  private readonly transport?: (payload: ReportPayload) => Promise<void>
  private readonly stackParser: StackParser
  private readonly exceptionSource: NodeExceptionSource
  private removeAutocaptureListeners: (() => void)[] = []

  constructor(options: FaultlineOptions = {}) {
    super(options)

    this.transport = options.transport
    this.stackParser = options.stackParser ?? defaultStackParser
    this.exceptionSource = new NodeExceptionSource(this.stackParser)

    if (options.enableExceptionAutocapture && !this.disabled) {
      this.startAutocapture()
    }
  }

  getLibraryId(): string {
    return 'faultline-node'
  }

  getLibraryVersion(): string {
    return version
  }

  getExceptionSource(): ExceptionSource<unknown> {
    return this.exceptionSource
  }

  getStackParser(): StackParser {
    return this.stackParser
  }

  getDeviceMetadata(): Record<string, unknown> {
    return getDeviceMetadata()
  }

  getAppMetadata(): Record<string, unknown> {
    return {
      ...getAppMetadata(),
      notifier: `${this.getLibraryId()}@${this.getLibraryVersion()}`,
    }
  }

  getFallbackStackTrace(): StackFrame[] {
    const frames = this.stackParser(new Error().stack ?? '', 'default', 1)
    // V8 names a method frame after the class of its receiver, so only this client's own frames match
    const sdkFrames = new Set(SDK_METHODS.map((method) => `${this.constructor.name}.${method}`))
    let start = 0
    while (start < frames.length && sdkFrames.has(frames[start].method)) {
      start++
    }
    return frames.slice(start)
  }

  async deliver(payload: ReportPayload): Promise<void> {
    if (this.transport) {
      return this.transport(payload)
    }
    this.logMsgIfDebug(() => console.log('[Faultline] No transport configured, report not sent', JSON.stringify(payload)))
  }

  private startAutocapture(): void {
    this.removeAutocaptureListeners = [
      addUncaughtExceptionListener(
        (error) => this.notifyUnhandled(error),
        () => this.shutdown(SHUTDOWN_TIMEOUT)
      ),
      addUnhandledRejectionListener((reason) => this.notifyUnhandled(reason)),
    ]
  }

  get isAutocaptureEnabled(): boolean {
    return this.removeAutocaptureListeners.length > 0
  }

  async shutdown(shutdownTimeoutMs?: number): Promise<void> {
    for (const remove of this.removeAutocaptureListeners) {
      remove()
    }
    this.removeAutocaptureListeners = []
    await super.shutdown(shutdownTimeoutMs)
  }
}
