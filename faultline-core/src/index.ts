import {
  ExceptionSource,
  FaultlineCoreOptions,
  LogConvention,
  LogMessage,
  LogType,
  NotifyOptions,
  OnErrorCallback,
  Report,
  ReportableExceptions,
  ReportMetadata,
  ReportPayload,
  StackFrame,
  StackParser,
} from './types'
import { createReportableExceptions } from './exceptions'
import { androidJavaLogConvention, exceptionFromLogMessage, shouldSend } from './log-message'
import { severityForLogType } from './handled-state'
import { reportToPayload } from './payload'
import { Session } from './session'
import { FaultlineDeliveryError } from './errors'
import { Listener, SimpleEventEmitter } from './eventemitter'
import { mergeMetadata, safeSetTimeout } from './utils'
import { uuidv7 } from 'uuidv7'

export * from './types'
export * from './exceptions'
export * from './handled-state'
export * from './log-message'
export * from './stack-parser'
export * from './session'
export * from './payload'
export * from './errors'
export * as utils from './utils'
export { SimpleEventEmitter } from './eventemitter'

export type LogNotifyOptions = NotifyOptions & {
  /** Report the message as an unhandled crash whatever its log type */
  forceUnhandled?: boolean
}

const DEFAULT_NOTIFY_LOG_TYPES: LogType[] = ['Exception', 'Error', 'Assert']

export abstract class FaultlineCore<E = unknown> {
  // options
  readonly releaseStage: string
  readonly appVersion?: string
  readonly enabledReleaseStages?: string[]
  readonly notifyLogTypes: LogType[]
  readonly logConvention: LogConvention
  protected disabled: boolean
  private metadata: ReportMetadata
  private onErrorCallbacks: OnErrorCallback[]
  private removeDebugCallback?: () => void
  private pendingPromises: Record<string, Promise<unknown>> = {}

  // internal
  protected _events = new SimpleEventEmitter()
  protected _session?: Session

  // Abstract methods to be overridden by implementations
  abstract getLibraryId(): string
  abstract getLibraryVersion(): string
  abstract getExceptionSource(): ExceptionSource<E>
  abstract getStackParser(): StackParser
  abstract getDeviceMetadata(): Record<string, unknown>
  abstract getAppMetadata(): Record<string, unknown>
  /** Frames of the call site that is reporting, used when an error carries no stack trace of its own */
  abstract getFallbackStackTrace(): StackFrame[]
  /** Sends a finished report to the backend. Resolving counts the report against the current session */
  abstract deliver(payload: ReportPayload): Promise<void>

  constructor(options?: FaultlineCoreOptions) {
    this.disabled = options?.disabled ?? false
    this.releaseStage = options?.releaseStage ?? 'production'
    this.enabledReleaseStages = options?.enabledReleaseStages
    this.appVersion = options?.appVersion
    this.notifyLogTypes = options?.notifyLogTypes ?? DEFAULT_NOTIFY_LOG_TYPES
    this.logConvention = options?.logConvention ?? androidJavaLogConvention
    this.metadata = mergeMetadata(options?.metadata)

    const onError = options?.onError
    this.onErrorCallbacks = onError === undefined ? [] : Array.isArray(onError) ? [...onError] : [onError]

    if (options?.autoTrackSessions ?? true) {
      this.startSession()
    }
  }

  protected logMsgIfDebug(fn: () => void): void {
    if (this.isDebug) {
      fn()
    }
  }

  on(event: string, cb: Listener): () => void {
    return this._events.on(event, cb)
  }

  debug(enabled: boolean = true): void {
    this.removeDebugCallback?.()

    if (enabled) {
      const removeDebugCallback = this.on('*', (event, payload) => console.log('Faultline Debug', event, payload))
      this.removeDebugCallback = () => {
        removeDebugCallback()
        this.removeDebugCallback = undefined
      }
    }
  }

  get isDebug(): boolean {
    return !!this.removeDebugCallback
  }

  get isDisabled(): boolean {
    return this.disabled
  }

  /***
   *** SESSIONS
   ***/

  startSession(): Session {
    this._session = new Session()
    this._events.emit('session', this._session.toPayload())
    return this._session
  }

  /**
   * Continues a session that was started earlier, e.g. in a previous process, keeping its counts.
   */
  resumeSession(startedAt: Date, handled: number, unhandled: number): Session {
    this._session = new Session(startedAt, handled, unhandled)
    this._events.emit('session', this._session.toPayload())
    return this._session
  }

  getSession(): Session | undefined {
    return this._session
  }

  /***
   *** METADATA
   ***/

  addMetadata(tab: string, values: Record<string, unknown>): void {
    this.metadata = mergeMetadata(this.metadata, { [tab]: values })
  }

  clearMetadata(tab: string): void {
    delete this.metadata[tab]
  }

  addOnError(callback: OnErrorCallback): () => void {
    this.onErrorCallbacks.push(callback)
    return () => {
      this.onErrorCallbacks = this.onErrorCallbacks.filter((x) => x !== callback)
    }
  }

  /***
   *** REPORTING
   ***/

  /**
   * Reports an error the application caught. Resolves to whether a report was delivered.
   */
  notify(error: E, options: NotifyOptions = {}): Promise<boolean> {
    const reportable = createReportableExceptions(error, this.getExceptionSource(), this.getFallbackStackTrace(), {
      type: 'handledException',
      severity: options.severity,
    })
    return this.sendReport(reportable, options)
  }

  /**
   * Reports an error that nothing caught, e.g. from an uncaught exception handler.
   */
  notifyUnhandled(error: E, options: Omit<NotifyOptions, 'severity'> = {}): Promise<boolean> {
    const reportable = createReportableExceptions(error, this.getExceptionSource(), this.getFallbackStackTrace(), {
      type: 'unhandledException',
    })
    return this.sendReport(reportable, options)
  }

  notifyLogMessage(logMessage: LogMessage, options: LogNotifyOptions = {}): Promise<boolean> {
    if (!this.notifyLogTypes.includes(logMessage.type)) {
      return Promise.resolve(false)
    }

    if (!shouldSend(logMessage, this.logConvention)) {
      this.logMsgIfDebug(() => console.info('[Faultline] Log message was already reported natively, skipping'))
      return Promise.resolve(false)
    }

    const severity = options.severity ?? severityForLogType(logMessage.type)
    const { exception, handledState } = exceptionFromLogMessage(logMessage, this.getFallbackStackTrace(), severity, {
      stackParser: this.getStackParser(),
      forceUnhandled: options.forceUnhandled,
      convention: this.logConvention,
    })

    return this.sendReport({ exceptions: [exception], handledState }, options)
  }

  protected async sendReport(reportable: ReportableExceptions, options: NotifyOptions): Promise<boolean> {
    if (this.disabled) {
      this.logMsgIfDebug(() => console.warn('[Faultline] The client is disabled'))
      return false
    }

    if (reportable.exceptions.length === 0) {
      this.logMsgIfDebug(() => console.warn('[Faultline] Nothing to report'))
      return false
    }

    const report: Report = {
      exceptions: reportable.exceptions,
      handledState: reportable.handledState,
      context: options.context,
      metadata: mergeMetadata(this.metadata, options.metadata),
      device: this.getDeviceMetadata(),
      app: {
        ...this.getAppMetadata(),
        releaseStage: this.releaseStage,
        ...(this.appVersion !== undefined ? { version: this.appVersion } : {}),
      },
    }

    if (!this.runOnErrorCallbacks(report)) {
      this.logMsgIfDebug(() => console.info('[Faultline] Report was dropped by an onError callback'))
      return false
    }

    if (this.enabledReleaseStages && !this.enabledReleaseStages.includes(this.releaseStage)) {
      this.logMsgIfDebug(() =>
        console.info(`[Faultline] Release stage '${this.releaseStage}' is not enabled, report not sent`)
      )
      return false
    }

    const session = this._session
    if (session) {
      report.session = session.toPayload()
    }

    const payload = reportToPayload(report)
    this._events.emit('report', payload)

    try {
      await this.addPendingPromise(this.deliver(payload))
    } catch (e) {
      this.logMsgIfDebug(() => console.error('[Faultline] Error while delivering report', e))
      this._events.emit('error', new FaultlineDeliveryError(e))
      return false
    }

    session?.addException(report)
    this._events.emit('delivered', payload)
    return true
  }

  private runOnErrorCallbacks(report: Report): boolean {
    for (const callback of this.onErrorCallbacks) {
      try {
        if (callback(report) === false) {
          return false
        }
      } catch (e) {
        // a failing callback must not lose the report
        this.logMsgIfDebug(() => console.error('[Faultline] onError callback threw', e))
        this._events.emit('error', e)
      }
    }
    return true
  }

  protected addPendingPromise<T>(promise: Promise<T>): Promise<T> {
    const promiseUUID = uuidv7()
    this.pendingPromises[promiseUUID] = promise
    // rejections reach whoever awaits the returned promise
    promise
      .catch(() => {})
      .finally(() => {
        delete this.pendingPromises[promiseUUID]
      })

    return promise
  }

  async shutdown(shutdownTimeoutMs: number = 30000): Promise<void> {
    let timeout: ReturnType<typeof setTimeout> | undefined

    const timedOut = new Promise<void>((_, reject) => {
      timeout = safeSetTimeout(() => {
        this.logMsgIfDebug(() => console.error('[Faultline] Timed out while shutting down'))
        reject(new Error('Timeout while shutting down Faultline. Some reports may not have been delivered.'))
      }, shutdownTimeoutMs)
    })

    try {
      await Promise.race([timedOut, Promise.allSettled(Object.values(this.pendingPromises))])
    } finally {
      clearTimeout(timeout)
    }
  }
}
