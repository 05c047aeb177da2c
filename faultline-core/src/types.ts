export type FaultlineCoreOptions = {
  /** If set to true the SDK is essentially disabled (useful for local environments where you don't want to report anything) */
  disabled?: boolean
  /** The release stage of the running application, e.g. 'production' or 'development'. Defaults to 'production' */
  releaseStage?: string
  /** Only send reports when the release stage is one of these. Reports are sent for every stage when unset */
  enabledReleaseStages?: string[]
  /** The version of the running application, added to the `app` section of every report */
  appVersion?: string
  /** Which log types are reported through `notifyLogMessage`. Defaults to Exception, Error and Assert */
  notifyLogTypes?: LogType[]
  /** Rules for classifying log messages, see `LogConvention`. Defaults to `androidJavaLogConvention` */
  logConvention?: LogConvention
  /** Custom metadata merged into every report, keyed by tab name */
  metadata?: ReportMetadata
  /**
   * Callbacks run before a report is delivered. They may mutate the report (e.g. to rename an error class).
   * Returning `false` from any of them drops the report.
   */
  onError?: OnErrorCallback | OnErrorCallback[]
  /** Whether a session is started when the client is created. Defaults to true */
  autoTrackSessions?: boolean
}

export type Severity = 'error' | 'warning' | 'info'

export type SeverityReasonType = 'handledException' | 'unhandledException' | 'log' | 'userSpecifiedSeverity'

export interface SeverityReason {
  type: SeverityReasonType
  attributes?: Record<string, string>
}

export interface HandledState {
  readonly unhandled: boolean
  readonly severity: Severity
  readonly severityReason: Readonly<SeverityReason>
}

/**
 * How an error reached the SDK. Drives the `HandledState` of every record created for it.
 */
export type ReportingContext =
  | { type: 'handledException'; severity?: Severity }
  | { type: 'logMessage'; severity: Severity }
  | { type: 'unhandledException' }

export interface StackFrame {
  method: string
  file?: string
  lineNumber?: number
  columnNumber?: number
  inProject?: boolean
}

export type StackTraceFormat = 'default' | 'androidJava'

export type StackParser = (stack: string, format?: StackTraceFormat, skipFirstLines?: number) => StackFrame[]
export type StackLineParserFn = (line: string) => StackFrame | undefined
export type StackLineParser = [number, StackLineParserFn]

export interface ExceptionRecord {
  errorClass: string
  message: string
  readonly stackTrace: StackFrame[]
}

export interface ReportableExceptions {
  exceptions: ExceptionRecord[]
  handledState: HandledState
}

/**
 * Reads the parts of a platform exception value the SDK needs. Each platform ships its own implementation,
 * the core never looks at the exception value directly.
 */
export interface ExceptionSource<E> {
  errorClass(exception: E): string
  message(exception: E): string
  stackTrace(exception: E): StackFrame[]
  /** The single causing exception, if any */
  innerException(exception: E): E | undefined
  /** The independent failures bundled by an aggregate exception, or undefined for a regular exception */
  bundledExceptions(exception: E): E[] | undefined
}

export type LogType = 'Error' | 'Assert' | 'Warning' | 'Log' | 'Exception'

export interface LogMessage {
  condition: string
  stackTrace: string
  type: LogType
}

export interface LogConvention {
  /** Prepended to the log type to build the error class of a message that has no `Class: message` shape */
  syntheticErrorClassPrefix: string
  /** Error class of a native exception surfacing through the log channel with a second `Class: message` inside */
  wrappedExceptionClass: string
  /** Present in the stack trace when a native agent has already reported the wrapped exception */
  nativeAgentMarker: string
  wrappedStackTraceFormat: StackTraceFormat
}

export interface SessionCountersSnapshot {
  handled: number
  unhandled: number
}

export interface SessionPayload {
  id: string
  startedAt: string
  events: SessionCountersSnapshot
}

export type ReportMetadata = Record<string, Record<string, unknown>>

export interface Report {
  exceptions: ExceptionRecord[]
  handledState: HandledState
  context?: string
  metadata: ReportMetadata
  device: Record<string, unknown>
  app: Record<string, unknown>
  session?: SessionPayload
}

export type OnErrorCallback = (report: Report) => boolean | void

export interface NotifyOptions {
  severity?: Severity
  context?: string
  metadata?: ReportMetadata
}

export interface StackFramePayload {
  method: string
  file?: string
  lineNumber?: number
  columnNumber?: number
  inProject?: boolean
}

export interface ExceptionPayload {
  errorClass: string
  message: string
  stacktrace: StackFramePayload[]
}

export interface ReportPayload {
  exceptions: ExceptionPayload[]
  severity: Severity
  unhandled: boolean
  severityReason: SeverityReason
  context?: string
  metaData: ReportMetadata
  device: Record<string, unknown>
  app: Record<string, unknown>
  session?: SessionPayload
}
